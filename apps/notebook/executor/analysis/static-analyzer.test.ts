import { describe, expect, it, vi } from 'vitest'
import { createAnalysisCache } from '@/executor/analysis/analysis-cache'
import { analyze, emptyAnalysis, rewriteForSession } from '@/executor/analysis/static-analyzer'
import type { AnalysisRecord, AnalysisResult } from '@/executor/types'

function expectRecord(result: AnalysisResult): AnalysisRecord {
  if (!result.ok) {
    throw new Error(`Expected a parsed block, got: ${result.message}`)
  }
  return result
}

describe('analyze', () => {
  it('extracts the load, clean and print chain', () => {
    const load = expectRecord(
      analyze("import fs from 'fs'\nconst df = JSON.parse(fs.readFileSync('x.json', 'utf8'))", 'javascript')
    )
    const clean = expectRecord(analyze('const dfClean = df.filter((row) => row.value !== null)', 'js'))
    const print = expectRecord(analyze('console.log(dfClean.length)', 'javascript'))

    expect(load.imports).toEqual(['fs'])
    expect(load.importBindings).toEqual([{ local: 'fs', module: 'fs', imported: 'default' }])
    expect(load.variablesDefined).toEqual(['df'])
    expect(load.referenced).toEqual([])

    expect(clean.language).toBe('javascript')
    expect(clean.variablesDefined).toEqual(['dfClean'])
    expect(clean.referenced).toEqual(['df'])

    expect(print.variablesDefined).toEqual([])
    expect(print.referenced).toEqual(['dfClean'])
  })

  it('does not report names defined earlier in the same block', () => {
    const record = expectRecord(
      analyze('let total = 0\nfor (const item of items) { total += item }\nconsole.log(total)')
    )

    expect(record.variablesDefined).toEqual(['total'])
    expect(record.referenced).toEqual(['items'])
  })

  it('reports names read before their definition', () => {
    const record = expectRecord(analyze('const y = x + 1\nconst x = 2'))

    expect(record.variablesDefined).toEqual(['y', 'x'])
    expect(record.referenced).toEqual(['x'])
  })

  it('separates function definitions and resolves names inside function bodies', () => {
    const record = expectRecord(
      analyze(
        [
          'function summarize(rows) {',
          '  return rows.map(format)',
          '}',
          'const format = (row) => `${row.name}: ${threshold}`',
        ].join('\n')
      )
    )

    expect(record.functionsDefined).toEqual(['summarize'])
    expect(record.variablesDefined).toEqual(['format'])
    expect(record.referenced).toEqual(['threshold'])
  })

  it('treats classes as definitions', () => {
    const record = expectRecord(
      analyze('class Model {\n  fit(data) {\n    return data.length + this.bias\n  }\n}')
    )

    expect(record.functionsDefined).toEqual(['Model'])
    expect(record.referenced).toEqual([])
  })

  it('records require bindings as imports rather than variables', () => {
    const record = expectRecord(
      analyze(
        [
          "const { readFileSync: read } = require('fs')",
          "const path = require('path')",
          "const [first, ...rest] = read('a.txt', 'utf8').split('\\n')",
        ].join('\n')
      )
    )

    expect(record.imports).toEqual(['fs', 'path'])
    expect(record.importBindings).toEqual([
      { local: 'read', module: 'fs', imported: 'readFileSync' },
      { local: 'path', module: 'path', imported: 'default' },
    ])
    expect(record.variablesDefined).toEqual(['first', 'rest'])
    expect(record.referenced).toEqual([])
  })

  it('counts dynamic imports', () => {
    const record = expectRecord(analyze("import('./plugin.js').then((mod) => mod.run())"))

    expect(record.imports).toEqual(['./plugin.js'])
    expect(record.importBindings).toEqual([])
    expect(record.referenced).toEqual([])
  })

  it('reads shorthand properties but not property keys', () => {
    const record = expectRecord(
      analyze('const config = { limit, mode: defaultMode, nested: { key: 1 } }')
    )

    expect(record.referenced).toEqual(['limit', 'defaultMode'])
  })

  it('treats bare top-level assignments as definitions', () => {
    expect(expectRecord(analyze('counter = 1\ncounter++'))).toMatchObject({
      variablesDefined: ['counter'],
      referenced: [],
    })
    expect(expectRecord(analyze('total += 1'))).toMatchObject({
      variablesDefined: ['total'],
      referenced: ['total'],
    })
  })

  it('ignores assignments made inside functions', () => {
    const record = expectRecord(analyze('function reset() {\n  state = null\n}'))

    expect(record.variablesDefined).toEqual([])
    expect(record.functionsDefined).toEqual(['reset'])
    expect(record.referenced).toEqual([])
  })

  it('returns an analysis error with the parser position', () => {
    const result = analyze('const a = 1\nconst b = (')

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.line).toBe(2)
      expect(result.message.length).toBeGreaterThan(0)
    }
  })

  it('records the data files read and written by literal path', () => {
    const record = expectRecord(
      analyze(
        [
          "const raw = fs.readFileSync('sales.csv', 'utf8')",
          "const book = XLSX.readFile(path.join(workdir, 'targets.xlsx'))",
          'const other = fs.readFileSync(inputPath)',
          "fs.writeFileSync(join(workdir, 'summary.json'), JSON.stringify(book))",
          "XLSX.writeFile(book, 'book.xlsx')",
        ].join('\n')
      )
    )

    expect(record.filesRead).toEqual(['sales.csv', 'targets.xlsx'])
    expect(record.filesWritten).toEqual(['summary.json', 'book.xlsx'])
  })

  it('short-circuits documentation languages', () => {
    expect(analyze('# Title\nSome *notes*', 'markdown')).toEqual(emptyAnalysis('markdown'))
    expect(analyze('SELECT * FROM t', 'sql')).toEqual(emptyAnalysis('sql'))
  })

  it('estimates complexity from the syntax tree size', () => {
    const small = expectRecord(analyze('a'))
    const large = expectRecord(analyze('const b = [1, 2, 3].map((n) => n * 2).filter(Boolean)'))

    expect(small.complexity).toBeGreaterThan(0)
    expect(large.complexity).toBeGreaterThan(small.complexity)
  })
})

describe('rewriteForSession', () => {
  it('turns import declarations into binding calls', () => {
    const source = [
      "import fs from 'fs'",
      "import { join as joinPath, sep } from 'path'",
      "import 'side-effect'",
      "const out = joinPath('a', 'b')",
    ].join('\n')

    const rewritten = rewriteForSession(source)

    expect(rewritten.code).toBe(
      [
        'var fs = __importBinding("fs", "default");',
        'var joinPath = __importBinding("path", "join"); var sep = __importBinding("path", "sep");',
        '__importBinding("side-effect", "*");',
        "var   out = joinPath('a', 'b')",
      ].join('\n')
    )
    expect(rewritten.imports).toEqual(['fs', 'path', 'side-effect'])
    expect(rewritten.bindings.map((binding) => binding.local)).toEqual(['fs', 'joinPath', 'sep'])
  })

  it('keeps following statements on their original lines', () => {
    const rewritten = rewriteForSession("import {\n  a,\n  b,\n} from 'mod'\na(b)")

    expect(rewritten.code).toBe(
      'var a = __importBinding("mod", "a"); var b = __importBinding("mod", "b");\n\n\n\na(b)'
    )
  })

  it('declares top-level lexical bindings and classes with var', () => {
    const source = [
      'let total = 0',
      'class Counter { inc() { total++ } }',
      'if (total === 0) { const inner = 1; let other = 2 }',
      'for (let i = 0; i < 2; i++) {}',
    ].join('\n')

    expect(rewriteForSession(source).code).toBe(
      [
        'var total = 0',
        'var Counter = class Counter { inc() { total++ } };',
        'if (total === 0) { const inner = 1; let other = 2 }',
        'for (let i = 0; i < 2; i++) {}',
      ].join('\n')
    )
  })

  it('rewrites adjacent classes independently', () => {
    expect(rewriteForSession('class A {}class B {}').code).toBe('var A = class A {};var B = class B {};')
  })

  it('leaves unparseable source untouched', () => {
    expect(rewriteForSession('const = 1').code).toBe('const = 1')
  })
})

describe('createAnalysisCache', () => {
  it('reanalyzes only when the source changes', () => {
    const analyzeSpy = vi.fn(analyze)
    const cache = createAnalysisCache(analyzeSpy)

    const first = cache.get('b1', 'const a = 1', 'javascript')
    expect(cache.get('b1', 'const a = 1', 'javascript')).toBe(first)
    expect(analyzeSpy).toHaveBeenCalledTimes(1)

    cache.get('b1', 'const a = 2', 'javascript')
    expect(analyzeSpy).toHaveBeenCalledTimes(2)

    cache.invalidate('b1')
    cache.get('b1', 'const a = 2', 'javascript')
    expect(analyzeSpy).toHaveBeenCalledTimes(3)
    expect(cache.size).toBe(1)
  })
})

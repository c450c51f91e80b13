import { createLogger } from '@dagbook/logger'
import {
  type CallExpression,
  type ImportDeclaration,
  Node,
  Project,
  type SourceFile,
  SyntaxKind,
  type ts,
  VariableDeclarationKind,
} from 'ts-morph'
import builtinNames from '@/executor/analysis/builtins.json'
import { ANALYZED_LANGUAGES, IMPORT_BINDING_HELPER } from '@/executor/constants'
import type { AnalysisError, AnalysisRecord, AnalysisResult, ImportBinding } from '@/executor/types'

const logger = createLogger('StaticAnalyzer')

const BUILTINS: ReadonlySet<string> = new Set<string>(builtinNames)

const BLOCK_FILE_NAME = 'block.js'

const FILE_READERS: ReadonlySet<string> = new Set(['readFile', 'readFileSync', 'createReadStream'])

const FILE_WRITERS: ReadonlySet<string> = new Set([
  'writeFile',
  'writeFileSync',
  'appendFile',
  'appendFileSync',
  'createWriteStream',
])

const PATH_BUILDERS: ReadonlySet<string> = new Set(['join', 'resolve'])

let sharedProject: Project | undefined

function getProject(): Project {
  sharedProject ??= new Project({
    useInMemoryFileSystem: true,
    compilerOptions: { allowJs: true, noLib: true, noResolve: true },
  })
  return sharedProject
}

function parse(source: string): SourceFile {
  return getProject().createSourceFile(BLOCK_FILE_NAME, source, { overwrite: true })
}

function findSyntaxError(sourceFile: SourceFile): AnalysisError | undefined {
  const [diagnostic] = getProject().getProgram().getSyntacticDiagnostics(sourceFile)
  if (!diagnostic) return undefined

  const text = diagnostic.getMessageText()
  const message = typeof text === 'string' ? text : text.getMessageText()
  const position = diagnostic.getStart() ?? 0
  const { line, column } = sourceFile.getLineAndColumnAtPos(position)

  return { ok: false, message, line, column, position }
}

function isFunctionLike(node: Node): boolean {
  return (
    Node.isFunctionDeclaration(node) ||
    Node.isFunctionExpression(node) ||
    Node.isArrowFunction(node) ||
    Node.isMethodDeclaration(node) ||
    Node.isConstructorDeclaration(node) ||
    Node.isGetAccessorDeclaration(node) ||
    Node.isSetAccessorDeclaration(node)
  )
}

/** Code that runs later than the statement containing it: function bodies and class members. */
function isDeferred(node: Node): boolean {
  return (
    node.getFirstAncestor(
      (ancestor) =>
        isFunctionLike(ancestor) ||
        Node.isClassStaticBlockDeclaration(ancestor) ||
        Node.isPropertyDeclaration(ancestor)
    ) !== undefined
  )
}

function functionScopeOf(node: Node): Node {
  return node.getFirstAncestor(isFunctionLike) ?? node.getSourceFile()
}

function blockScopeOf(node: Node): Node {
  return (
    node.getFirstAncestor(
      (ancestor) => Node.isBlock(ancestor) || Node.isCaseBlock(ancestor) || Node.isSourceFile(ancestor)
    ) ?? node.getSourceFile()
  )
}

function bindingNames(nameNode: Node): string[] {
  if (Node.isIdentifier(nameNode)) return [nameNode.getText()]
  if (Node.isObjectBindingPattern(nameNode) || Node.isArrayBindingPattern(nameNode)) {
    return nameNode
      .getElements()
      .flatMap((element) => (Node.isBindingElement(element) ? bindingNames(element.getNameNode()) : []))
  }
  return []
}

function stringArgument(node: Node): string | undefined {
  if (Node.isStringLiteral(node) || Node.isNoSubstitutionTemplateLiteral(node)) {
    return node.getLiteralValue()
  }
  return undefined
}

/** `require('m')` with a literal specifier; returns the module name. */
function requiredModule(node: Node): string | undefined {
  if (!Node.isCallExpression(node)) return undefined
  const callee = node.getExpression()
  const [first] = node.getArguments()
  if (!first) return undefined
  if (Node.isIdentifier(callee) && callee.getText() === 'require') return stringArgument(first)
  if (callee.getKind() === SyntaxKind.ImportKeyword) return stringArgument(first)
  return undefined
}

function declarationBindings(declaration: ImportDeclaration): ImportBinding[] {
  const module = declaration.getModuleSpecifierValue()
  const bindings: ImportBinding[] = []
  const defaultImport = declaration.getDefaultImport()
  if (defaultImport) {
    bindings.push({ local: defaultImport.getText(), module, imported: 'default' })
  }
  const namespaceImport = declaration.getNamespaceImport()
  if (namespaceImport) {
    bindings.push({ local: namespaceImport.getText(), module, imported: '*' })
  }
  for (const specifier of declaration.getNamedImports()) {
    const imported = specifier.getName()
    const local = specifier.getAliasNode()?.getText() ?? imported
    bindings.push({ local, module, imported })
  }
  return bindings
}

function importDeclarationBindings(sourceFile: SourceFile): ImportBinding[] {
  return sourceFile.getImportDeclarations().flatMap(declarationBindings)
}

/** Top-level `const x = require('m')` and `const { a } = require('m')`. */
function requireBindings(sourceFile: SourceFile): ImportBinding[] {
  const bindings: ImportBinding[] = []
  for (const statement of sourceFile.getVariableStatements()) {
    for (const declaration of statement.getDeclarations()) {
      const initializer = declaration.getInitializer()
      const module = initializer ? requiredModule(initializer) : undefined
      if (!module || !initializer || !Node.isCallExpression(initializer)) continue
      if (initializer.getExpression().getKind() === SyntaxKind.ImportKeyword) continue

      const nameNode = declaration.getNameNode()
      if (Node.isIdentifier(nameNode)) {
        bindings.push({ local: nameNode.getText(), module, imported: 'default' })
      } else if (Node.isObjectBindingPattern(nameNode)) {
        for (const element of nameNode.getElements()) {
          const local = element.getNameNode()
          if (!Node.isIdentifier(local)) continue
          const imported = element.getPropertyNameNode()?.getText() ?? local.getText()
          bindings.push({ local: local.getText(), module, imported })
        }
      }
    }
  }
  return bindings
}

function collectImports(sourceFile: SourceFile): { modules: string[]; bindings: ImportBinding[] } {
  const modules = new Set<string>()
  for (const declaration of sourceFile.getImportDeclarations()) {
    modules.add(declaration.getModuleSpecifierValue())
  }
  sourceFile.forEachDescendant((node) => {
    const module = requiredModule(node)
    if (module) modules.add(module)
  })
  return {
    modules: [...modules],
    bindings: [...importDeclarationBindings(sourceFile), ...requireBindings(sourceFile)],
  }
}

/**
 * Identifiers that read a binding. Property names, labels, import/export
 * specifiers and declaration names are excluded; shorthand properties read.
 */
function isReferencePosition(node: Node): boolean {
  const parent = node.getParent()
  if (!parent) return false

  if (Node.isPropertyAccessExpression(parent)) return parent.getNameNode() !== node
  if (Node.isPropertyAssignment(parent)) return parent.getNameNode() !== node
  if (
    Node.isMethodDeclaration(parent) ||
    Node.isPropertyDeclaration(parent) ||
    Node.isGetAccessorDeclaration(parent) ||
    Node.isSetAccessorDeclaration(parent)
  ) {
    return parent.getNameNode() !== node
  }
  if (Node.isLabeledStatement(parent)) return parent.getLabel() !== node
  if (Node.isBreakStatement(parent) || Node.isContinueStatement(parent)) return false
  if (Node.isMetaProperty(parent)) return false
  if (
    Node.isImportSpecifier(parent) ||
    Node.isImportClause(parent) ||
    Node.isNamespaceImport(parent) ||
    Node.isExportSpecifier(parent)
  ) {
    return false
  }
  if (Node.isBindingElement(parent)) {
    return parent.getNameNode() !== node && parent.getPropertyNameNode() !== node
  }
  if (Node.isVariableDeclaration(parent) || Node.isParameterDeclaration(parent)) {
    return parent.getNameNode() !== node
  }
  if (
    Node.isFunctionDeclaration(parent) ||
    Node.isFunctionExpression(parent) ||
    Node.isClassDeclaration(parent) ||
    Node.isClassExpression(parent)
  ) {
    return parent.getNameNode() !== node
  }
  if (Node.isBinaryExpression(parent) && parent.getLeft() === node) {
    return parent.getOperatorToken().getKind() !== SyntaxKind.EqualsToken
  }
  return true
}

function isAssignmentOperator(kind: SyntaxKind): boolean {
  return kind >= SyntaxKind.FirstAssignment && kind <= SyntaxKind.LastAssignment
}

/** Identifier written by `x = ...`, `x += ...`, `x++` or `--x`. */
function assignedIdentifier(node: Node): Node | undefined {
  if (Node.isBinaryExpression(node) && isAssignmentOperator(node.getOperatorToken().getKind())) {
    const left = node.getLeft()
    return Node.isIdentifier(left) ? left : undefined
  }
  if (Node.isPostfixUnaryExpression(node) || Node.isPrefixUnaryExpression(node)) {
    const operator = node.getOperatorToken()
    if (operator !== SyntaxKind.PlusPlusToken && operator !== SyntaxKind.MinusMinusToken) return undefined
    const operand = node.getOperand()
    return Node.isIdentifier(operand) ? operand : undefined
  }
  return undefined
}

class ScopeTable {
  private readonly scopes = new Map<ts.Node, Set<string>>()

  declare(scope: Node, names: string[]): void {
    const key = scope.compilerNode
    const declared = this.scopes.get(key) ?? new Set<string>()
    for (const name of names) declared.add(name)
    this.scopes.set(key, declared)
  }

  /** Whether a scope between `node` and the top level declares `name`. */
  resolvesLocally(node: Node, name: string): boolean {
    for (let current = node.getParent(); current; current = current.getParent()) {
      if (Node.isSourceFile(current)) return false
      if (this.scopes.get(current.compilerNode)?.has(name)) return true
    }
    return false
  }
}

interface TopLevelDefinitions {
  /** Earliest position from which each top-level name counts as defined. */
  positions: Map<string, number>
  variables: string[]
  functions: string[]
}

function addDefinition(definitions: TopLevelDefinitions, name: string, position: number): void {
  const existing = definitions.positions.get(name)
  if (existing === undefined || position < existing) {
    definitions.positions.set(name, position)
  }
}

function collectDeclarations(
  sourceFile: SourceFile,
  importLocals: ReadonlySet<string>
): { scopes: ScopeTable; definitions: TopLevelDefinitions } {
  const scopes = new ScopeTable()
  const definitions: TopLevelDefinitions = { positions: new Map(), variables: [], functions: [] }
  const variables = new Set<string>()
  const functions = new Set<string>()

  const declareTopLevel = (names: string[], position: number, kind: 'variable' | 'function') => {
    for (const name of names) {
      addDefinition(definitions, name, position)
      if (importLocals.has(name)) continue
      if (kind === 'function') functions.add(name)
      else variables.add(name)
    }
  }

  for (const binding of importDeclarationBindings(sourceFile)) {
    addDefinition(definitions, binding.local, 0)
  }

  sourceFile.forEachDescendant((node) => {
    if (Node.isVariableDeclaration(node)) {
      const parent = node.getParent()
      const names = bindingNames(node.getNameNode())
      if (Node.isCatchClause(parent)) {
        scopes.declare(parent, names)
        return
      }
      if (!Node.isVariableDeclarationList(parent)) return

      const holder = parent.getParent()
      const scope =
        parent.getDeclarationKind() === VariableDeclarationKind.Var
          ? functionScopeOf(node)
          : Node.isForStatement(holder) || Node.isForInStatement(holder) || Node.isForOfStatement(holder)
            ? holder
            : blockScopeOf(parent)

      if (Node.isSourceFile(scope)) {
        declareTopLevel(names, node.getEnd(), 'variable')
      } else {
        scopes.declare(scope, names)
      }
      return
    }

    if (Node.isParameterDeclaration(node)) {
      const owner = node.getParent()
      if (owner) scopes.declare(owner, bindingNames(node.getNameNode()))
      return
    }

    if (Node.isFunctionDeclaration(node) || Node.isClassDeclaration(node)) {
      const name = node.getName()
      if (!name) return
      const scope = blockScopeOf(node)
      if (Node.isSourceFile(scope)) {
        // Function declarations are hoisted; classes are usable after their declaration starts.
        declareTopLevel([name], Node.isFunctionDeclaration(node) ? 0 : node.getStart(), 'function')
      } else {
        scopes.declare(scope, [name])
      }
      return
    }

    if (Node.isFunctionExpression(node) || Node.isClassExpression(node)) {
      const name = node.getName()
      if (name) scopes.declare(node, [name])
    }
  })

  sourceFile.forEachDescendant((node) => {
    const target = assignedIdentifier(node)
    if (!target || isDeferred(node)) return
    const name = target.getText()
    if (scopes.resolvesLocally(target, name)) return
    declareTopLevel([name], node.getEnd(), 'variable')
  })

  definitions.variables = [...variables]
  definitions.functions = [...functions]
  return { scopes, definitions }
}

function collectReferences(
  sourceFile: SourceFile,
  scopes: ScopeTable,
  definitions: TopLevelDefinitions
): string[] {
  const referenced = new Set<string>()

  sourceFile.forEachDescendant((node) => {
    if (!Node.isIdentifier(node) || !isReferencePosition(node)) return
    const name = node.getText()
    if (referenced.has(name) || scopes.resolvesLocally(node, name)) return

    const definedAt = definitions.positions.get(name)
    if (definedAt !== undefined) {
      if (isDeferred(node) || definedAt <= node.getStart()) return
      referenced.add(name)
      return
    }
    if (BUILTINS.has(name)) return
    referenced.add(name)
  })

  return [...referenced]
}

function calleeName(call: CallExpression): string | undefined {
  const callee = call.getExpression()
  if (Node.isIdentifier(callee)) return callee.getText()
  if (Node.isPropertyAccessExpression(callee)) return callee.getName()
  return undefined
}

/** A literal path, or the last literal segment of `join(workdir, 'out.csv')`. */
function literalPath(node: Node): string | undefined {
  const literal = stringArgument(node)
  if (literal !== undefined || !Node.isCallExpression(node)) return literal
  const name = calleeName(node)
  if (!name || !PATH_BUILDERS.has(name)) return undefined
  const last = node.getArguments().at(-1)
  return last ? stringArgument(last) : undefined
}

/** `XLSX.writeFile(workbook, path)` takes the path second. */
function pathArgumentIndex(call: CallExpression, name: string): number {
  const callee = call.getExpression()
  if (name !== 'writeFile' || !Node.isPropertyAccessExpression(callee)) return 0
  return callee.getExpression().getText().toLowerCase() === 'xlsx' ? 1 : 0
}

/** Files passed by literal path to the fs and xlsx read and write calls. */
function collectDataFiles(sourceFile: SourceFile): { read: string[]; written: string[] } {
  const read = new Set<string>()
  const written = new Set<string>()
  sourceFile.forEachDescendant((node) => {
    if (!Node.isCallExpression(node)) return
    const name = calleeName(node)
    if (!name) return
    const argument = node.getArguments()[pathArgumentIndex(node, name)]
    const path = argument ? literalPath(argument) : undefined
    if (path === undefined) return
    if (FILE_READERS.has(name)) read.add(path)
    else if (FILE_WRITERS.has(name)) written.add(path)
  })
  return { read: [...read], written: [...written] }
}

function countNodes(sourceFile: SourceFile): number {
  let count = 0
  sourceFile.forEachDescendant(() => {
    count++
  })
  return count
}

export function emptyAnalysis(language: string): AnalysisRecord {
  return {
    ok: true,
    language,
    imports: [],
    importBindings: [],
    variablesDefined: [],
    functionsDefined: [],
    referenced: [],
    filesRead: [],
    filesWritten: [],
    complexity: 0,
  }
}

export function normalizeLanguage(languageHint: string | undefined): string {
  const language = (languageHint ?? 'javascript').trim().toLowerCase()
  return language === 'js' ? 'javascript' : language
}

/**
 * Parses one block and extracts what it imports, defines and reads.
 *
 * Only JavaScript is analyzed; other languages yield an empty record. A syntax
 * error yields an {@link AnalysisError}, which callers treat as unknown dependencies.
 */
export function analyze(source: string, languageHint?: string): AnalysisResult {
  const language = normalizeLanguage(languageHint)
  if (!ANALYZED_LANGUAGES.has(language)) {
    return emptyAnalysis(language)
  }

  const sourceFile = parse(source)
  const syntaxError = findSyntaxError(sourceFile)
  if (syntaxError) {
    logger.debug('Block failed to parse', { message: syntaxError.message, line: syntaxError.line })
    return syntaxError
  }

  const { modules, bindings } = collectImports(sourceFile)
  const importLocals = new Set(bindings.map((binding) => binding.local))
  const { scopes, definitions } = collectDeclarations(sourceFile, importLocals)
  const referenced = collectReferences(sourceFile, scopes, definitions)
  const dataFiles = collectDataFiles(sourceFile)

  return {
    ok: true,
    language,
    imports: modules,
    importBindings: bindings,
    variablesDefined: definitions.variables,
    functionsDefined: definitions.functions,
    referenced,
    filesRead: dataFiles.read,
    filesWritten: dataFiles.written,
    complexity: countNodes(sourceFile),
  }
}

export interface RewrittenScript {
  code: string
  imports: string[]
  bindings: ImportBinding[]
}

interface TextEdit {
  start: number
  end: number
  text: string
}

function bindingStatement(binding: ImportBinding): string {
  const module = JSON.stringify(binding.module)
  const imported = JSON.stringify(binding.imported)
  return `var ${binding.local} = ${IMPORT_BINDING_HELPER}(${module}, ${imported});`
}

function importEdit(declaration: ImportDeclaration): TextEdit {
  const own = declarationBindings(declaration)
  const statements =
    own.length > 0
      ? own.map(bindingStatement).join(' ')
      : `${IMPORT_BINDING_HELPER}(${JSON.stringify(declaration.getModuleSpecifierValue())}, "*");`
  const lineBreaks = declaration.getText().split('\n').length - 1
  return { start: declaration.getStart(), end: declaration.getEnd(), text: statements + '\n'.repeat(lineBreaks) }
}

/** Top-level `let`/`const` become `var`, padded so columns stay put; classes become `var` assignments. */
function declarationEdits(sourceFile: SourceFile): TextEdit[] {
  const edits: TextEdit[] = []
  for (const statement of sourceFile.getStatements()) {
    if (Node.isVariableStatement(statement)) {
      const list = statement.getDeclarationList()
      const kind = list.getDeclarationKind()
      if (kind !== VariableDeclarationKind.Const && kind !== VariableDeclarationKind.Let) continue
      const start = list.getStart()
      edits.push({ start, end: start + kind.length, text: 'var'.padEnd(kind.length) })
      continue
    }
    if (Node.isClassDeclaration(statement)) {
      const name = statement.getName()
      if (!name) continue
      edits.push({ start: statement.getStart(), end: statement.getStart(), text: `var ${name} = ` })
      edits.push({ start: statement.getEnd(), end: statement.getEnd(), text: ';' })
    }
  }
  return edits
}

/**
 * Turns a block into a classic script that can run again and again in one
 * session context. `import` declarations become `__importBinding` calls and
 * top-level lexical declarations become `var`, so every top-level name lives
 * on the context's global object and a re-run never redeclares a binding.
 * Line numbers are preserved. Unparseable source is returned unchanged.
 */
export function rewriteForSession(source: string): RewrittenScript {
  const sourceFile = parse(source)
  if (findSyntaxError(sourceFile)) {
    return { code: source, imports: [], bindings: [] }
  }

  const { modules, bindings } = collectImports(sourceFile)
  const edits = [...sourceFile.getImportDeclarations().map(importEdit), ...declarationEdits(sourceFile)]
  edits.sort((left, right) => left.start - right.start)

  let code = source
  for (const edit of edits.reverse()) {
    code = code.slice(0, edit.start) + edit.text + code.slice(edit.end)
  }

  return { code, imports: modules, bindings }
}

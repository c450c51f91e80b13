import { readdir, readFile, stat } from 'node:fs/promises'
import { extname, join } from 'node:path'
import { formatWithOptions } from 'node:util'
import * as XLSX from 'xlsx'
import { DEFAULTS } from '@/executor/constants'
import { formatPreview } from '@/executor/session/snapshot'
import type { OutputArtifact, TableData } from '@/executor/types'

type StreamName = 'stdout' | 'stderr'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function limitRows(columns: string[], rows: unknown[][]): TableData {
  return { columns, rows: rows.slice(0, DEFAULTS.TABLE_PREVIEW_ROWS), totalRows: rows.length }
}

/** Table for an array of records; columns are the union of keys in first-seen order. */
export function tableFromRecords(records: unknown): TableData | undefined {
  if (!Array.isArray(records) || records.length === 0 || !records.every(isRecord)) return undefined

  const columns: string[] = []
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!columns.includes(key)) columns.push(key)
    }
  }
  return limitRows(
    columns,
    records.map((record) => columns.map((column) => record[column]))
  )
}

/** First row is the header. Cells stay as text. */
export function tableFromCsv(text: string): TableData {
  const workbook = XLSX.read(text, { type: 'string', raw: true })
  const [firstSheet] = workbook.SheetNames
  const sheet = firstSheet ? workbook.Sheets[firstSheet] : undefined
  if (!sheet) return { columns: [], rows: [], totalRows: 0 }

  const [header = [], ...rows] = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    blankrows: false,
  })
  return limitRows(
    header.map((cell) => String(cell)),
    rows
  )
}

export function toBase64(data: string | Uint8Array): string {
  return typeof data === 'string' ? data : Buffer.from(data).toString('base64')
}

/**
 * Collects console output and display artifacts of one execution, in the
 * order they were produced.
 */
export class OutputCapture {
  private readonly streams: Record<StreamName, string> = { stdout: '', stderr: '' }
  private readonly artifacts: OutputArtifact[] = []

  get stdout(): string {
    return this.streams.stdout
  }

  get stderr(): string {
    return this.streams.stderr
  }

  write(stream: StreamName, args: unknown[]): void {
    this.streams[stream] += `${formatWithOptions({ colors: false }, ...args)}\n`
  }

  push(artifact: OutputArtifact): void {
    this.artifacts.push(artifact)
  }

  /** Displays a value: arrays of records become tables, anything else its preview text. */
  display(value: unknown): void {
    const table = tableFromRecords(value)
    if (table) {
      this.push({ type: 'table', ...table })
      return
    }
    this.push({ type: 'display', text: formatPreview(value, Number.POSITIVE_INFINITY) })
  }

  createConsole() {
    const toStdout = (...args: unknown[]) => this.write('stdout', args)
    const toStderr = (...args: unknown[]) => this.write('stderr', args)
    return {
      log: toStdout,
      info: toStdout,
      debug: toStdout,
      warn: toStderr,
      error: toStderr,
      table: (data: unknown) => this.display(data),
    }
  }

  createDisplay() {
    return Object.assign((value: unknown) => this.display(value), {
      html: (html: string) => this.push({ type: 'html', html: String(html) }),
      png: (data: string | Uint8Array) => this.push({ type: 'png', data: toBase64(data) }),
      table: (records: unknown) => {
        const table = tableFromRecords(records)
        if (table) this.push({ type: 'table', ...table })
        else this.display(records)
      },
    })
  }

  /** Streams first, then artifacts in production order. */
  toOutputs(): OutputArtifact[] {
    const outputs: OutputArtifact[] = []
    if (this.streams.stdout) outputs.push({ type: 'stream', name: 'stdout', text: this.streams.stdout })
    if (this.streams.stderr) outputs.push({ type: 'stream', name: 'stderr', text: this.streams.stderr })
    return [...outputs, ...this.artifacts]
  }
}

export type DirectorySnapshot = Map<string, number>

/** Modification times of the regular files directly inside `dir`. */
export async function snapshotDirectory(dir: string): Promise<DirectorySnapshot> {
  const snapshot: DirectorySnapshot = new Map()
  const entries = await readdir(dir, { withFileTypes: true })
  for (const entry of entries) {
    if (!entry.isFile()) continue
    const info = await stat(join(dir, entry.name))
    snapshot.set(entry.name, info.mtimeMs)
  }
  return snapshot
}

const FILE_ARTIFACT_TYPES: Record<string, 'png' | 'table' | 'html'> = {
  '.png': 'png',
  '.csv': 'table',
  '.html': 'html',
  '.htm': 'html',
}

/** Artifacts for files created or modified since `before`, ordered by file name. */
export async function collectFileArtifacts(
  dir: string,
  before: DirectorySnapshot
): Promise<OutputArtifact[]> {
  const after = await snapshotDirectory(dir)
  const changed = [...after.entries()]
    .filter(([name, mtime]) => before.get(name) !== mtime)
    .map(([name]) => name)
    .sort()

  const artifacts: OutputArtifact[] = []
  for (const filename of changed) {
    const type = FILE_ARTIFACT_TYPES[extname(filename).toLowerCase()]
    if (!type) continue
    const path = join(dir, filename)

    if (type === 'png') {
      artifacts.push({ type: 'png', data: (await readFile(path)).toString('base64'), filename })
    } else if (type === 'table') {
      artifacts.push({ type: 'table', filename, ...tableFromCsv(await readFile(path, 'utf8')) })
    } else {
      artifacts.push({ type: 'html', html: await readFile(path, 'utf8'), filename })
    }
  }
  return artifacts
}

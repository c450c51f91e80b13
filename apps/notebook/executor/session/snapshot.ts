import { inspect, types } from 'node:util'
import { DEFAULTS } from '@/executor/constants'
import type { VariableSnapshot } from '@/executor/types'

export function describeType(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return `Array(${value.length})`
  if (typeof value === 'function') return value.name ? `function ${value.name}` : 'function'
  if (typeof value !== 'object') return typeof value
  if (types.isMap(value)) return `Map(${value.size})`
  if (types.isSet(value)) return `Set(${value.size})`
  const name = value.constructor?.name
  return typeof name === 'string' && name.length > 0 ? name : 'Object'
}

export function formatPreview(value: unknown, maxLength: number = DEFAULTS.VARIABLE_PREVIEW_LENGTH): string {
  const text = inspect(value, { depth: 2, breakLength: Number.POSITIVE_INFINITY, maxArrayLength: 20 })
  return text.length > maxLength ? `${text.slice(0, maxLength - 3)}...` : text
}

export function describeVariable(name: string, value: unknown): VariableSnapshot {
  return { name, type: describeType(value), preview: formatPreview(value) }
}

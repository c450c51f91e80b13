import { analyze } from '@/executor/analysis/static-analyzer'
import type { AnalysisResult } from '@/executor/types'

interface CacheEntry {
  source: string
  language: string
  result: AnalysisResult
}

export interface AnalysisCache {
  /** Analysis of `source`, recomputed only when the block's source or language changed. */
  get(blockId: string, source: string, language: string): AnalysisResult
  invalidate(blockId: string): void
  clear(): void
  readonly size: number
}

export function createAnalysisCache(analyzeFn: typeof analyze = analyze): AnalysisCache {
  const entries = new Map<string, CacheEntry>()

  return {
    get(blockId, source, language) {
      const cached = entries.get(blockId)
      if (cached && cached.source === source && cached.language === language) {
        return cached.result
      }
      const result = analyzeFn(source, language)
      entries.set(blockId, { source, language, result })
      return result
    },
    invalidate(blockId) {
      entries.delete(blockId)
    },
    clear() {
      entries.clear()
    },
    get size() {
      return entries.size
    },
  }
}

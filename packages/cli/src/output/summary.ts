import type { MakeSummary, SummaryKey } from '@kiln/kernel'
import { outcomeColor, t } from './theme.js'

export interface SummaryJson {
  readonly total: number
  readonly updated: number
  readonly skip: number
  readonly fail: number
  readonly discard: number
  /** Outcome per rule name. */
  readonly rules: Record<string, SummaryKey>
}

export function summaryToJson(summary: MakeSummary, nameOf: (id: number) => string): SummaryJson {
  const rules: Record<string, SummaryKey> = {}
  for (const [id, key] of summary.detail) {
    rules[nameOf(id)] = key
  }
  return {
    total: summary.total,
    updated: summary.updated,
    skip: summary.skip,
    fail: summary.fail,
    discard: summary.discard,
    rules,
  }
}

/**
 * renderSummary: the closing line of a build.
 *
 *   4 rules: 2 updated, 1 up to date, 1 failed, 0 discarded
 */
export function renderSummary(summary: MakeSummary, dryRun: boolean): string {
  const count = (key: SummaryKey, n: number, label: string): string =>
    n === 0 ? t.dim(`${n} ${label}`) : outcomeColor(key)(`${n} ${label}`)

  return (
    '\n  ' +
    t.white(`${summary.total} ${summary.total === 1 ? 'rule' : 'rules'}`) + t.dim(': ') +
    count('update', summary.updated, dryRun ? 'to update' : 'updated') + t.dim(', ') +
    count('skip', summary.skip, 'up to date') + t.dim(', ') +
    count('fail', summary.fail, 'failed') + t.dim(', ') +
    count('discard', summary.discard, 'discarded')
  )
}

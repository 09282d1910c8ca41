import { mkdirSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'
import { stringify } from 'csv-stringify/sync'
import type { RankedEntry } from '../analysis'
import { formatCents } from './format'

/**
 * Serializes a ranking with the columns `rank,<keyLabel>,revenue`.
 *
 * @example
 * ```typescript
 * formatRankingCsv('customer', [{ rank: 1, key: 'Acme', revenueCents: 123450, quantity: 3, orderCount: 2 }])
 * // 'rank,customer,revenue\n1,Acme,1234.50\n'
 * ```
 */
export function formatRankingCsv(
  keyLabel: string,
  entries: readonly RankedEntry[]
): string {
  return stringify(
    entries.map((entry) => [
      String(entry.rank),
      entry.key,
      formatCents(entry.revenueCents),
    ]),
    { header: true, columns: ['rank', keyLabel, 'revenue'] }
  )
}

export function writeRankingCsv(
  path: string,
  keyLabel: string,
  entries: readonly RankedEntry[]
): void {
  mkdirSync(dirname(path), { recursive: true })
  writeFileSync(path, formatRankingCsv(keyLabel, entries), 'utf8')
}

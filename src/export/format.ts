/**
 * Text formatting helpers for reports.
 */

export { formatCents } from '../core/normalizers'

/**
 * Formats a percentage that is already on the 0-100 scale.
 */
export function formatPercent(value: number, decimals: number = 2): string {
  return `${value.toFixed(decimals)}%`
}

/**
 * Formats a signed change, e.g. `+12.50%`, or `n/a` when there is none.
 */
export function formatGrowth(value: number | null): string {
  if (value === null) return 'n/a'
  return `${value >= 0 ? '+' : ''}${value.toFixed(2)}%`
}

/**
 * Formats milliseconds to human-readable duration.
 */
export function formatDuration(ms: number): string {
  if (ms < 1) return `${(ms * 1000).toFixed(2)} μs`
  if (ms < 1000) return `${ms.toFixed(2)} ms`
  if (ms < 60000) return `${(ms / 1000).toFixed(2)} s`
  return `${(ms / 60000).toFixed(2)} min`
}

/**
 * Formats a custom/built-in time ratio, e.g. `3.20x`.
 */
export function formatRatio(value: number | null): string {
  return value === null ? 'n/a' : `${value.toFixed(2)}x`
}

/**
 * Underlines a heading with `char`, matching its length.
 */
export function heading(title: string, char: string = '-'): string[] {
  return [title, char.repeat(title.length)]
}

/**
 * Lays out rows as fixed-width text columns separated by two spaces.
 * Numeric-looking cells are right-aligned.
 */
export function generateTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length))
  )

  const render = (cells: string[]) =>
    cells
      .map((cell, column) =>
        /^[-+]?[\d.,]+(%|x| ms| μs| s| min)?$/.test(cell)
          ? cell.padStart(widths[column])
          : cell.padEnd(widths[column])
      )
      .join('  ')
      .trimEnd()

  return [
    render(headers),
    widths.map((width) => '-'.repeat(width)).join('  '),
    ...rows.map(render),
  ]
}

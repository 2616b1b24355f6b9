import { pickTimeUnit, TIME_UNIT_SCALE } from '../analyzer.ts'
import type { FlatProfile, FlatRow, FormatOptions, TraceMeta } from '../types.ts'

/**
 * Format a flat profile as a fixed-width text table
 *
 * ```
 * Profile - inst
 *      %     cum%         self        total  symbol
 *  75.00    75.00          300          400  parse
 *  25.00   100.00          100          400  main
 * ```
 */
export function formatFlat(
  profile: FlatProfile,
  options: FormatOptions = {}
): string {
  const { event = 'inst' } = options
  const { rows, meta } = profile

  const lines: string[] = []
  lines.push(`Profile - ${event}`)

  const useTime = rows.some((r) => r.selfTime !== undefined)
  if (useTime) {
    lines.push(...formatTimedRows(rows))
  } else {
    lines.push(
      `${'%'.padStart(6)} ${'cum%'.padStart(8)} ${'self'.padStart(12)} ${'total'.padStart(12)}  symbol`
    )
    for (const r of rows) {
      lines.push(`${formatCounts(r)}  ${r.symbol}`)
    }
  }

  lines.push(...formatMeta(meta))
  return lines.join('\n')
}

function formatTimedRows(rows: FlatRow[]): string[] {
  const maxSelf = rows.reduce((max, r) => Math.max(max, r.selfTime ?? 0), 0)
  const unit = pickTimeUnit(maxSelf)
  const scale = TIME_UNIT_SCALE[unit]

  const lines: string[] = []
  lines.push(
    `${'%'.padStart(6)} ${'cum%'.padStart(8)} ${'self'.padStart(12)} ${'total'.padStart(12)} ` +
      `${`self[${unit}]`.padStart(12)} ${`total[${unit}]`.padStart(12)}  symbol`
  )
  for (const r of rows) {
    const selfTime = ((r.selfTime ?? 0) * scale).toFixed(3).padStart(12)
    const totalTime = ((r.totalTime ?? 0) * scale).toFixed(3).padStart(12)
    lines.push(`${formatCounts(r)} ${selfTime} ${totalTime}  ${r.symbol}`)
  }
  return lines
}

function formatCounts(r: FlatRow): string {
  return (
    `${r.percent.toFixed(2).padStart(6)} ${r.cumPercent.toFixed(2).padStart(8)} ` +
    `${String(r.selfCount).padStart(12)} ${String(r.totalCount).padStart(12)}`
  )
}

function formatMeta(meta: TraceMeta): string[] {
  const lines = [`total_samples: ${meta.totalSamples}`]
  if (meta.clkMhz !== undefined) lines.push(`clk_mhz: ${meta.clkMhz}`)
  if (meta.totalTimeS !== undefined) lines.push(`total_time_s: ${meta.totalTimeS}`)
  return lines
}

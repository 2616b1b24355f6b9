import type {
  CombinedFormatOptions,
  CombinedMeta,
  CombinedProfile
} from '../types.ts'

/**
 * Format a merged two-trace profile, one row per symbol with IPC and CPI.
 * Undefined ratios are left blank.
 */
export function formatCombined(
  profile: CombinedProfile,
  options: CombinedFormatOptions = {}
): string {
  const { primaryEvent = 'inst', secondaryEvent = 'cyc' } = options
  const p = primaryEvent
  const s = secondaryEvent

  const lines: string[] = []
  lines.push(`Profile - combined (${p} + ${s})`)
  lines.push(
    `${`${p}%`.padStart(7)} ${`${s}%`.padStart(7)} ` +
      `${`${p}_self`.padStart(10)} ${`${p}_tot`.padStart(10)} ` +
      `${`${s}_self`.padStart(10)} ${`${s}_tot`.padStart(10)} ` +
      `${'ipc'.padStart(8)} ${'cpi'.padStart(8)}  symbol`
  )

  for (const r of profile.rows) {
    lines.push(
      `${r.primaryPercent.toFixed(2).padStart(7)} ${r.secondaryPercent.toFixed(2).padStart(7)} ` +
        `${String(r.primarySelf).padStart(10)} ${String(r.primaryTotal).padStart(10)} ` +
        `${String(r.secondarySelf).padStart(10)} ${String(r.secondaryTotal).padStart(10)} ` +
        `${formatRatio(r.ipc)} ${formatRatio(r.cpi)}  ${r.symbol}`
    )
  }

  lines.push(...formatCombinedMeta(profile.meta))
  return lines.join('\n')
}

function formatRatio(value: number | undefined): string {
  return (value === undefined ? '' : value.toFixed(3)).padStart(8)
}

function formatCombinedMeta(meta: CombinedMeta): string[] {
  const entries: Array<[string, number | undefined]> = [
    ['total_instructions', meta.totalPrimary],
    ['total_cycles', meta.totalSecondary],
    ['CPI', meta.cpi],
    ['IPC', meta.ipc],
    ['clk_mhz', meta.clkMhz],
    ['total_time_s', meta.totalTimeS]
  ]
  const lines: string[] = []
  for (const [key, value] of entries) {
    if (value !== undefined) lines.push(`${key}: ${value}`)
  }
  return lines
}

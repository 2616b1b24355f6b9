import { compareSymbols, filterRows } from './analyzer.ts'
import type {
  CombinedMeta,
  CombinedProfile,
  CombinedRow,
  FilterOptions,
  FlatProfile,
  FlatRow
} from './types.ts'

function ratio(numerator: number, denominator: number): number | undefined {
  return denominator > 0 ? numerator / denominator : undefined
}

/**
 * Join two flat profiles of the same execution on symbol name.
 *
 * `primary` is conventionally retired instructions and `secondary` cycles;
 * rows are ranked by the secondary trace. A symbol missing from one side gets
 * zeros for that side, which reads the same as a real zero count.
 *
 * Both inputs must be unfiltered: filtering happens here, after the join, so
 * that symbols near the threshold still see both sides.
 */
export function combineProfiles(
  primary: FlatProfile,
  secondary: FlatProfile,
  options: FilterOptions = {}
): CombinedProfile {
  const primaryBySymbol = new Map<string, FlatRow>()
  for (const row of primary.rows) primaryBySymbol.set(row.symbol, row)
  const secondaryBySymbol = new Map<string, FlatRow>()
  for (const row of secondary.rows) secondaryBySymbol.set(row.symbol, row)

  const symbols = new Set([...primaryBySymbol.keys(), ...secondaryBySymbol.keys()])

  const combined: CombinedRow[] = []
  for (const symbol of symbols) {
    const p = primaryBySymbol.get(symbol)
    const s = secondaryBySymbol.get(symbol)
    const primaryTotal = p?.totalCount ?? 0
    const secondaryTotal = s?.totalCount ?? 0

    const row: CombinedRow = {
      symbol,
      primarySelf: p?.selfCount ?? 0,
      primaryTotal,
      primaryPercent: p?.percent ?? 0,
      secondarySelf: s?.selfCount ?? 0,
      secondaryTotal,
      secondaryPercent: s?.percent ?? 0
    }
    // each ratio has its own guard; one may exist without the other
    const ipc = ratio(primaryTotal, secondaryTotal)
    if (ipc !== undefined) row.ipc = ipc
    const cpi = ratio(secondaryTotal, primaryTotal)
    if (cpi !== undefined) row.cpi = cpi
    combined.push(row)
  }

  combined.sort(
    (a, b) =>
      b.secondaryPercent - a.secondaryPercent || compareSymbols(a.symbol, b.symbol)
  )

  const rows = filterRows(combined, options, (row) => row.secondaryPercent)

  const totalPrimary = primary.meta.totalSamples
  const totalSecondary = secondary.meta.totalSamples
  const meta: CombinedMeta = { totalPrimary, totalSecondary }
  const cpi = ratio(totalSecondary, totalPrimary)
  if (cpi !== undefined) meta.cpi = cpi
  const ipc = ratio(totalPrimary, totalSecondary)
  if (ipc !== undefined) meta.ipc = ipc
  if (secondary.meta.clkMhz !== undefined) meta.clkMhz = secondary.meta.clkMhz
  if (secondary.meta.totalTimeS !== undefined) meta.totalTimeS = secondary.meta.totalTimeS

  return { rows, meta }
}

import { EmptyTraceError, MalformedLineError, NoSamplesError } from './errors.ts'
import { parseFoldedLine } from './parser.ts'
import type {
  BuildOptions,
  FilterOptions,
  FlatProfile,
  FlatRow,
  SymbolCounts,
  TimeUnit,
  TraceMeta
} from './types.ts'

function addCount(counts: Map<string, number>, symbol: string, value: number): number {
  const sum = (counts.get(symbol) ?? 0) + value
  counts.set(symbol, sum)
  return sum
}

/**
 * Fold the lines of one trace into self and total counts per symbol.
 *
 * Every stack position adds to the total, so a recursive frame is counted
 * once per level it appears at.
 */
export function accumulate(lines: Iterable<string>, source?: string): SymbolCounts {
  const selfCounts = new Map<string, number>()
  const totalCounts = new Map<string, number>()
  let totalSamples = 0
  let lineNumber = 0

  for (const line of lines) {
    lineNumber++
    const sample = parseFoldedLine(line, { source, lineNumber })
    if (sample === null) continue

    const { frames, count } = sample
    totalSamples += count
    let exact = Number.isSafeInteger(totalSamples)
    exact = Number.isSafeInteger(addCount(selfCounts, frames[frames.length - 1], count)) && exact
    for (const frame of frames) {
      exact = Number.isSafeInteger(addCount(totalCounts, frame, count)) && exact
    }
    // sums past 2^53 are no longer exact
    if (!exact) {
      throw new MalformedLineError(
        `sample total exceeds ${Number.MAX_SAFE_INTEGER}`,
        line,
        { source, lineNumber }
      )
    }
  }

  if (totalSamples <= 0) {
    throw new EmptyTraceError(totalSamples, source)
  }

  return { selfCounts, totalCounts, totalSamples }
}

export function compareSymbols(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

/**
 * Rank symbols by self count and annotate them with percentages and,
 * when a clock frequency is known, times in seconds
 */
export function buildFlat(
  counts: SymbolCounts,
  options: BuildOptions = {}
): FlatProfile {
  const { selfCounts, totalCounts, totalSamples } = counts
  if (!(totalSamples > 0)) {
    throw new NoSamplesError(totalSamples)
  }

  const ranked = Array.from(selfCounts, ([symbol, selfCount]) => ({
    symbol,
    selfCount,
    totalCount: totalCounts.get(symbol) ?? 0
  }))
  ranked.sort(
    (a, b) => b.selfCount - a.selfCount || compareSymbols(a.symbol, b.symbol)
  )

  // clock in MHz -> events per second
  const { clkMhz } = options
  const denom = clkMhz !== undefined && clkMhz > 0 ? clkMhz * 1e6 : undefined

  const rows: FlatRow[] = []
  let cumPercent = 0
  for (const { symbol, selfCount, totalCount } of ranked) {
    const percent = (selfCount / totalSamples) * 100
    cumPercent += percent
    const row: FlatRow = { symbol, selfCount, totalCount, percent, cumPercent }
    if (denom !== undefined) {
      row.selfTime = selfCount / denom
      row.totalTime = totalCount / denom
    }
    rows.push(row)
  }

  const meta: TraceMeta = { totalSamples }
  if (clkMhz !== undefined && denom !== undefined) {
    meta.clkMhz = clkMhz
    meta.totalTimeS = totalSamples / denom
  }

  return { rows, meta }
}

/**
 * Keep rows at or above a self-percentage threshold, then the first `top`
 * of those. Order is preserved.
 */
export function filterRows<T>(
  rows: readonly T[],
  options: FilterOptions,
  percentOf: (row: T) => number
): T[] {
  const { top, thrPercent } = options
  let out = rows.slice()
  if (thrPercent !== undefined) {
    out = out.filter((row) => percentOf(row) >= thrPercent)
  }
  if (top !== undefined) {
    out = out.slice(0, Math.max(0, Math.trunc(top)))
  }
  return out
}

export function filterFlatRows(
  rows: readonly FlatRow[],
  options: FilterOptions = {}
): FlatRow[] {
  return filterRows(rows, options, (row) => row.percent)
}

/**
 * Pick one display unit for a duration in seconds
 */
export function pickTimeUnit(seconds: number): TimeUnit {
  if (seconds < 1e-3) return 'us'
  if (seconds < 1.0) return 'ms'
  return 's'
}

export const TIME_UNIT_SCALE: Record<TimeUnit, number> = {
  us: 1e6,
  ms: 1e3,
  s: 1
}

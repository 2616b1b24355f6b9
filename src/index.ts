// Main library exports
export { parseFoldedLine, readTrace, splitLines } from './parser.ts'
export {
  accumulate,
  buildFlat,
  filterRows,
  filterFlatRows,
  pickTimeUnit
} from './analyzer.ts'
export { combineProfiles } from './merger.ts'
export {
  formatFlat,
  formatCombined,
  formatCsv,
  writeCsv,
  formatSignificant,
  renderBarChart,
  writeBarChart,
  formatPercentLabel
} from './formatter/index.ts'
export {
  FlatProfError,
  MalformedLineError,
  EmptyTraceError,
  NoSamplesError,
  TraceNotFoundError,
  InvalidOptionsError
} from './errors.ts'
export type { ErrorCode } from './errors.ts'
export type {
  ParsedSample,
  SymbolCounts,
  FlatRow,
  TraceMeta,
  FlatProfile,
  CombinedRow,
  CombinedMeta,
  CombinedProfile,
  BuildOptions,
  FilterOptions,
  TimeUnit
} from './types.ts'

import { isFile, readTrace } from './parser.ts'
import { accumulate, buildFlat, filterFlatRows } from './analyzer.ts'
import { combineProfiles } from './merger.ts'
import { formatFlat, formatCombined } from './formatter/index.ts'
import { TraceNotFoundError } from './errors.ts'
import type {
  BuildOptions,
  CombinedProfile,
  FilterOptions,
  FlatProfile
} from './types.ts'

export interface ConvertOptions extends FilterOptions {
  event?: string
  clkMhz?: number
  secondTrace?: string
  secondEvent?: string
  secondClkMhz?: number
  // post-merge threshold on the second trace's self percentage
  secondThrPercent?: number
}

export type Report =
  | { kind: 'flat'; event: string; profile: FlatProfile }
  | {
      kind: 'combined'
      primaryEvent: string
      secondaryEvent: string
      profile: CombinedProfile
    }

/**
 * Build the unfiltered flat profile of one trace file
 */
export function profileTrace(path: string, options: BuildOptions = {}): FlatProfile {
  return buildFlat(accumulate(readTrace(path), path), options)
}

/**
 * Build a report for one trace, or for a trace merged with a second one.
 * Both paths are checked before either file is parsed.
 */
export function generateReport(
  tracePath: string,
  options: ConvertOptions = {}
): Report {
  const {
    event = 'inst',
    clkMhz,
    top,
    thrPercent,
    secondTrace,
    secondEvent = 'cyc',
    secondClkMhz,
    secondThrPercent
  } = options

  for (const path of [tracePath, secondTrace]) {
    if (path !== undefined && !isFile(path)) {
      throw new TraceNotFoundError(path)
    }
  }

  const primary = profileTrace(tracePath, { clkMhz })

  if (secondTrace === undefined) {
    return {
      kind: 'flat',
      event,
      profile: {
        rows: filterFlatRows(primary.rows, { top, thrPercent }),
        meta: primary.meta
      }
    }
  }

  const secondary = profileTrace(secondTrace, { clkMhz: secondClkMhz })
  return {
    kind: 'combined',
    primaryEvent: event,
    secondaryEvent: secondEvent,
    profile: combineProfiles(primary, secondary, {
      top,
      thrPercent: secondThrPercent
    })
  }
}

export function formatReport(report: Report): string {
  switch (report.kind) {
    case 'flat':
      return formatFlat(report.profile, { event: report.event })
    case 'combined':
      return formatCombined(report.profile, {
        primaryEvent: report.primaryEvent,
        secondaryEvent: report.secondaryEvent
      })
  }
}

/**
 * Turn a folded trace (and optionally a second one) into a text report.
 * Main entry point for programmatic usage
 */
export function convert(tracePath: string, options: ConvertOptions = {}): string {
  return formatReport(generateReport(tracePath, options))
}

export interface ParsedSample {
  frames: string[]
  count: number
}

export interface LineLocation {
  source?: string
  lineNumber?: number
}

export interface SymbolCounts {
  selfCounts: Map<string, number>
  totalCounts: Map<string, number>
  totalSamples: number
}

export interface FlatRow {
  symbol: string
  // samples where the symbol is the leaf frame
  selfCount: number
  // samples where the symbol appears anywhere, once per stack position
  totalCount: number
  percent: number
  cumPercent: number
  selfTime?: number
  totalTime?: number
}

export interface TraceMeta {
  totalSamples: number
  clkMhz?: number
  totalTimeS?: number
}

export interface FlatProfile {
  rows: FlatRow[]
  meta: TraceMeta
}

export interface CombinedRow {
  symbol: string
  primarySelf: number
  primaryTotal: number
  primaryPercent: number
  secondarySelf: number
  secondaryTotal: number
  secondaryPercent: number
  ipc?: number
  cpi?: number
}

export interface CombinedMeta {
  totalPrimary: number
  totalSecondary: number
  cpi?: number
  ipc?: number
  clkMhz?: number
  totalTimeS?: number
}

export interface CombinedProfile {
  rows: CombinedRow[]
  meta: CombinedMeta
}

export interface BuildOptions {
  clkMhz?: number
}

export interface FilterOptions {
  top?: number
  thrPercent?: number
}

export type TimeUnit = 'us' | 'ms' | 's'

export interface FormatOptions {
  event?: string
}

export interface CombinedFormatOptions {
  primaryEvent?: string
  secondaryEvent?: string
}

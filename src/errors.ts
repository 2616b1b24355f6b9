import type { LineLocation } from './types.ts'

export type ErrorCode =
  | 'MALFORMED_LINE'
  | 'EMPTY_TRACE'
  | 'NO_SAMPLES'
  | 'TRACE_NOT_FOUND'
  | 'INVALID_OPTIONS'

/**
 * Base class for every error the profile pipeline raises.
 * None of them is recoverable: the current report is abandoned.
 */
export class FlatProfError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string) {
    super(message)
    this.name = 'FlatProfError'
    this.code = code
  }
}

export class MalformedLineError extends FlatProfError {
  readonly line: string
  readonly source?: string
  readonly lineNumber?: number

  constructor(reason: string, line: string, location: LineLocation = {}) {
    super('MALFORMED_LINE', `${reason}: ${JSON.stringify(line)}${formatLocation(location)}`)
    this.name = 'MalformedLineError'
    this.line = line
    this.source = location.source
    this.lineNumber = location.lineNumber
  }
}

export class EmptyTraceError extends FlatProfError {
  readonly source?: string

  constructor(totalSamples: number, source?: string) {
    const where = source ? ` in ${source}` : ''
    super('EMPTY_TRACE', `trace has no samples${where} (total samples: ${totalSamples})`)
    this.name = 'EmptyTraceError'
    this.source = source
  }
}

export class NoSamplesError extends FlatProfError {
  constructor(totalSamples: number) {
    super('NO_SAMPLES', `no samples (total samples: ${totalSamples})`)
    this.name = 'NoSamplesError'
  }
}

export class TraceNotFoundError extends FlatProfError {
  readonly path: string

  constructor(path: string) {
    super('TRACE_NOT_FOUND', `trace not found: ${path}`)
    this.name = 'TraceNotFoundError'
    this.path = path
  }
}

export class InvalidOptionsError extends FlatProfError {
  readonly issues: string[]

  constructor(issues: string[]) {
    super('INVALID_OPTIONS', `invalid options: ${issues.join('; ')}`)
    this.name = 'InvalidOptionsError'
    this.issues = issues
  }
}

function formatLocation(location: LineLocation): string {
  if (location.source === undefined && location.lineNumber === undefined) return ''
  const source = location.source ?? '<input>'
  return location.lineNumber === undefined
    ? ` (${source})`
    : ` (${source}:${location.lineNumber})`
}

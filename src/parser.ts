import { readFileSync, statSync } from 'node:fs'
import { MalformedLineError, TraceNotFoundError } from './errors.ts'
import type { LineLocation, ParsedSample } from './types.ts'

const COUNT_PATTERN = /^[+-]?\d+$/

/**
 * Parse one folded-stack line such as `_start;main;Proc0 80000018`.
 *
 * Returns null for blank lines. The count is the token after the last run
 * of whitespace, so frame names may themselves contain spaces.
 */
export function parseFoldedLine(
  line: string,
  location?: LineLocation
): ParsedSample | null {
  const trimmed = line.trim()
  if (trimmed === '') return null

  const match = /^([\s\S]*?)\s+(\S+)$/.exec(trimmed)
  if (!match) {
    throw new MalformedLineError('bad line (missing count)', line, location)
  }
  const [, stack, countToken] = match

  if (!COUNT_PATTERN.test(countToken)) {
    throw new MalformedLineError(
      `bad count ${JSON.stringify(countToken)}`,
      line,
      location
    )
  }
  const count = Number.parseInt(countToken, 10)
  if (!Number.isSafeInteger(count)) {
    throw new MalformedLineError(
      `count ${JSON.stringify(countToken)} exceeds ${Number.MAX_SAFE_INTEGER}`,
      line,
      location
    )
  }

  const frames = stack.split(';').filter((frame) => frame !== '')
  if (frames.length === 0) {
    throw new MalformedLineError('bad line (no frames)', line, location)
  }

  return { frames, count }
}

/**
 * Read a folded trace from disk and split it into lines
 */
export function readTrace(path: string): string[] {
  if (!isFile(path)) {
    throw new TraceNotFoundError(path)
  }
  return splitLines(readFileSync(path, 'utf-8'))
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/)
}

export function isFile(path: string): boolean {
  const stats = statSync(path, { throwIfNoEntry: false })
  return stats !== undefined && stats.isFile()
}

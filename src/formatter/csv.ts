import { mkdirSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'
import type { FlatRow } from '../types.ts'

const CSV_HEADER = [
  'symbol',
  'percent',
  'cum_percent',
  'self_count',
  'total_count',
  'self_time_s',
  'total_time_s'
]

/**
 * Format a number with `digits` significant digits, trailing zeros removed,
 * switching to exponent notation for very small or very large values
 * (`%.12g` for digits = 12).
 */
export function formatSignificant(value: number, digits: number): string {
  if (value === 0) return '0'
  if (!Number.isFinite(value)) return String(value)

  const [mantissa, exponentText] = value.toExponential(digits - 1).split('e')
  const exponent = Number(exponentText)

  if (exponent < -4 || exponent >= digits) {
    const sign = exponent < 0 ? '-' : '+'
    const magnitude = String(Math.abs(exponent)).padStart(2, '0')
    return `${stripZeros(mantissa)}e${sign}${magnitude}`
  }
  return stripZeros(value.toFixed(digits - 1 - exponent))
}

function stripZeros(text: string): string {
  if (!text.includes('.')) return text
  return text.replace(/0+$/, '').replace(/\.$/, '')
}

function escapeField(field: string): string {
  if (/[",\r\n]/.test(field)) {
    return `"${field.replace(/"/g, '""')}"`
  }
  return field
}

function formatTime(seconds: number | undefined): string {
  return seconds === undefined ? '' : formatSignificant(seconds, 12)
}

/**
 * Format flat rows as CSV, one record per row, CRLF-terminated
 */
export function formatCsv(rows: readonly FlatRow[]): string {
  const records = [CSV_HEADER]
  for (const r of rows) {
    records.push([
      r.symbol,
      r.percent.toFixed(6),
      r.cumPercent.toFixed(6),
      String(r.selfCount),
      String(r.totalCount),
      formatTime(r.selfTime),
      formatTime(r.totalTime)
    ])
  }
  return records.map((fields) => fields.map(escapeField).join(',') + '\r\n').join('')
}

export function writeCsv(rows: readonly FlatRow[], path: string): void {
  mkdirSync(dirname(path), { recursive: true })
  writeFileSync(path, formatCsv(rows), 'utf-8')
}

import { mkdirSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'
import type { FlatRow } from '../types.ts'

const BAR_COLOR = '#7ed3ab'
const ROW_HEIGHT = 24
const BAR_HEIGHT = 16
const TITLE_HEIGHT = 40
const AXIS_HEIGHT = 36
const BAR_AREA_WIDTH = 420
const LABEL_PADDING = 12
const VALUE_AREA_WIDTH = 64
const CHAR_WIDTH = 7
const MAX_LABEL_WIDTH = 360

/**
 * Bar label for a self percentage: tiny but non-zero shares read `<1.0%`
 */
export function formatPercentLabel(percent: number): string {
  if (percent > 0 && percent < 1.0) return '<1.0%'
  return `${percent.toFixed(1)}%`
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')
}

function px(value: number): string {
  return String(Math.round(value * 10) / 10)
}

/**
 * Render ranked rows as an SVG horizontal bar chart of self percentage.
 * The first row is drawn at the top.
 */
export function renderBarChart(rows: readonly FlatRow[], title: string): string {
  const longest = rows.reduce((max, r) => Math.max(max, r.symbol.length), 0)
  const labelWidth = Math.min(MAX_LABEL_WIDTH, longest * CHAR_WIDTH) + LABEL_PADDING
  const width = labelWidth + BAR_AREA_WIDTH + VALUE_AREA_WIDTH
  const plotHeight = Math.max(1, rows.length) * ROW_HEIGHT
  const height = TITLE_HEIGHT + plotHeight + AXIS_HEIGHT

  const maxPercent = rows.reduce((max, r) => Math.max(max, r.percent), 0)
  const scale = maxPercent > 0 ? BAR_AREA_WIDTH / maxPercent : 0

  const parts: string[] = []
  parts.push(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${px(width)}" height="${px(height)}" viewBox="0 0 ${px(width)} ${px(height)}" font-family="sans-serif" font-size="12">`
  )
  parts.push(`  <rect width="100%" height="100%" fill="#ffffff"/>`)
  parts.push(
    `  <text x="${px(width / 2)}" y="24" text-anchor="middle" font-size="14" font-weight="bold">${escapeXml(title)}</text>`
  )

  rows.forEach((r, i) => {
    const top = TITLE_HEIGHT + i * ROW_HEIGHT
    const barWidth = r.percent * scale
    const textY = top + ROW_HEIGHT / 2 + 4
    parts.push(
      `  <text x="${px(labelWidth - 6)}" y="${px(textY)}" text-anchor="end">${escapeXml(r.symbol)}</text>`
    )
    parts.push(
      `  <rect x="${px(labelWidth)}" y="${px(top + (ROW_HEIGHT - BAR_HEIGHT) / 2)}" width="${px(barWidth)}" height="${BAR_HEIGHT}" fill="${BAR_COLOR}"/>`
    )
    parts.push(
      `  <text x="${px(labelWidth + barWidth + 3)}" y="${px(textY)}">${escapeXml(formatPercentLabel(r.percent))}</text>`
    )
  })

  const axisY = TITLE_HEIGHT + plotHeight
  parts.push(
    `  <line x1="${px(labelWidth)}" y1="${px(axisY)}" x2="${px(labelWidth + BAR_AREA_WIDTH)}" y2="${px(axisY)}" stroke="#555555"/>`
  )
  parts.push(
    `  <text x="${px(labelWidth + BAR_AREA_WIDTH / 2)}" y="${px(axisY + 24)}" text-anchor="middle">% of samples</text>`
  )
  parts.push('</svg>')

  return parts.join('\n') + '\n'
}

export function writeBarChart(
  rows: readonly FlatRow[],
  path: string,
  title: string
): void {
  mkdirSync(dirname(path), { recursive: true })
  writeFileSync(path, renderBarChart(rows, title), 'utf-8')
}

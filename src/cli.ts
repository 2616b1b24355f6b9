#!/usr/bin/env -S node --import tsx

import { readFileSync, writeFileSync } from 'node:fs'
import { extname } from 'node:path'
import { z } from 'zod'
import { generateReport, formatReport } from './index.ts'
import { writeCsv } from './formatter/csv.ts'
import { writeBarChart } from './formatter/chart.ts'
import { helpText, parseCliArgs, type CliOptions } from './options.ts'
import { TraceNotFoundError } from './errors.ts'


const packageSchema = z.object({ version: z.string() })

function fail(message: string, status: number = 1): never {
  console.error(`Error: ${message}`)
  process.exit(status)
}

function defaultChartPath(tracePath: string, event: string): string {
  const base = tracePath.slice(0, tracePath.length - extname(tracePath).length)
  return `${base}_flat_${event}.svg`
}

function run(options: CliOptions, tracePath: string): void {
  const report = generateReport(tracePath, {
    event: options.event,
    top: options.top,
    thrPercent: options.thrPercent,
    clkMhz: options.clkMhz,
    secondTrace: options.secondTrace,
    secondEvent: options.secondEvent,
    secondClkMhz: options.secondClkMhz,
    secondThrPercent: options.secondThrPercent
  })
  const output = formatReport(report)

  if (options.output) {
    writeFileSync(options.output, output + '\n', 'utf-8')
    console.error(`Output written to ${options.output}`)
  } else {
    console.log(output)
  }

  if (report.kind !== 'flat') return

  if (options.csv) {
    writeCsv(report.profile.rows, options.csv)
    console.error(`CSV written to ${options.csv}`)
  }

  if (options.plot) {
    const chartPath = options.chart ?? defaultChartPath(tracePath, report.event)
    writeBarChart(report.profile.rows, chartPath, `Profile - ${report.event}`)
    console.error(`Chart written to ${chartPath}`)
  }
}

function main(): void {
  let options: CliOptions
  try {
    options = parseCliArgs(process.argv.slice(2))
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : error}`)
    console.error('Use --help for usage information')
    process.exit(1)
  }

  if (options.help) {
    console.log(helpText)
    process.exit(0)
  }

  if (options.version) {
    const pkg = packageSchema.parse(
      JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'))
    )
    console.log(`flatprof v${pkg.version}`)
    process.exit(0)
  }

  const tracePath = options.trace
  if (tracePath === undefined) {
    console.error('Error: No trace file specified')
    console.error('Use --help for usage information')
    process.exit(1)
  }

  try {
    run(options, tracePath)
  } catch (error) {
    if (error instanceof TraceNotFoundError) {
      fail(error.message, 2)
    }
    fail(error instanceof Error ? error.message : String(error))
  }
}

main()

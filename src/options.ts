import { parseArgs } from 'node:util'
import { z, type ZodIssue } from 'zod'
import { InvalidOptionsError } from './errors.ts'

export const helpText = `
flatprof - Summarize folded call-stack traces into a flat profile

USAGE:
  flatprof [options] <trace>

OPTIONS:
  -e, --event <label>         Label of the trace, e.g. inst, cycle (default: inst)
  -p, --top <n>               Keep only the top N rows
      --thr <pct>             Keep only rows with self% >= pct
      --clk-mhz <f>           Clock in MHz; adds time columns
      --csv <file>            Write the flat profile as CSV
      --plot                  Write a bar chart (SVG) of self%
      --chart <file>          Chart path (default: <trace>_flat_<event>.svg)
  -s, --second-trace <file>   Second trace to merge, typically cycles
      --second-event <label>  Label of the second trace (default: cyc)
      --second-clk-mhz <f>    Clock in MHz for the second trace
      --second-thr <pct>      When merging, keep rows with second self% >= pct
                              (the merged summary keeps the keys total_instructions,
                              total_cycles, CPI and IPC whatever the event labels)
  -o, --output <file>         Output file (default: stdout)
  -h, --help                  Show this help message
  -v, --version               Show version

EXAMPLES:
  # Flat profile of an instruction trace
  flatprof callstack_folded_inst.txt

  # Cycle trace with times at 100 MHz, top 20 rows, CSV and chart
  flatprof -e cycle --clk-mhz 100 -p 20 --csv out/cycle.csv --plot callstack_folded_cycle.txt

  # Instructions merged with cycles, IPC and CPI per symbol
  flatprof -s callstack_folded_cycle.txt --second-clk-mhz 100 --second-thr 1 callstack_folded_inst.txt
`

const numberFlag = z
  .string()
  .trim()
  .regex(/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/, 'must be a number')
  .transform(Number)
  .refine(Number.isFinite, 'must be a finite number')

const integerFlag = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, 'must be an integer')
  .transform(Number)
  .refine(Number.isSafeInteger, 'must be a safe integer')

const pathFlag = z.string().min(1, 'must not be empty')

const labelFlag = z
  .string()
  .trim()
  .min(1, 'must not be empty')

const flagsSchema = z
  .object({
    event: labelFlag,
    top: integerFlag.optional(),
    thr: numberFlag.optional(),
    'clk-mhz': numberFlag.optional(),
    csv: pathFlag.optional(),
    plot: z.boolean(),
    chart: pathFlag.optional(),
    'second-trace': pathFlag.optional(),
    'second-event': labelFlag,
    'second-clk-mhz': numberFlag.optional(),
    'second-thr': numberFlag.optional(),
    output: pathFlag.optional(),
    help: z.boolean(),
    version: z.boolean()
  })
  .transform((flags) => ({
    event: flags.event,
    top: flags.top,
    thrPercent: flags.thr,
    clkMhz: flags['clk-mhz'],
    csv: flags.csv,
    plot: flags.plot,
    chart: flags.chart,
    secondTrace: flags['second-trace'],
    secondEvent: flags['second-event'],
    secondClkMhz: flags['second-clk-mhz'],
    secondThrPercent: flags['second-thr'],
    output: flags.output,
    help: flags.help,
    version: flags.version
  }))

export type CliFlags = z.output<typeof flagsSchema>

export interface CliOptions extends CliFlags {
  trace?: string
}

function formatIssue(issue: ZodIssue): string {
  const flag = issue.path.join('.')
  return flag ? `--${flag}: ${issue.message}` : issue.message
}

/**
 * Parse and validate command-line arguments (without the node/script prefix)
 */
export function parseCliArgs(argv: string[]): CliOptions {
  let parsed: ReturnType<typeof parseRawArgs>
  try {
    parsed = parseRawArgs(argv)
  } catch (error) {
    throw new InvalidOptionsError([
      error instanceof Error ? error.message : String(error)
    ])
  }

  const result = flagsSchema.safeParse(parsed.values)
  if (!result.success) {
    throw new InvalidOptionsError(result.error.issues.map(formatIssue))
  }

  if (parsed.positionals.length > 1) {
    throw new InvalidOptionsError([
      `expected a single trace path, got ${parsed.positionals.length}`
    ])
  }

  return { ...result.data, trace: parsed.positionals[0] }
}

function parseRawArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      event: { type: 'string', short: 'e', default: 'inst' },
      top: { type: 'string', short: 'p' },
      thr: { type: 'string' },
      'clk-mhz': { type: 'string' },
      csv: { type: 'string' },
      plot: { type: 'boolean', default: false },
      chart: { type: 'string' },
      'second-trace': { type: 'string', short: 's' },
      'second-event': { type: 'string', default: 'cyc' },
      'second-clk-mhz': { type: 'string' },
      'second-thr': { type: 'string' },
      output: { type: 'string', short: 'o' },
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false }
    },
    allowPositionals: true
  })
}

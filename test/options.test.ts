import { test, describe } from 'node:test'
import assert from 'node:assert'
import { helpText, parseCliArgs } from '../src/options.ts'
import { InvalidOptionsError } from '../src/errors.ts'

function issuesOf(argv: string[]): string[] {
  try {
    parseCliArgs(argv)
  } catch (error) {
    assert.ok(error instanceof InvalidOptionsError)
    assert.strictEqual(error.code, 'INVALID_OPTIONS')
    return error.issues
  }
  assert.fail('expected parseCliArgs to throw')
}

describe('options', () => {
  test('parseCliArgs applies defaults', () => {
    assert.deepStrictEqual(parseCliArgs(['trace.folded']), {
      trace: 'trace.folded',
      event: 'inst',
      top: undefined,
      thrPercent: undefined,
      clkMhz: undefined,
      csv: undefined,
      plot: false,
      chart: undefined,
      secondTrace: undefined,
      secondEvent: 'cyc',
      secondClkMhz: undefined,
      secondThrPercent: undefined,
      output: undefined,
      help: false,
      version: false
    })
  })

  test('parseCliArgs converts numeric flags', () => {
    const options = parseCliArgs([
      '-e', 'cycle',
      '-p', '10',
      '--thr', '1.5',
      '--clk-mhz', '100',
      '-s', 'cycles.folded',
      '--second-clk-mhz', '2.5e2',
      '--second-thr=0.25',
      '--plot',
      'inst.folded'
    ])

    assert.strictEqual(options.trace, 'inst.folded')
    assert.strictEqual(options.event, 'cycle')
    assert.strictEqual(options.top, 10)
    assert.strictEqual(options.thrPercent, 1.5)
    assert.strictEqual(options.clkMhz, 100)
    assert.strictEqual(options.secondTrace, 'cycles.folded')
    assert.strictEqual(options.secondClkMhz, 250)
    assert.strictEqual(options.secondThrPercent, 0.25)
    assert.strictEqual(options.plot, true)
  })

  test('parseCliArgs accepts a negative top', () => {
    assert.strictEqual(parseCliArgs(['--top=-3', 'x']).top, -3)
  })

  test('parseCliArgs leaves the trace out when none is given', () => {
    assert.strictEqual(parseCliArgs(['--help']).trace, undefined)
    assert.strictEqual(parseCliArgs(['--help']).help, true)
  })

  test('parseCliArgs rejects values that are not numbers', () => {
    assert.deepStrictEqual(issuesOf(['--top', 'ten', 'x']), ['--top: must be an integer'])
    assert.deepStrictEqual(issuesOf(['--top', '2.5', 'x']), ['--top: must be an integer'])
    assert.deepStrictEqual(issuesOf(['--clk-mhz', 'fast', 'x']), ['--clk-mhz: must be a number'])
  })

  test('parseCliArgs rejects numbers that overflow', () => {
    assert.deepStrictEqual(issuesOf(['--clk-mhz', '1e999', 'x']), [
      '--clk-mhz: must be a finite number'
    ])
    assert.deepStrictEqual(issuesOf(['--second-thr=-1e400', 'x']), [
      '--second-thr: must be a finite number'
    ])
    assert.deepStrictEqual(issuesOf(['--top', '99999999999999999999', 'x']), [
      '--top: must be a safe integer'
    ])
  })

  test('help text names the fixed keys of the merged summary', () => {
    assert.ok(helpText.includes('--second-event <label>'))
    assert.ok(helpText.includes('keeps the keys total_instructions,'))
    assert.ok(helpText.includes('total_cycles, CPI and IPC whatever the event labels'))
  })

  test('parseCliArgs reports every invalid flag', () => {
    assert.deepStrictEqual(issuesOf(['--top', 'x', '--thr', 'y', 'trace']), [
      '--top: must be an integer',
      '--thr: must be a number'
    ])
  })

  test('parseCliArgs rejects an empty event label', () => {
    assert.deepStrictEqual(issuesOf(['-e', '  ', 'x']), ['--event: must not be empty'])
  })

  test('parseCliArgs rejects unknown flags and extra paths', () => {
    assert.strictEqual(issuesOf(['--bogus', 'x']).length, 1)
    assert.deepStrictEqual(issuesOf(['a.folded', 'b.folded']), [
      'expected a single trace path, got 2'
    ])
  })
})

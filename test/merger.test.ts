import { test, describe } from 'node:test'
import assert from 'node:assert'
import { buildFlat } from '../src/analyzer.ts'
import { combineProfiles } from '../src/merger.ts'
import type { FlatProfile } from '../src/types.ts'

function profile(
  self: Record<string, number>,
  total: Record<string, number>,
  totalSamples: number,
  clkMhz?: number
): FlatProfile {
  return buildFlat(
    {
      selfCounts: new Map(Object.entries(self)),
      totalCounts: new Map(Object.entries(total)),
      totalSamples
    },
    { clkMhz }
  )
}

// retired instructions
const inst = profile(
  { Proc0: 800, memset: 100, init: 100 },
  { _start: 1000, main: 800, Proc0: 800, memset: 100, init: 100 },
  1000
)

// cycles of the same run; `init` never shows up, `wait` only shows up here
const cycles = profile(
  { Proc0: 1200, wait: 500, memset: 300 },
  { _start: 2000, main: 1700, Proc0: 1200, wait: 500, memset: 300 },
  2000,
  100
)

describe('merger', () => {
  test('joins both traces on symbol name, ranked by the second trace', () => {
    const { rows } = combineProfiles(inst, cycles)

    assert.deepStrictEqual(
      rows.map((r) => r.symbol),
      ['Proc0', 'wait', 'memset', 'init']
    )
  })

  test('the merged symbols are the union of both traces', () => {
    const { rows } = combineProfiles(inst, cycles)
    const union = new Set([
      ...inst.rows.map((r) => r.symbol),
      ...cycles.rows.map((r) => r.symbol)
    ])

    assert.deepStrictEqual(new Set(rows.map((r) => r.symbol)), union)
  })

  test('computes IPC and CPI from total counts', () => {
    const { rows } = combineProfiles(inst, cycles)
    const proc0 = rows[0]

    assert.strictEqual(proc0.primarySelf, 800)
    assert.strictEqual(proc0.primaryTotal, 800)
    assert.strictEqual(proc0.secondarySelf, 1200)
    assert.strictEqual(proc0.secondaryTotal, 1200)
    assert.strictEqual(proc0.ipc, 800 / 1200)
    assert.strictEqual(proc0.cpi, 1.5)
  })

  test('a symbol missing from the first trace reads as zero there', () => {
    const wait = combineProfiles(inst, cycles).rows[1]

    assert.strictEqual(wait.symbol, 'wait')
    assert.strictEqual(wait.primarySelf, 0)
    assert.strictEqual(wait.primaryTotal, 0)
    assert.strictEqual(wait.primaryPercent, 0)
    // defined because the cycle total is positive
    assert.strictEqual(wait.ipc, 0)
    assert.ok(!('cpi' in wait))
  })

  test('a symbol missing from the second trace has CPI but no IPC', () => {
    const init = combineProfiles(inst, cycles).rows[3]

    assert.deepStrictEqual(init, {
      symbol: 'init',
      primarySelf: 100,
      primaryTotal: 100,
      primaryPercent: 10,
      secondarySelf: 0,
      secondaryTotal: 0,
      secondaryPercent: 0,
      cpi: 0
    })
  })

  test('ties on the second trace fall back to symbol name', () => {
    const left = profile({ zeta: 5, alpha: 5, mid: 5 }, { zeta: 5, alpha: 5, mid: 5 }, 15)
    const right = profile({ other: 9 }, { other: 9 }, 9)

    assert.deepStrictEqual(
      combineProfiles(left, right).rows.map((r) => r.symbol),
      ['other', 'alpha', 'mid', 'zeta']
    )
  })

  test('filters on the second trace after the join', () => {
    const symbols = (options: { top?: number; thrPercent?: number }) =>
      combineProfiles(inst, cycles, options).rows.map((r) => r.symbol)

    assert.deepStrictEqual(symbols({ thrPercent: 20 }), ['Proc0', 'wait'])
    assert.deepStrictEqual(symbols({ top: 1 }), ['Proc0'])
    assert.deepStrictEqual(symbols({ thrPercent: 10, top: 2 }), ['Proc0', 'wait'])
    assert.deepStrictEqual(symbols({ top: -1 }), [])
  })

  test('a symbol small in the first trace keeps its counts', () => {
    const memset = combineProfiles(inst, cycles, { thrPercent: 15 }).rows[2]

    assert.strictEqual(memset.symbol, 'memset')
    assert.strictEqual(memset.primaryTotal, 100)
    assert.strictEqual(memset.ipc, 100 / 300)
    assert.strictEqual(memset.cpi, 3)
  })

  test('summary metrics ignore row filtering', () => {
    const expected = {
      totalPrimary: 1000,
      totalSecondary: 2000,
      cpi: 2,
      ipc: 0.5,
      clkMhz: 100,
      totalTimeS: 2000 / 1e8
    }

    assert.deepStrictEqual(combineProfiles(inst, cycles).meta, expected)
    assert.deepStrictEqual(combineProfiles(inst, cycles, { top: 0 }).meta, expected)
  })

  test('summary leaves out the clock when the second trace has none', () => {
    assert.deepStrictEqual(combineProfiles(cycles, inst).meta, {
      totalPrimary: 2000,
      totalSecondary: 1000,
      cpi: 0.5,
      ipc: 2
    })
  })
})

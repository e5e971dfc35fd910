/**
 * Segment 05: Sexagenary Cycle Tests
 */

import { describe, it, expect } from 'vitest'
import {
  yearlyCycleOf,
  monthlyCycleOf,
  dailyCycleOf,
  heavenlyStem,
  earthlyBranch,
  sexagenaryLabel,
  describeCycle,
  parseSexagenaryLabel,
  MalformedReferenceSymbolError,
  OutOfRangeCycleError,
  type Script,
} from '../src/sexagenary'

describe('Cycle numbers', () => {
  it('yearly cycle', () => {
    expect(yearlyCycleOf(1900)).toBe(37)
    expect(yearlyCycleOf(1984)).toBe(1)
    expect(yearlyCycleOf(1999)).toBe(16)
    expect(yearlyCycleOf(2043)).toBe(60)
  })

  it('monthly cycle', () => {
    expect(monthlyCycleOf(1999, 11, false)).toBe(13)
    expect(monthlyCycleOf(1900, 1, false)).toBe(15)
  })

  it('monthly cycle is 0 in a leap month', () => {
    expect(monthlyCycleOf(2023, 2, true)).toBe(0)
  })

  it('daily cycle', () => {
    expect(dailyCycleOf(2451545)).toBe(55)
    expect(dailyCycleOf(2415051)).toBe(41)
  })

  it('daily cycle repeats every 60 days', () => {
    expect(dailyCycleOf(2451545 + 60)).toBe(55)
    expect(dailyCycleOf(2451545 + 6)).toBe(1)
  })
})

describe('Stems and branches', () => {
  it('cycle 1 is 甲子 / 갑자', () => {
    expect(heavenlyStem(1, 'chinese')).toBe('甲')
    expect(earthlyBranch(1, 'chinese')).toBe('子')
    expect(heavenlyStem(1, 'korean')).toBe('갑')
    expect(earthlyBranch(1, 'korean')).toBe('자')
  })

  it('cycle 60 is 癸亥 / 계해', () => {
    expect(sexagenaryLabel(60, 'chinese')).toBe('癸亥')
    expect(sexagenaryLabel(60, 'korean')).toBe('계해')
  })

  it('cycle 16 is 己卯 / 기묘', () => {
    expect(sexagenaryLabel(16, 'chinese')).toBe('己卯')
    expect(sexagenaryLabel(16, 'korean')).toBe('기묘')
  })

  it('cycle 0 maps to the empty string', () => {
    expect(heavenlyStem(0, 'chinese')).toBe('')
    expect(earthlyBranch(0, 'chinese')).toBe('')
    expect(heavenlyStem(0, 'korean')).toBe('')
    expect(earthlyBranch(0, 'korean')).toBe('')
    expect(sexagenaryLabel(0, 'korean')).toBe('')
  })

  it('rejects cycles outside 0-60', () => {
    expect(() => heavenlyStem(61, 'chinese')).toThrow(OutOfRangeCycleError)
    expect(() => earthlyBranch(-1, 'korean')).toThrow(OutOfRangeCycleError)
    expect(() => sexagenaryLabel(1.5, 'chinese')).toThrow(OutOfRangeCycleError)
  })

  it('labels are unique across a full cycle', () => {
    const scripts: Script[] = ['chinese', 'korean']
    for (const script of scripts) {
      const labels = new Set<string>()
      for (let cycle = 1; cycle <= 60; cycle++) labels.add(sexagenaryLabel(cycle, script))
      expect(labels.size).toBe(60)
    }
  })
})

describe('describeCycle', () => {
  it('joins both scripts', () => {
    expect(describeCycle(16)).toBe('己卯, 기묘')
  })

  it('is empty for 0', () => {
    expect(describeCycle(0)).toBe('')
  })
})

describe('parseSexagenaryLabel', () => {
  it('parses Chinese labels', () => {
    expect(parseSexagenaryLabel('己卯')).toEqual({ ok: true, value: 16 })
  })

  it('parses Korean labels', () => {
    expect(parseSexagenaryLabel('갑자')).toEqual({ ok: true, value: 1 })
    expect(parseSexagenaryLabel('계해')).toEqual({ ok: true, value: 60 })
  })

  it('reads 신 by position (stem 辛, branch 申)', () => {
    expect(parseSexagenaryLabel('신유')).toEqual({ ok: true, value: 58 })
    expect(parseSexagenaryLabel('임신')).toEqual({ ok: true, value: 9 })
  })

  it('accepts mixed scripts and surrounding whitespace', () => {
    expect(parseSexagenaryLabel(' 甲자 ')).toEqual({ ok: true, value: 1 })
  })

  it('inverts sexagenaryLabel for every cycle', () => {
    for (let cycle = 1; cycle <= 60; cycle++) {
      expect(parseSexagenaryLabel(sexagenaryLabel(cycle, 'chinese'))).toEqual({ ok: true, value: cycle })
      expect(parseSexagenaryLabel(sexagenaryLabel(cycle, 'korean'))).toEqual({ ok: true, value: cycle })
    }
  })

  it('rejects unknown stems', () => {
    const result = parseSexagenaryLabel('X자')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(MalformedReferenceSymbolError)
      expect(result.error.message).toBe("Unknown heavenly stem 'X' in 'X자'")
    }
  })

  it('rejects unknown branches', () => {
    const result = parseSexagenaryLabel('갑X')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe("Unknown earthly branch 'X' in '갑X'")
  })

  it('rejects pairs that never occur (甲丑)', () => {
    const result = parseSexagenaryLabel('甲丑')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('MALFORMED_REFERENCE_SYMBOL')
  })

  it('rejects labels of the wrong length', () => {
    expect(parseSexagenaryLabel('갑').ok).toBe(false)
    expect(parseSexagenaryLabel('갑자년').ok).toBe(false)
  })
})

/**
 * Sexagenary Cycle Calculator
 *
 * Day, month and year numbers in the 60-step stem/branch cycle, and their
 * Chinese and Korean labels (e.g. 갑자 / 甲子 for cycle 1).
 *
 * Cycle numbers run 1–60. 0 marks a leap month, which has no monthly cycle;
 * every label helper maps it to the empty string.
 */

import { MalformedReferenceSymbolError, OutOfRangeCycleError } from './errors'
import { SOLAR_BASE_JULIAN_DAY } from './julian-day'
import { type Result, Ok, Err } from './result'
import { BASE_LUNAR_YEAR } from './tables'

export { MalformedReferenceSymbolError, OutOfRangeCycleError } from './errors'

// ============================================================================
// Types & Symbol Tables
// ============================================================================

export type Script = 'chinese' | 'korean'

const HEAVENLY_STEMS: Record<Script, readonly string[]> = {
  chinese: ['甲', '乙', '丙', '丁', '戊', '己', '庚', '辛', '壬', '癸'],
  korean: ['갑', '을', '병', '정', '무', '기', '경', '신', '임', '계'],
}

const EARTHLY_BRANCHES: Record<Script, readonly string[]> = {
  chinese: ['子', '丑', '寅', '卯', '辰', '巳', '午', '未', '申', '酉', '戌', '亥'],
  korean: ['자', '축', '인', '묘', '진', '사', '오', '미', '신', '유', '술', '해'],
}

// Phase constants calibrated against the reference dataset
const YEAR_CYCLE_PHASE = 36
const MONTH_CYCLE_PHASE = 14
const DAY_CYCLE_PHASE = 10

// ============================================================================
// Cycle Numbers
// ============================================================================

export function yearlyCycleOf(lunarYear: number): number {
  return 1 + ((lunarYear - BASE_LUNAR_YEAR + YEAR_CYCLE_PHASE) % 60)
}

export function monthlyCycleOf(lunarYear: number, lunarMonth: number, isLeapMonth: boolean): number {
  if (isLeapMonth) return 0
  const months = (lunarYear - BASE_LUNAR_YEAR) * 12 + (lunarMonth - 1)
  return 1 + ((months + MONTH_CYCLE_PHASE) % 60)
}

export function dailyCycleOf(julianDay: number): number {
  return 1 + ((julianDay - SOLAR_BASE_JULIAN_DAY + DAY_CYCLE_PHASE) % 60)
}

// ============================================================================
// Labels
// ============================================================================

function assertCycle(cycle: number): void {
  if (!Number.isInteger(cycle) || cycle < 0 || cycle > 60) {
    throw new OutOfRangeCycleError(`Cycle must be between 0 and 60, got ${cycle}.`)
  }
}

export function heavenlyStem(cycle: number, script: Script): string {
  assertCycle(cycle)
  if (cycle === 0) return ''
  return HEAVENLY_STEMS[script][(cycle - 1) % 10] ?? ''
}

export function earthlyBranch(cycle: number, script: Script): string {
  assertCycle(cycle)
  if (cycle === 0) return ''
  return EARTHLY_BRANCHES[script][(cycle - 1) % 12] ?? ''
}

export function sexagenaryLabel(cycle: number, script: Script): string {
  return heavenlyStem(cycle, script) + earthlyBranch(cycle, script)
}

/** Both labels of a cycle, e.g. `己卯, 기묘`; empty for 0 */
export function describeCycle(cycle: number): string {
  if (cycle === 0) return ''
  return `${sexagenaryLabel(cycle, 'chinese')}, ${sexagenaryLabel(cycle, 'korean')}`
}

// ============================================================================
// Parsing
// ============================================================================

function symbolIndex(table: Record<Script, readonly string[]>, symbol: string): number {
  const chinese = table.chinese.indexOf(symbol)
  return chinese !== -1 ? chinese : table.korean.indexOf(symbol)
}

/**
 * Cycle number of a two-character label in either script (`己卯`, `기묘`).
 * Mixed scripts are accepted; a stem and branch of different parity never
 * occur together and are rejected.
 */
export function parseSexagenaryLabel(label: string): Result<number, MalformedReferenceSymbolError> {
  const chars = [...label.trim()]
  if (chars.length !== 2) {
    return Err(new MalformedReferenceSymbolError(`Sexagenary label must have 2 symbols: '${label}'`))
  }

  const [stemSymbol = '', branchSymbol = ''] = chars
  const stem = symbolIndex(HEAVENLY_STEMS, stemSymbol)
  if (stem === -1) {
    return Err(new MalformedReferenceSymbolError(`Unknown heavenly stem '${stemSymbol}' in '${label}'`))
  }
  const branch = symbolIndex(EARTHLY_BRANCHES, branchSymbol)
  if (branch === -1) {
    return Err(new MalformedReferenceSymbolError(`Unknown earthly branch '${branchSymbol}' in '${label}'`))
  }
  if (stem % 2 !== branch % 2) {
    return Err(new MalformedReferenceSymbolError(`Stem and branch never pair in a cycle: '${label}'`))
  }

  // Smallest n in 0..59 with n ≡ stem (mod 10) and n ≡ branch (mod 12)
  let n = stem
  while (n % 12 !== branch) n += 10
  return Ok(n + 1)
}

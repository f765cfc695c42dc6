/**
 * sky — Conversions between SQM, naked-eye limiting magnitude and Bortle class.
 *
 * SQM → NELM:  NELM = 7.93 - 5·log10(1 + 10^(4.316 - SQM/5))
 * NELM → SQM:  SQM  = 21.58 - 5·log10(10^(1.586 - NELM/5) - 1)
 *
 * Both directions to the Bortle scale are bucketed lookups. Going through
 * a Bortle class loses precision: bortleToSqm(sqmToBortle(x)) returns the
 * representative value of the class, not x.
 *
 * fstOffset is the observer's personal offset from the nominal faintest
 * star: a positive offset means the observer sees fainter than average.
 */

import type { BortleClass } from '../types.js'
import { BORTLE_SQM, BORTLE_NELM } from '../types.js'
import { InvalidParameterError } from '../errors/index.js'
import { requireFinite, requireInRange } from '../math/index.js'

export const SQM_RANGE = { min: 0, max: 22 } as const
export const NELM_RANGE = { min: 0, max: 6.7 } as const

/** Faintest NELM returned by sqmToNelm before the offset is applied */
const NELM_FLOOR = 2.5

// Upper bounds per Bortle class; SQM bounds are inclusive, NELM bounds exclusive
const SQM_BORTLE_BOUNDS: readonly [number, BortleClass][] = [
  [17.5, 9],
  [18.0, 8],
  [18.5, 7],
  [19.1, 6],
  [20.4, 5],
  [21.3, 4],
  [21.5, 3],
  [21.7, 2],
]

const NELM_BORTLE_BOUNDS: readonly [number, BortleClass][] = [
  [3.6, 9],
  [3.9, 8],
  [4.4, 7],
  [4.9, 6],
  [5.8, 5],
  [6.3, 4],
  [6.4, 3],
  [6.5, 2],
]

// ─── SQM ⇄ NELM ───────────────────────────────────────────────────────────────

/**
 * Naked-eye limiting magnitude for a sky brightness.
 * Floored at 2.5 before the offset is subtracted.
 *
 * @param sqm - Sky brightness, 0..22 mag/arcsec²
 */
export function sqmToNelm(sqm: number, fstOffset = 0): number {
  requireInRange(sqm, 'sqm', SQM_RANGE.min, SQM_RANGE.max)
  requireFinite(fstOffset, 'fstOffset')
  const nelm = 7.93 - 5 * Math.log10(1 + Math.pow(10, 4.316 - sqm / 5))
  return Math.max(nelm, NELM_FLOOR) - fstOffset
}

/**
 * Sky brightness for a naked-eye limiting magnitude, capped at 22.
 *
 * @param nelm - Limiting magnitude, 0..6.7
 */
export function nelmToSqm(nelm: number, fstOffset = 0): number {
  requireInRange(nelm, 'nelm', NELM_RANGE.min, NELM_RANGE.max)
  requireFinite(fstOffset, 'fstOffset')
  const base = Math.pow(10, 1.586 - (nelm + fstOffset) / 5) - 1
  if (base <= 0) {
    throw new InvalidParameterError(
      'nelm',
      `nelm + fstOffset = ${nelm + fstOffset} is beyond the faintest limit the formula supports`,
    )
  }
  return Math.min(21.58 - 5 * Math.log10(base), SQM_RANGE.max)
}

// ─── → Bortle ────────────────────────────────────────────────────────────────

/** Bortle class for a sky brightness (0..22 mag/arcsec²). */
export function sqmToBortle(sqm: number): BortleClass {
  requireInRange(sqm, 'sqm', SQM_RANGE.min, SQM_RANGE.max)
  for (const [bound, bortle] of SQM_BORTLE_BOUNDS) {
    if (sqm <= bound) return bortle
  }
  return 1
}

/** Bortle class for a naked-eye limiting magnitude (0..6.7). */
export function nelmToBortle(nelm: number): BortleClass {
  requireInRange(nelm, 'nelm', NELM_RANGE.min, NELM_RANGE.max)
  for (const [bound, bortle] of NELM_BORTLE_BOUNDS) {
    if (nelm < bound) return bortle
  }
  return 1
}

// ─── Bortle → ────────────────────────────────────────────────────────────────

export function isBortleClass(value: number): value is BortleClass {
  return Number.isInteger(value) && value >= 1 && value <= 9
}

function requireBortle(bortle: number): BortleClass {
  if (!isBortleClass(bortle)) {
    throw new InvalidParameterError('bortle', 'bortle must be an integer between 1 and 9')
  }
  return bortle
}

/** Representative SQM reading of a Bortle class. */
export function bortleToSqm(bortle: number): number {
  return BORTLE_SQM[requireBortle(bortle)]
}

/** Representative naked-eye limiting magnitude of a Bortle class, minus fstOffset. */
export function bortleToNelm(bortle: number, fstOffset = 0): number {
  const cls = requireBortle(bortle)
  requireFinite(fstOffset, 'fstOffset')
  return BORTLE_NELM[cls] - fstOffset
}

/**
 * contrast — Contrast reserve and optimal detection magnification.
 *
 * The contrast reserve compares the log contrast of an extended object
 * against the sky background with the log threshold contrast the eye needs
 * to detect an object of that apparent size on that background:
 *
 *   A     = aperture / 25.4                              (inches)
 *   SBB   = SQM - 5·log10(2.833·A) + 5·log10(M)          (background in the eyepiece)
 *   logC  = -0.4 · (SB - SQM)                            (object contrast)
 *   logCt = LTC(SBB, log10(M) + log10(d_min))            (threshold contrast)
 *   CR    = logC - logCt
 *
 * SB is the object surface brightness in mag/arcsec², d_min the smaller
 * object diameter in arc minutes. LTC is the Blackwell threshold contrast
 * table as tabulated for visual deep-sky detection (24 background levels
 * 4..27 mag/arcsec² × 7 log angular sizes), interpolated bilinearly.
 *
 * All logarithms are base 10. Sizes and areas are carried as logarithms so
 * that extreme magnifications and diameters stay finite.
 */

import type {
  ContrastTarget,
  ContrastReserveCategory,
  ContrastReserveRating,
} from '../types.js'
import {
  CONTRAST_RESERVE_THRESHOLDS,
  CONTRAST_RESERVE_DESCRIPTIONS,
} from '../types.js'
import { InvalidParameterError } from '../errors/index.js'
import { createLogger } from '../logging/index.js'
import {
  clamp,
  lerp,
  requireFinite,
  requirePositive,
  requireNonNegative,
} from '../math/index.js'
import thresholdTable from './threshold-contrast.json'

const log = createLogger('contrast')

// ─── Constants ────────────────────────────────────────────────────────────────

/**
 * Smallest object diameter used in the photometry, arc seconds.
 * Point sources (diameter 0) are treated as a seeing-sized disk.
 */
export const POINT_SOURCE_DIAMETER_ARCSEC = 1

/** 2.5·log10(3600): mag/arcmin² → mag/arcsec² */
const ARCMIN2_TO_ARCSEC2 = 8.89

/** log10(π/4 · 3600): ellipse area factor for diameters in arc minutes, result in arcsec² */
const LOG_ELLIPSE_AREA_ARCSEC2 = Math.log10(2827.0)

/** Absolute bound on the log threshold contrast */
const MAX_LOG_THRESHOLD = 37

const LOG_ANGLES: readonly number[] = thresholdTable.logAngles
/** Each row: [background mag/arcsec², LTC at LOG_ANGLES[0], ..., LTC at LOG_ANGLES[6]] */
const LTC_ROWS: readonly (readonly number[])[] = thresholdTable.rows

// ─── Surface brightness ───────────────────────────────────────────────────────

/**
 * Surface brightness of an elliptical object of uniform brightness.
 *
 * SB = m + 2.5·log10(2827 · (d1/60) · (d2/60))
 *
 * @param magnitude - Integrated visual magnitude
 * @param diameter1 - First axis, arc seconds
 * @param diameter2 - Second axis, arc seconds
 * @returns Surface brightness in mag/arcsec²
 */
export function surfaceBrightness(magnitude: number, diameter1: number, diameter2: number): number {
  requireFinite(magnitude, 'magnitude')
  const d1 = effectiveDiameter(diameter1, 'diameter1')
  const d2 = effectiveDiameter(diameter2, 'diameter2')
  return magnitude + 2.5 * (LOG_ELLIPSE_AREA_ARCSEC2 + Math.log10(d1 / 60) + Math.log10(d2 / 60))
}

function effectiveDiameter(diameter: number, name: string): number {
  requireNonNegative(diameter, name)
  return Math.max(diameter, POINT_SOURCE_DIAMETER_ARCSEC)
}

/**
 * Resolve a target to its surface brightness in mag/arcsec², rejecting
 * targets that give both (or neither) brightness modes.
 */
function targetSurfaceBrightness(target: ContrastTarget): number {
  const { magnitude, surfaceBrightness: givenSB, diameter1, diameter2 } = target

  if (magnitude !== undefined && givenSB !== undefined) {
    throw new InvalidParameterError(
      'target',
      'Give either magnitude or surfaceBrightness for the target, not both',
    )
  }

  if (givenSB !== undefined) {
    requireFinite(givenSB, 'surfaceBrightness')
    // diameters are still validated: they set the apparent size
    effectiveDiameter(diameter1, 'diameter1')
    effectiveDiameter(diameter2, 'diameter2')
    return givenSB + ARCMIN2_TO_ARCSEC2
  }

  if (magnitude === undefined) {
    throw new InvalidParameterError('target', 'The target needs a magnitude or a surfaceBrightness')
  }
  return surfaceBrightness(magnitude, diameter1, diameter2)
}

// ─── Threshold contrast ───────────────────────────────────────────────────────

/**
 * Log threshold contrast for a background brightness and apparent size.
 *
 * Bilinear interpolation over the LTC table. Backgrounds brighter than the
 * first row are clamped to it; backgrounds past the last row extrapolate
 * along the last two rows. Sizes below the first column use the first
 * column; sizes past the last column extrapolate.
 *
 * @param backgroundSB - Sky background seen in the eyepiece, mag/arcsec²
 * @param apparentSizeArcmin - Magnified object size, arc minutes
 */
export function logThresholdContrast(backgroundSB: number, apparentSizeArcmin: number): number {
  requireFinite(backgroundSB, 'backgroundSB')
  requirePositive(apparentSizeArcmin, 'apparentSizeArcmin')
  return thresholdAtLogAngle(backgroundSB, Math.log10(apparentSizeArcmin))
}

/** LTC lookup with the apparent size already given as log10(arc minutes). */
function thresholdAtLogAngle(backgroundSB: number, sizeLogAngle: number): number {
  const firstBackground = LTC_ROWS[0][0]
  const lastRow = LTC_ROWS.length - 1
  const lastBackground = LTC_ROWS[lastRow][0]

  const background = Math.max(backgroundSB, firstBackground)
  const wholeBackground = Math.floor(background)
  const rowA = clamp(wholeBackground - firstBackground, 0, lastRow - 1)
  const rowB = rowA + 1

  // Column bracketing the log angle: last column whose angle is below it
  let logAngle = sizeLogAngle
  let col = 0
  while (col < LOG_ANGLES.length && logAngle > LOG_ANGLES[col]) col++
  col -= 1
  if (col < 0) {
    col = 0
    logAngle = LOG_ANGLES[0]
  }
  if (col === LOG_ANGLES.length - 1) col = LOG_ANGLES.length - 2

  const t = (logAngle - LOG_ANGLES[col]) / (LOG_ANGLES[col + 1] - LOG_ANGLES[col])

  // +1: column 0 of each row is the background brightness
  const ltcA = lerp(LTC_ROWS[rowA][col + 1], LTC_ROWS[rowA][col + 2], t)
  const ltcB = lerp(LTC_ROWS[rowB][col + 1], LTC_ROWS[rowB][col + 2], t)

  const logThreshold = wholeBackground >= lastBackground
    ? ltcB + (background - lastBackground) * (ltcB - ltcA)
    : ltcA + (background - wholeBackground) * (ltcB - ltcA)

  return clamp(logThreshold, -MAX_LOG_THRESHOLD, MAX_LOG_THRESHOLD)
}

// ─── Contrast reserve ─────────────────────────────────────────────────────────

/**
 * Contrast reserve of a target seen through a telescope.
 *
 * Values below -0.2 mean the object is not visible; see
 * contrastReserveCategory() for the full scale.
 *
 * @param sqm - Sky background, mag/arcsec²
 * @param aperture - Telescope aperture in mm (> 0)
 * @param magnification - Magnification (> 0)
 * @param target - Either `{ magnitude, diameter1, diameter2 }` or
 *   `{ surfaceBrightness, diameter1, diameter2 }` (surface brightness in
 *   mag/arcmin²); diameters in arc seconds
 *
 * @example
 * ```ts
 * // M51 under a 21.2 sky with a 250 mm Dobsonian at 100×
 * contrastReserve(21.2, 250, 100, { magnitude: 8.4, diameter1: 660, diameter2: 420 })
 * ```
 */
export function contrastReserve(
  sqm: number,
  aperture: number,
  magnification: number,
  target: ContrastTarget,
): number {
  requireFinite(sqm, 'sqm')
  requirePositive(aperture, 'aperture')
  requirePositive(magnification, 'magnification')
  const objectSB = targetSurfaceBrightness(target)

  const apertureInches = aperture / 25.4
  const backgroundSB = sqm - 5 * Math.log10(2.833 * apertureInches) + 5 * Math.log10(magnification)
  const logObjectContrast = -0.4 * (objectSB - sqm)

  const smallerDiameter = Math.min(
    Math.max(target.diameter1, POINT_SOURCE_DIAMETER_ARCSEC),
    Math.max(target.diameter2, POINT_SOURCE_DIAMETER_ARCSEC),
  )
  const sizeLogAngle = Math.log10(magnification) + Math.log10(smallerDiameter / 60)

  const reserve = logObjectContrast - thresholdAtLogAngle(backgroundSB, sizeLogAngle)
  log.debug('contrast reserve', { sqm, aperture, magnification, objectSB, backgroundSB, reserve })
  return reserve
}

/**
 * Pick the magnification with the highest contrast reserve.
 *
 * Only the given candidates are considered. On an exact tie the candidate
 * that comes first in the list wins.
 *
 * @param magnifications - Non-empty list of candidate magnifications (each > 0)
 * @returns One element of `magnifications`
 */
export function optimalDetectionMagnification(
  sqm: number,
  aperture: number,
  target: ContrastTarget,
  magnifications: readonly number[],
): number {
  requireFinite(sqm, 'sqm')
  requirePositive(aperture, 'aperture')
  targetSurfaceBrightness(target)

  if (!Array.isArray(magnifications) || magnifications.length === 0) {
    throw new InvalidParameterError('magnifications', 'magnifications must be a non-empty list')
  }
  magnifications.forEach((m, i) => requirePositive(m, `magnifications[${i}]`))

  let best = magnifications[0]
  let bestReserve = contrastReserve(sqm, aperture, best, target)

  for (let i = 1; i < magnifications.length; i++) {
    const reserve = contrastReserve(sqm, aperture, magnifications[i], target)
    if (reserve > bestReserve) {
      best = magnifications[i]
      bestReserve = reserve
    }
  }

  log.debug('optimal detection magnification', { best, bestReserve, candidates: magnifications.length })
  return best
}

// ─── Rating ───────────────────────────────────────────────────────────────────

/**
 * Map a contrast reserve to its visibility category.
 *
 * Thresholds:
 *   not-visible      CR < -0.2
 *   questionable     CR < 0.1
 *   difficult        CR < 0.35
 *   quite-difficult  CR < 0.5
 *   easy             CR < 1.0
 *   very-easy        otherwise
 */
export function contrastReserveCategory(reserve: number): ContrastReserveCategory {
  requireFinite(reserve, 'reserve')
  if (reserve >= CONTRAST_RESERVE_THRESHOLDS['very-easy']) return 'very-easy'
  if (reserve >= CONTRAST_RESERVE_THRESHOLDS.easy) return 'easy'
  if (reserve >= CONTRAST_RESERVE_THRESHOLDS['quite-difficult']) return 'quite-difficult'
  if (reserve >= CONTRAST_RESERVE_THRESHOLDS.difficult) return 'difficult'
  if (reserve >= CONTRAST_RESERVE_THRESHOLDS.questionable) return 'questionable'
  return 'not-visible'
}

/** Category plus its human-readable description. */
export function rateContrastReserve(reserve: number): ContrastReserveRating {
  const category = contrastReserveCategory(reserve)
  return { category, description: CONTRAST_RESERVE_DESCRIPTIONS[category] }
}

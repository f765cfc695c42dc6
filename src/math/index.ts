/**
 * math — Core numerical utilities and input guards.
 *
 * All computation in this module is pure (no I/O, no state).
 */

import { InvalidParameterError } from '../errors/index.js'

// ─── Scalars ─────────────────────────────────────────────────────────────────

/** Clamp x into [lo, hi] */
export function clamp(x: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, x))
}

/**
 * Linear interpolation between a and b.
 * t outside [0, 1] extrapolates along the same line.
 */
export function lerp(a: number, b: number, t: number): number {
  return a + t * (b - a)
}

// ─── Guards ──────────────────────────────────────────────────────────────────

/** Throw InvalidParameterError unless value is a finite number. */
export function requireFinite(value: number, name: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidParameterError(name, `${name} must be a finite number`)
  }
  return value
}

/** Throw InvalidParameterError unless value is finite and > 0. */
export function requirePositive(value: number, name: string): number {
  requireFinite(value, name)
  if (value <= 0) throw new InvalidParameterError(name, `${name} must be positive`)
  return value
}

/** Throw InvalidParameterError unless value is finite and >= 0. */
export function requireNonNegative(value: number, name: string): number {
  requireFinite(value, name)
  if (value < 0) throw new InvalidParameterError(name, `${name} must not be negative`)
  return value
}

/** Throw InvalidParameterError unless lo <= value <= hi. */
export function requireInRange(value: number, name: string, lo: number, hi: number): number {
  requireFinite(value, name)
  if (value < lo || value > hi) {
    throw new InvalidParameterError(name, `${name} must be between ${lo} and ${hi}`)
  }
  return value
}

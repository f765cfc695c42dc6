/**
 * instruments — Instrument type codes and magnification lists.
 */

import type {
  InstrumentTypeName,
  InstrumentTypeCode,
  EquipmentRecord,
  InstrumentRecord,
  EyepieceRecord,
} from '../types.js'
import { INSTRUMENT_TYPES } from '../types.js'
import { InvalidParameterError, UnknownInstrumentTypeError } from '../errors/index.js'

export function isInstrumentTypeName(name: string): name is InstrumentTypeName {
  return Object.prototype.hasOwnProperty.call(INSTRUMENT_TYPES, name)
}

const NAMES_BY_CODE = new Map<number, InstrumentTypeName>(
  Object.keys(INSTRUMENT_TYPES)
    .filter(isInstrumentTypeName)
    .map((name): [number, InstrumentTypeName] => [INSTRUMENT_TYPES[name], name]),
)

/**
 * DeepskyLog integer code for an instrument type name.
 * Names are matched exactly ('Schmidt Cassegrain', not 'schmidt-cassegrain').
 */
export function instrumentTypeToInt(name: string): InstrumentTypeCode {
  if (!isInstrumentTypeName(name)) throw new UnknownInstrumentTypeError(name)
  return INSTRUMENT_TYPES[name]
}

/** Display name for a DeepskyLog instrument type code (0..9). */
export function instrumentTypeToString(code: number): InstrumentTypeName {
  const name = NAMES_BY_CODE.get(code)
  if (name === undefined) throw new UnknownInstrumentTypeError(code)
  return name
}

/**
 * Magnifications available with an instrument and a set of eyepieces.
 *
 * Instruments with a fixed magnification (binoculars, finders) give that one
 * value. Otherwise each active eyepiece gives (diameter · fd) / focal_length_mm.
 * Inactive eyepieces are skipped. Records come from the server untouched, so
 * numeric attributes are read from numbers or numeric strings.
 *
 * @param instrument - One instrument record, e.g. a value of getInstruments()
 * @param eyepieces - The Map returned by getEyepieces(), or an array of records
 * @returns Magnifications in eyepiece order
 */
export function calculateMagnifications(
  instrument: InstrumentRecord,
  eyepieces: ReadonlyMap<number, EyepieceRecord> | readonly EyepieceRecord[],
): number[] {
  const fixed = positiveAttribute(instrument.fixedMagnification)
  if (fixed !== undefined) return [fixed]

  const diameter = positiveAttribute(instrument.diameter)
  const fd = positiveAttribute(instrument.fd)
  if (diameter === undefined || fd === undefined) {
    throw new InvalidParameterError(
      'instrument',
      `Instrument ${describe(instrument)} needs a positive diameter and fd`,
    )
  }
  const focalLength = diameter * fd

  const magnifications: number[] = []
  for (const eyepiece of eyepieces.values()) {
    if (!isActive(eyepiece.eyepieceactive)) continue
    const eyepieceFocal = positiveAttribute(eyepiece.focal_length_mm)
    if (eyepieceFocal === undefined) {
      throw new InvalidParameterError(
        'eyepieces',
        `Eyepiece ${describe(eyepiece)} needs a positive focal_length_mm`,
      )
    }
    magnifications.push(focalLength / eyepieceFocal)
  }
  return magnifications
}

/** A positive finite number, given as a number or a numeric string */
function positiveAttribute(value: unknown): number | undefined {
  const n = typeof value === 'number' ? value
    : typeof value === 'string' && value.trim() !== '' ? Number(value)
    : NaN
  return Number.isFinite(n) && n > 0 ? n : undefined
}

const INACTIVE_STRINGS = new Set(['', '0', 'false'])

/** Booleans, 0/1 and their string forms; null and absent mean inactive */
function isActive(value: unknown): boolean {
  if (typeof value === 'string') return !INACTIVE_STRINGS.has(value.trim().toLowerCase())
  return Boolean(value)
}

function describe(record: EquipmentRecord): string {
  if (typeof record.name === 'string' && record.name) return `'${record.name}'`
  return typeof record.id === 'number' || typeof record.id === 'string' ? `#${record.id}` : '(unnamed)'
}

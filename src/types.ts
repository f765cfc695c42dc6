// ─── Contrast reserve inputs ─────────────────────────────────────────────────

/**
 * Target brightness derived from the integrated magnitude and the elliptical
 * area spanned by the two diameters.
 */
export interface MagnitudeTarget {
  /** Integrated visual magnitude */
  magnitude: number
  /** Diameter along the first axis, arc seconds (0 = point source) */
  diameter1: number
  /** Diameter along the second axis, arc seconds (0 = point source) */
  diameter2: number
  surfaceBrightness?: never
}

/**
 * Target brightness given directly as a surface brightness.
 * The diameters still set the apparent size seen in the eyepiece.
 */
export interface SurfaceBrightnessTarget {
  /** Surface brightness in magnitudes per square arc minute */
  surfaceBrightness: number
  /** Diameter along the first axis, arc seconds */
  diameter1: number
  /** Diameter along the second axis, arc seconds */
  diameter2: number
  magnitude?: never
}

/**
 * The two mutually exclusive ways of describing how bright a target is.
 * Passing both `magnitude` and `surfaceBrightness` is rejected.
 */
export type ContrastTarget = MagnitudeTarget | SurfaceBrightnessTarget

// ─── Contrast reserve categories ─────────────────────────────────────────────

export type ContrastReserveCategory =
  | 'not-visible'
  | 'questionable'
  | 'difficult'
  | 'quite-difficult'
  | 'easy'
  | 'very-easy'

/**
 * Lower bounds of each category (inclusive):
 *   not-visible:      reserve <  -0.2
 *   questionable:     -0.2 <= reserve < 0.1
 *   difficult:        0.1  <= reserve < 0.35
 *   quite-difficult:  0.35 <= reserve < 0.5
 *   easy:             0.5  <= reserve < 1.0
 *   very-easy:        1.0  <= reserve
 */
export const CONTRAST_RESERVE_THRESHOLDS = {
  questionable: -0.2,
  difficult: 0.1,
  'quite-difficult': 0.35,
  easy: 0.5,
  'very-easy': 1.0,
} as const

export const CONTRAST_RESERVE_DESCRIPTIONS: Record<ContrastReserveCategory, string> = {
  'not-visible': 'Not visible',
  questionable: 'Questionable detection',
  difficult: 'Difficult to see',
  'quite-difficult': 'Quite difficult to see',
  easy: 'Easy to see',
  'very-easy': 'Very easy to see',
}

export interface ContrastReserveRating {
  category: ContrastReserveCategory
  description: string
}

// ─── Sky brightness ──────────────────────────────────────────────────────────

/** Bortle dark-sky class, 1 (excellent) through 9 (inner city) */
export type BortleClass = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9

/** Representative SQM reading (mag/arcsec²) for each Bortle class */
export const BORTLE_SQM: Record<BortleClass, number> = {
  1: 21.85,
  2: 21.6,
  3: 21.4,
  4: 20.85,
  5: 19.75,
  6: 18.8,
  7: 18.25,
  8: 17.75,
  9: 17.5,
}

/** Representative naked-eye limiting magnitude for each Bortle class */
export const BORTLE_NELM: Record<BortleClass, number> = {
  1: 6.6,
  2: 6.5,
  3: 6.4,
  4: 6.1,
  5: 5.4,
  6: 4.7,
  7: 4.2,
  8: 3.8,
  9: 3.6,
}

// ─── Instrument types ────────────────────────────────────────────────────────

/** DeepskyLog instrument type codes, keyed by their display name */
export const INSTRUMENT_TYPES = {
  'Naked Eye': 0,
  Binoculars: 1,
  Refractor: 2,
  Reflector: 3,
  Finderscope: 4,
  Other: 5,
  Cassegrain: 6,
  Kutter: 7,
  Maksutov: 8,
  'Schmidt Cassegrain': 9,
} as const

export type InstrumentTypeName = keyof typeof INSTRUMENT_TYPES
export type InstrumentTypeCode = (typeof INSTRUMENT_TYPES)[InstrumentTypeName]

// ─── Equipment records ───────────────────────────────────────────────────────

/** Equipment categories served by the DeepskyLog API */
export type EquipmentResource = 'instrument' | 'eyepieces' | 'lenses' | 'filters'

/**
 * One equipment item as the server sent it. Attributes are passed through
 * untouched, so a column may arrive as null or as a numeric string; the
 * members below document the names DeepskyLog uses, not a guaranteed type.
 */
export interface EquipmentRecord {
  /** Item ID, normally the same as the map key */
  id?: unknown
  name?: unknown
  [attribute: string]: unknown
}

export interface InstrumentRecord extends EquipmentRecord {
  /** Aperture in mm */
  diameter?: unknown
  /** Focal ratio */
  fd?: unknown
  /** Set for instruments without interchangeable eyepieces (binoculars, finders) */
  fixedMagnification?: unknown
  /** Instrument type code, see INSTRUMENT_TYPES */
  type?: unknown
}

export interface EyepieceRecord extends EquipmentRecord {
  /** Focal length in mm */
  focal_length_mm?: unknown
  /** Whether the eyepiece is still in use; the server sends a boolean or 0/1 */
  eyepieceactive?: unknown
}

export interface LensRecord extends EquipmentRecord {
  focal_length_mm?: unknown
  /** Barlow / reducer factor */
  factor?: unknown
}

export interface FilterRecord extends EquipmentRecord {
  type?: unknown
}

/** Fetched equipment keyed by the server's integer ID, in ascending ID order */
export type EquipmentMap<T extends EquipmentRecord> = Map<number, T>

// ─── Client configuration ────────────────────────────────────────────────────

export interface ClientOptions {
  /**
   * Service root, without the `/api` suffix.
   * Defaults to $DEEPSKYLOG_BASE_URL, then https://test.deepskylog.org.
   */
  baseUrl?: string
  /** Per-request timeout in milliseconds (default 10000) */
  timeoutMs?: number
  /** fetch implementation to use; defaults to the global one */
  fetch?: typeof fetch
}

/** Record type served by each equipment resource */
export interface EquipmentByResource {
  instrument: InstrumentRecord
  eyepieces: EyepieceRecord
  lenses: LensRecord
  filters: FilterRecord
}

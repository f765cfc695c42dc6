/**
 * deepsky-toolkit — Visibility calculations and DeepskyLog equipment access.
 *
 * Contrast reserve after Mel Bartels' visual detection model (Blackwell
 * threshold contrast), sky brightness conversions between SQM, naked-eye
 * limiting magnitude and Bortle class, and a client for the equipment a
 * DeepskyLog user has registered.
 *
 * Quick start:
 *   import { getInstruments, getEyepieces, calculateMagnifications,
 *            optimalDetectionMagnification } from 'deepsky-toolkit'
 *
 *   const scopes = await getInstruments('alice')
 *   const eyepieces = await getEyepieces('alice')
 *   const scope = scopes.get(1)
 *   if (scope && typeof scope.diameter === 'number') {
 *     const magnifications = calculateMagnifications(scope, eyepieces)
 *     const best = optimalDetectionMagnification(21.2, scope.diameter, {
 *       magnitude: 8.4, diameter1: 660, diameter2: 420,
 *     }, magnifications)
 *   }
 */

// ─── Photometry ───────────────────────────────────────────────────────────────

export {
  contrastReserve,
  optimalDetectionMagnification,
  surfaceBrightness,
  logThresholdContrast,
  contrastReserveCategory,
  rateContrastReserve,
  POINT_SOURCE_DIAMETER_ARCSEC,
} from './contrast/index.js'

export {
  sqmToNelm,
  nelmToSqm,
  sqmToBortle,
  nelmToBortle,
  bortleToSqm,
  bortleToNelm,
  isBortleClass,
  SQM_RANGE,
  NELM_RANGE,
} from './sky/index.js'

export {
  instrumentTypeToInt,
  instrumentTypeToString,
  isInstrumentTypeName,
  calculateMagnifications,
} from './instruments/index.js'

// ─── Equipment client ─────────────────────────────────────────────────────────

export {
  getInstruments,
  getEyepieces,
  getLenses,
  getFilters,
  getEquipment,
  parseEquipment,
  resolveClientOptions,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
} from './api/index.js'

export type { ResolvedClientOptions } from './api/index.js'

// ─── Errors & logging ─────────────────────────────────────────────────────────

export {
  DeepskyError,
  InvalidParameterError,
  UnknownInstrumentTypeError,
  AuthenticationError,
  ServerError,
  HttpStatusError,
  MalformedResponseError,
  TransportError,
  isDeepskyError,
} from './errors/index.js'

export type {
  DeepskyErrorKind,
  ComputationError,
  ClientError,
} from './errors/index.js'

export { configureLogging, getLogLevel, createLogger } from './logging/index.js'
export type { LogLevel, Logger } from './logging/index.js'

// ─── Types ────────────────────────────────────────────────────────────────────

export type {
  // Contrast reserve
  ContrastTarget,
  MagnitudeTarget,
  SurfaceBrightnessTarget,
  ContrastReserveCategory,
  ContrastReserveRating,
  // Sky
  BortleClass,
  // Instruments
  InstrumentTypeName,
  InstrumentTypeCode,
  // Equipment
  EquipmentResource,
  EquipmentRecord,
  InstrumentRecord,
  EyepieceRecord,
  LensRecord,
  FilterRecord,
  EquipmentMap,
  EquipmentByResource,
  // Configuration
  ClientOptions,
} from './types.js'

// ─── Constants ────────────────────────────────────────────────────────────────

export {
  CONTRAST_RESERVE_THRESHOLDS,
  CONTRAST_RESERVE_DESCRIPTIONS,
  BORTLE_SQM,
  BORTLE_NELM,
  INSTRUMENT_TYPES,
} from './types.js'

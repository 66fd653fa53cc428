// Detector types
export type {
  SignalDetector,
  ContentEnvelope,
  DetectionResult,
  DetectionMatch,
  GpsCoordinates,
} from './plugins/types.js';

// Shared types
export type {
  CaptionSignal,
  UploadSignal,
  SignalTag,
  RiskBand,
  BandThreshold,
  ScoringPolicy,
  DetectorOutcome,
  RiskFactors,
  RiskAssessment,
  Scorer,
} from './types/index.js';
export { RISK_BANDS } from './types/index.js';

// Scoring engine
export {
  createScorer,
  scoreCaption,
  scoreUpload,
  loadDetectors,
  runDetectors,
  aggregateOutcomes,
  mapScoreToBand,
  CAPTION_BANDS,
  UPLOAD_BANDS,
  CAPTION_SIGNAL_POLICY,
  UPLOAD_POLICY,
  RECOMMENDATIONS,
  MAX_RECOMMENDATIONS,
  finalizeRecommendations,
} from './scoring/index.js';

// Built-in detectors
export {
  CAPTION_DETECTORS,
  locationDetector,
  contactDetector,
  scheduleDetector,
  workplaceDetector,
} from './detectors/captionSignals.js';
export {
  UPLOAD_DETECTORS,
  emailDetector,
  phoneDetector,
  addressDetector,
  gpsDetector,
  isValidCoordinate,
} from './detectors/uploadSignals.js';

// Errors
export {
  RiskScanError,
  ConfigurationError,
  SessionNotFoundError,
  ExchangeError,
  RemoteApiError,
  NoIdentityError,
  ValidationError,
  NotFoundError,
  isRiskScanError,
} from './errors.js';
export type { RiskScanErrorCode } from './errors.js';

// Logging
export { createLogger, silentLogger, isLogLevel, describeError } from './logging.js';
export type { Logger, LoggerOptions, LogLevel } from './logging.js';

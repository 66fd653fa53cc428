import type { SignalTag } from '../types/index.js';

/**
 * Describes a location where a detection pattern was matched within content.
 */
export interface DetectionMatch {
  /** Identifier for the pattern that matched, e.g., "phone-number" */
  patternId: string;
  /** Character offset where the match starts */
  start: number;
  /** Character offset where the match ends */
  end: number;
  /** Redacted version of the matched text for safe logging */
  redacted: string;
}

/** Latitude/longitude pair, typically read from image EXIF metadata */
export interface GpsCoordinates {
  latitude: number;
  longitude: number;
}

/**
 * Envelope wrapping content for inspection by signal detectors.
 */
export interface ContentEnvelope {
  /** Caption text to analyze (empty string when the item has none) */
  text: string;
  /** Whether the caption came from platform ingestion or a direct upload */
  source: 'INGESTED' | 'UPLOAD';
  /** GPS position attached to an uploaded image, if any */
  gps?: GpsCoordinates | null;
}

/**
 * Result returned by a detector after analyzing content.
 */
export interface DetectionResult {
  /** How many times the signal occurred; the scoring policy decides how much that counts */
  occurrences: number;
  /** Locations of detected patterns within the content */
  matches: DetectionMatch[];
  /** Detector-specific data for debugging */
  summary: Record<string, unknown>;
}

/**
 * A single signal class detector. Detectors are synchronous and stateless;
 * several may report the same signal, in which case occurrences add up.
 */
export interface SignalDetector {
  /** Unique identifier, e.g., "caption-location-v1" */
  id: string;
  /** Signal tag this detector reports */
  signal: SignalTag;
  /** Lower values run first and determine detection order */
  priority: number;
  enabled: boolean;
  analyze(content: ContentEnvelope): DetectionResult;
}

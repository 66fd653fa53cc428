/**
 * Detectors for direct uploads: caption PII plus the GPS position read from
 * the image. Occurrences are counted; the upload policy caps them.
 */
import type {
  SignalDetector,
  ContentEnvelope,
  DetectionResult,
  GpsCoordinates,
} from '../plugins/types.js';
import {
  collectMatches,
  EMAIL_PATTERN,
  PHONE_PATTERN,
  STREET_ADDRESS_PATTERN,
} from './patterns.js';
import type { SignalPattern } from './patterns.js';

function countPattern(content: ContentEnvelope, pattern: SignalPattern): DetectionResult {
  const matches = collectMatches(content.text, [pattern]);
  return {
    occurrences: matches.length,
    matches,
    summary: { matchCount: matches.length },
  };
}

export const emailDetector: SignalDetector = {
  id: 'upload-email-v1',
  signal: 'email',
  priority: 10,
  enabled: true,
  analyze: (content) => countPattern(content, EMAIL_PATTERN),
};

export const phoneDetector: SignalDetector = {
  id: 'upload-phone-v1',
  signal: 'phone',
  priority: 20,
  enabled: true,
  analyze: (content) => countPattern(content, PHONE_PATTERN),
};

export const addressDetector: SignalDetector = {
  id: 'upload-address-v1',
  signal: 'address',
  priority: 30,
  enabled: true,
  analyze: (content) => countPattern(content, STREET_ADDRESS_PATTERN),
};

export function isValidCoordinate(gps: GpsCoordinates): boolean {
  return (
    Number.isFinite(gps.latitude) &&
    Number.isFinite(gps.longitude) &&
    Math.abs(gps.latitude) <= 90 &&
    Math.abs(gps.longitude) <= 180
  );
}

/** Reports one occurrence when the upload carries a usable GPS position */
export const gpsDetector: SignalDetector = {
  id: 'upload-gps-v1',
  signal: 'gps',
  priority: 40,
  enabled: true,

  analyze(content: ContentEnvelope): DetectionResult {
    const gps = content.gps;
    if (!gps || !isValidCoordinate(gps)) {
      return { occurrences: 0, matches: [], summary: { present: false } };
    }

    return {
      occurrences: 1,
      matches: [],
      summary: {
        present: true,
        position: `${gps.latitude.toFixed(6)},${gps.longitude.toFixed(6)}`,
      },
    };
  },
};

export const UPLOAD_DETECTORS: SignalDetector[] = [
  emailDetector,
  phoneDetector,
  addressDetector,
  gpsDetector,
];

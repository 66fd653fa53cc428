import type { RiskBand, ScoringPolicy, SignalTag } from '../types/index.js';
import { CAPTION_DETECTORS } from '../detectors/captionSignals.js';
import { UPLOAD_DETECTORS } from '../detectors/uploadSignals.js';
import { CAPTION_BANDS, UPLOAD_BANDS } from './bandMapper.js';

/** Upper bound on recommendations returned for a single assessment */
export const MAX_RECOMMENDATIONS = 4;

export const RECOMMENDATIONS = {
  generalize: 'Generalize locations and times: share where you were after you leave, not where you will be.',
  removeContact: 'Remove contact details (handles, phone numbers, email addresses) from the caption.',
  tightenPrivacy: 'Tighten account privacy settings so only approved followers can see your posts.',
  noIssues: 'No issues detected. Keep captions generic and avoid contact/location details.',
  uploadLow: 'Looks safe. Double-check caption for sensitive context.',
  uploadMedium: 'Remove contact details from caption (email/phone).',
  uploadHigh: 'Strip EXIF data and remove address/contacts before posting.',
} as const;

/**
 * Dedupes while keeping first occurrence order and caps the list.
 */
export function finalizeRecommendations(recommendations: string[]): string[] {
  return [...new Set(recommendations)].slice(0, MAX_RECOMMENDATIONS);
}

function recommendForCaption(detections: SignalTag[]): string[] {
  const found = new Set(detections);
  const recs: string[] = [];

  if (found.has('possible_location') || found.has('schedule_time')) {
    recs.push(RECOMMENDATIONS.generalize);
  }
  if (found.has('contact_info')) {
    recs.push(RECOMMENDATIONS.removeContact);
  }
  if (found.size > 0) {
    recs.push(RECOMMENDATIONS.tightenPrivacy);
  } else {
    recs.push(RECOMMENDATIONS.noIssues);
  }

  return recs;
}

function recommendForUpload(_detections: SignalTag[], band: RiskBand): string[] {
  switch (band) {
    case 'low':
      return [RECOMMENDATIONS.uploadLow];
    case 'medium':
      return [RECOMMENDATIONS.uploadMedium];
    case 'high':
      return [RECOMMENDATIONS.uploadHigh];
  }
}

/**
 * Presence-based policy for captions pulled from the connected platform.
 * Each class counts once; the total is not capped.
 */
export const CAPTION_SIGNAL_POLICY: ScoringPolicy = {
  id: 'caption-signals',
  detectors: CAPTION_DETECTORS,
  weights: {
    possible_location: 40,
    contact_info: 25,
    schedule_time: 20,
    workplace: 15,
  },
  occurrenceCap: 1,
  bands: CAPTION_BANDS,
  recommend: recommendForCaption,
};

/**
 * Count-based policy for directly uploaded captions and image GPS.
 * Each signal counts up to three times.
 */
export const UPLOAD_POLICY: ScoringPolicy = {
  id: 'upload-pii',
  detectors: UPLOAD_DETECTORS,
  weights: {
    email: 20,
    phone: 20,
    address: 30,
    gps: 40,
  },
  occurrenceCap: 3,
  bands: UPLOAD_BANDS,
  recommend: recommendForUpload,
};

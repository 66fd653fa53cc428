import type { ContentEnvelope, DetectionResult, SignalDetector } from '../plugins/types.js';

/** Signal classes detected in platform-ingested captions */
export type CaptionSignal = 'possible_location' | 'contact_info' | 'schedule_time' | 'workplace';

/** Signal classes detected in direct uploads (caption plus image metadata) */
export type UploadSignal = 'email' | 'phone' | 'address' | 'gps';

export type SignalTag = CaptionSignal | UploadSignal;

/** Severity band assigned from a numeric score */
export type RiskBand = 'low' | 'medium' | 'high';

export const RISK_BANDS: readonly RiskBand[] = ['low', 'medium', 'high'];

/**
 * Maps a score range to a band. `minScore` is inclusive,
 * `belowScore` exclusive; null means unbounded.
 */
export interface BandThreshold {
  band: RiskBand;
  minScore: number;
  belowScore: number | null;
}

/**
 * Weight table, occurrence cap, banding and recommendation rule used to
 * turn detector output into an assessment.
 */
export interface ScoringPolicy {
  /** Policy name, e.g. "caption-signals" */
  id: string;
  /** Detectors run for this policy */
  detectors: SignalDetector[];
  /** Points per occurrence of each signal; signals without a weight score 0 */
  weights: Partial<Record<SignalTag, number>>;
  /** Occurrences beyond this count add nothing (1 means presence only) */
  occurrenceCap: number;
  bands: BandThreshold[];
  /** Remediation advice in priority order */
  recommend(detections: SignalTag[], band: RiskBand): string[];
}

/**
 * Per-detector result bundled with the detector ID for traceability.
 */
export interface DetectorOutcome {
  detectorId: string;
  signal: SignalTag;
  result: DetectionResult;
  /** Set when the detector threw; the result is then empty */
  error?: string;
}

/** Derived metrics stored alongside a score */
export interface RiskFactors {
  captionLength: number;
  /** Reserved for cover-image OCR; always null for now */
  ocrCoverText: string | null;
}

/**
 * Full assessment of one caption under one policy.
 */
export interface RiskAssessment {
  score: number;
  band: RiskBand;
  factors: RiskFactors;
  /** Detected signal tags in detector priority order, without duplicates */
  detections: SignalTag[];
  /** At most four remediation strings */
  recommendations: string[];
  /** Human-readable breakdown of how the score was reached */
  reasons: string[];
}

/**
 * Scorer bound to a single policy.
 */
export interface Scorer {
  readonly policy: ScoringPolicy;
  assess(content: ContentEnvelope): RiskAssessment;
}

import type { BandThreshold, RiskBand } from '../types/index.js';

/** Bands for platform-ingested captions */
export const CAPTION_BANDS: BandThreshold[] = [
  { band: 'low',    minScore: 0,  belowScore: 20 },
  { band: 'medium', minScore: 20, belowScore: 50 },
  { band: 'high',   minScore: 50, belowScore: null },
];

/** Bands for direct uploads (caption plus image GPS) */
export const UPLOAD_BANDS: BandThreshold[] = [
  { band: 'low',    minScore: 0,  belowScore: 60 },
  { band: 'medium', minScore: 60, belowScore: 90 },
  { band: 'high',   minScore: 90, belowScore: null },
];

/**
 * Maps an aggregate score to a band using the provided thresholds.
 */
export function mapScoreToBand(
  score: number,
  thresholds: BandThreshold[] = CAPTION_BANDS,
): RiskBand {
  // Clamp negative scores to 0
  const clamped = Math.max(0, score);

  for (const threshold of thresholds) {
    const matchesMin = clamped >= threshold.minScore;
    const matchesMax = threshold.belowScore === null || clamped < threshold.belowScore;
    if (matchesMin && matchesMax) {
      return threshold.band;
    }
  }

  // Gaps in a custom table fall through to the most severe band
  return 'high';
}

import type { ContentEnvelope, GpsCoordinates } from '../plugins/types.js';
import type { RiskAssessment, Scorer, ScoringPolicy, SignalTag } from '../types/index.js';
import { loadDetectors } from './detectorLoader.js';
import { runDetectors, aggregateOutcomes } from './detectorRunner.js';
import { mapScoreToBand } from './bandMapper.js';
import { CAPTION_SIGNAL_POLICY, UPLOAD_POLICY, finalizeRecommendations } from './policies.js';

/**
 * Creates a scorer bound to one policy. Detectors are validated and ordered
 * once here; assess() itself is pure and deterministic.
 *
 * @throws Error if the policy's detectors fail validation or the cap is below 1
 */
export function createScorer(policy: ScoringPolicy): Scorer {
  const detectors = loadDetectors(policy.detectors);
  if (!Number.isInteger(policy.occurrenceCap) || policy.occurrenceCap < 1) {
    throw new Error(`Policy "${policy.id}" must have an occurrenceCap of at least 1`);
  }

  function assess(content: ContentEnvelope): RiskAssessment {
    const outcomes = runDetectors(detectors, content);
    const { occurrences, failures } = aggregateOutcomes(outcomes);

    let score = 0;
    const detections: SignalTag[] = [];
    const reasons: string[] = [];

    for (const [signal, count] of occurrences) {
      const weight = policy.weights[signal] ?? 0;
      const added = weight * Math.min(count, policy.occurrenceCap);
      score += added;
      detections.push(signal);
      reasons.push(`${signal.toUpperCase()} detected x${count} (+${added})`);
    }

    for (const detectorId of failures) {
      reasons.push(`${detectorId} failed`);
    }

    const band = mapScoreToBand(score, policy.bands);

    return {
      score,
      band,
      factors: {
        captionLength: Array.from(content.text).length,
        ocrCoverText: null,
      },
      detections,
      recommendations: finalizeRecommendations(policy.recommend(detections, band)),
      reasons,
    };
  }

  return { policy, assess };
}

const captionScorer = createScorer(CAPTION_SIGNAL_POLICY);
const uploadScorer = createScorer(UPLOAD_POLICY);

/**
 * Scores a caption pulled from the connected platform.
 * An absent caption scores like an empty one.
 */
export function scoreCaption(caption: string | null | undefined): RiskAssessment {
  return captionScorer.assess({ text: caption ?? '', source: 'INGESTED' });
}

/**
 * Scores a direct upload: caption text plus the image's GPS position, if any.
 */
export function scoreUpload(
  caption: string | null | undefined,
  gps?: GpsCoordinates | null,
): RiskAssessment {
  return uploadScorer.assess({ text: caption ?? '', source: 'UPLOAD', gps: gps ?? null });
}

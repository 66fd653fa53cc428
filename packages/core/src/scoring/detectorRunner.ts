import type { SignalDetector, ContentEnvelope, DetectionMatch } from '../plugins/types.js';
import type { DetectorOutcome, SignalTag } from '../types/index.js';

/**
 * Runs every detector against the envelope in order.
 * A detector that throws is recorded as zero occurrences with its error
 * message, so one broken pattern never hides the other signals.
 */
export function runDetectors(
  detectors: SignalDetector[],
  content: ContentEnvelope,
): DetectorOutcome[] {
  return detectors.map((detector): DetectorOutcome => {
    try {
      const result = detector.analyze(content);
      return { detectorId: detector.id, signal: detector.signal, result };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return {
        detectorId: detector.id,
        signal: detector.signal,
        result: { occurrences: 0, matches: [], summary: { error: message } },
        error: message,
      };
    }
  });
}

/**
 * Sums occurrences per signal, keeping the order in which signals first
 * appear, and combines matches from all detectors.
 */
export function aggregateOutcomes(outcomes: DetectorOutcome[]) {
  const occurrences = new Map<SignalTag, number>();
  const matches: DetectionMatch[] = [];
  const failures: string[] = [];

  for (const outcome of outcomes) {
    if (outcome.error !== undefined) {
      failures.push(outcome.detectorId);
      continue;
    }
    const count = outcome.result.occurrences;
    if (count > 0) {
      occurrences.set(outcome.signal, (occurrences.get(outcome.signal) ?? 0) + count);
    }
    matches.push(...outcome.result.matches);
  }

  return { occurrences, matches, failures };
}

import type { SignalDetector } from '../plugins/types.js';

/**
 * Validates and sorts detectors by priority (lower priority value = runs first).
 * Filters out disabled detectors and returns only enabled ones, sorted.
 *
 * @throws Error if any detector has a missing or empty id, no analyze(), or a duplicate id
 */
export function loadDetectors(detectors: SignalDetector[]): SignalDetector[] {
  for (const detector of detectors) {
    if (!detector.id || typeof detector.id !== 'string') {
      throw new Error(`Detector must have a non-empty string id`);
    }
    if (typeof detector.analyze !== 'function') {
      throw new Error(`Detector "${detector.id}" must implement analyze()`);
    }
  }

  const ids = new Set<string>();
  for (const detector of detectors) {
    if (ids.has(detector.id)) {
      throw new Error(`Duplicate detector id: "${detector.id}"`);
    }
    ids.add(detector.id);
  }

  return detectors
    .filter((d) => d.enabled)
    .sort((a, b) => a.priority - b.priority);
}

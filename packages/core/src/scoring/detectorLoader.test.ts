import { describe, it, expect } from 'vitest';
import { loadDetectors } from './detectorLoader.js';
import type { SignalDetector } from '../plugins/types.js';

function makeDetector(overrides: Partial<SignalDetector> & { id: string }): SignalDetector {
  return {
    signal: 'workplace',
    priority: 10,
    enabled: true,
    analyze: () => ({ occurrences: 0, matches: [], summary: {} }),
    ...overrides,
  };
}

describe('detectorLoader', () => {
  describe('loadDetectors', () => {
    it('returns enabled detectors sorted by priority', () => {
      const detectors = [
        makeDetector({ id: 'high', priority: 100 }),
        makeDetector({ id: 'low', priority: 1 }),
        makeDetector({ id: 'mid', priority: 50 }),
      ];
      const loaded = loadDetectors(detectors);
      expect(loaded.map((d) => d.id)).toEqual(['low', 'mid', 'high']);
    });

    it('filters out disabled detectors', () => {
      const detectors = [
        makeDetector({ id: 'enabled', enabled: true }),
        makeDetector({ id: 'disabled', enabled: false }),
      ];
      const loaded = loadDetectors(detectors);
      expect(loaded).toHaveLength(1);
      expect(loaded[0]!.id).toBe('enabled');
    });

    it('throws on duplicate detector ids', () => {
      const detectors = [makeDetector({ id: 'dup' }), makeDetector({ id: 'dup' })];
      expect(() => loadDetectors(detectors)).toThrow('Duplicate detector id: "dup"');
    });

    it('throws on empty detector id', () => {
      expect(() => loadDetectors([makeDetector({ id: '' })])).toThrow('non-empty string id');
    });

    it('throws on detector without analyze function', () => {
      const broken: Record<string, unknown> = { id: 'bad', signal: 'email', priority: 1, enabled: true };
      const detectors = [broken] as unknown as SignalDetector[];
      expect(() => loadDetectors(detectors)).toThrow('must implement analyze()');
    });

    it('does not reorder the caller array', () => {
      const detectors = [
        makeDetector({ id: 'b', priority: 2 }),
        makeDetector({ id: 'a', priority: 1 }),
      ];
      loadDetectors(detectors);
      expect(detectors.map((d) => d.id)).toEqual(['b', 'a']);
    });

    it('returns empty array for no detectors', () => {
      expect(loadDetectors([])).toEqual([]);
    });
  });
});

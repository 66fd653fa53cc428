import { describe, it, expect } from 'vitest';
import { createScorer, scoreCaption, scoreUpload } from './scorer.js';
import { CAPTION_BANDS } from './bandMapper.js';
import { CAPTION_SIGNAL_POLICY, RECOMMENDATIONS } from './policies.js';
import type { SignalDetector } from '../plugins/types.js';
import type { ScoringPolicy } from '../types/index.js';

function makeDetector(overrides: Partial<SignalDetector> & { id: string }): SignalDetector {
  return {
    signal: 'workplace',
    priority: 10,
    enabled: true,
    analyze: () => ({ occurrences: 0, matches: [], summary: {} }),
    ...overrides,
  };
}

function makePolicy(overrides: Partial<ScoringPolicy> = {}): ScoringPolicy {
  return {
    id: 'test-policy',
    detectors: [],
    weights: { workplace: 10, email: 5 },
    occurrenceCap: 1,
    bands: CAPTION_BANDS,
    recommend: () => [],
    ...overrides,
  };
}

describe('scoreCaption', () => {
  it('scores the campus shift caption as high', () => {
    const result = scoreCaption('Working a shift at the campus coffee shop, see you tonight near UNCC!');

    expect(result.detections).toEqual(['possible_location', 'schedule_time', 'workplace']);
    expect(result.score).toBe(75);
    expect(result.band).toBe('high');
    expect(result.factors).toEqual({ captionLength: 69, ocrCoverText: null });
    expect(result.recommendations).toEqual([
      RECOMMENDATIONS.generalize,
      RECOMMENDATIONS.tightenPrivacy,
    ]);
    expect(result.reasons).toEqual([
      'POSSIBLE_LOCATION detected x2 (+40)',
      'SCHEDULE_TIME detected x1 (+20)',
      'WORKPLACE detected x2 (+15)',
    ]);
  });

  it('scores a harmless caption as low with generic advice', () => {
    const result = scoreCaption('Had a great day!');

    expect(result.score).toBe(0);
    expect(result.band).toBe('low');
    expect(result.detections).toEqual([]);
    expect(result.recommendations).toEqual([
      'No issues detected. Keep captions generic and avoid contact/location details.',
    ]);
  });

  it('treats a missing caption as empty', () => {
    const result = scoreCaption(null);

    expect(result.score).toBe(0);
    expect(result.factors.captionLength).toBe(0);
    expect(result.recommendations).toEqual([RECOMMENDATIONS.noIssues]);
  });

  it('counts contact details once however many appear', () => {
    const result = scoreCaption('DM @jess_runs or text 704-555-0199');

    expect(result.detections).toEqual(['contact_info']);
    expect(result.score).toBe(25);
    expect(result.band).toBe('medium');
    expect(result.recommendations).toEqual([
      RECOMMENDATIONS.removeContact,
      RECOMMENDATIONS.tightenPrivacy,
    ]);
  });

  it('counts a weekday only together with a clock time', () => {
    expect(scoreCaption('Happy Friday!').detections).toEqual([]);
    expect(scoreCaption('Open mic Friday at 9pm').detections).toEqual(['schedule_time']);
  });

  it('does not cap the total score', () => {
    const result = scoreCaption('📍 uptown, text me at 704-555-0199, every Friday 6pm after my shift');

    expect(result.detections).toEqual([
      'possible_location',
      'contact_info',
      'schedule_time',
      'workplace',
    ]);
    expect(result.score).toBe(100);
    expect(result.band).toBe('high');
    expect(result.recommendations).toEqual([
      RECOMMENDATIONS.generalize,
      RECOMMENDATIONS.removeContact,
      RECOMMENDATIONS.tightenPrivacy,
    ]);
  });

  it('is deterministic for identical input', () => {
    const caption = 'Meet me at 1200 Elm Street every Tuesday';
    expect(scoreCaption(caption)).toEqual(scoreCaption(caption));
  });
});

describe('scoreUpload', () => {
  it('scores one phone and one email as 40 (low)', () => {
    const result = scoreUpload('Call me at 704-555-0199 or email a@b.com');

    expect(result.detections).toEqual(['email', 'phone']);
    expect(result.score).toBe(40);
    expect(result.band).toBe('low');
    expect(result.reasons).toEqual(['EMAIL detected x1 (+20)', 'PHONE detected x1 (+20)']);
    expect(result.recommendations).toEqual([RECOMMENDATIONS.uploadLow]);
  });

  it('caps each signal at three occurrences', () => {
    const result = scoreUpload('a@x.com b@x.com c@x.com d@x.com');

    expect(result.score).toBe(60);
    expect(result.band).toBe('medium');
    expect(result.reasons).toEqual(['EMAIL detected x4 (+60)']);
    expect(result.recommendations).toEqual([RECOMMENDATIONS.uploadMedium]);
  });

  it('adds the GPS weight when coordinates are present', () => {
    const result = scoreUpload('Home sweet home, 12 Main St', { latitude: 35.2271, longitude: -80.8431 });

    expect(result.detections).toEqual(['address', 'gps']);
    expect(result.score).toBe(70);
    expect(result.band).toBe('medium');
  });

  it('reaches high with address, GPS and email', () => {
    const result = scoreUpload('12 Main St, write to me@home.net', { latitude: 35.2271, longitude: -80.8431 });

    expect(result.score).toBe(90);
    expect(result.band).toBe('high');
    expect(result.recommendations).toEqual([RECOMMENDATIONS.uploadHigh]);
  });

  it('ignores out-of-range coordinates', () => {
    const result = scoreUpload('', { latitude: 120, longitude: 10 });

    expect(result.score).toBe(0);
    expect(result.detections).toEqual([]);
  });
});

describe('createScorer', () => {
  it('applies the policy weights and bands', () => {
    const scorer = createScorer(
      makePolicy({
        detectors: [
          makeDetector({ id: 'w', analyze: () => ({ occurrences: 3, matches: [], summary: {} }) }),
        ],
      }),
    );

    const result = scorer.assess({ text: 'x', source: 'INGESTED' });
    expect(result.score).toBe(10);
    expect(result.band).toBe('low');
  });

  it('scores signals without a weight as zero but still reports them', () => {
    const scorer = createScorer(
      makePolicy({
        detectors: [
          makeDetector({
            id: 'gps',
            signal: 'gps',
            analyze: () => ({ occurrences: 1, matches: [], summary: {} }),
          }),
        ],
      }),
    );

    const result = scorer.assess({ text: '', source: 'UPLOAD' });
    expect(result.score).toBe(0);
    expect(result.detections).toEqual(['gps']);
  });

  it('degrades a failing detector to no detection', () => {
    const scorer = createScorer(
      makePolicy({
        detectors: [
          makeDetector({
            id: 'broken',
            analyze: () => {
              throw new Error('bad pattern');
            },
          }),
          makeDetector({
            id: 'email',
            signal: 'email',
            priority: 20,
            analyze: () => ({ occurrences: 1, matches: [], summary: {} }),
          }),
        ],
      }),
    );

    const result = scorer.assess({ text: 'x', source: 'UPLOAD' });
    expect(result.detections).toEqual(['email']);
    expect(result.score).toBe(5);
    expect(result.reasons).toEqual(['EMAIL detected x1 (+5)', 'broken failed']);
  });

  it('dedupes and caps recommendations at four', () => {
    const scorer = createScorer(
      makePolicy({ recommend: () => ['a', 'a', 'b', 'c', 'd', 'e'] }),
    );

    const result = scorer.assess({ text: '', source: 'INGESTED' });
    expect(result.recommendations).toEqual(['a', 'b', 'c', 'd']);
  });

  it('rejects an occurrence cap below one', () => {
    expect(() => createScorer(makePolicy({ occurrenceCap: 0 }))).toThrow('occurrenceCap of at least 1');
  });

  it('exposes the policy it was built with', () => {
    expect(createScorer(CAPTION_SIGNAL_POLICY).policy.id).toBe('caption-signals');
  });
});

import { describe, it, expect } from 'vitest';
import {
  UPLOAD_DETECTORS,
  emailDetector,
  phoneDetector,
  addressDetector,
  gpsDetector,
  isValidCoordinate,
} from './uploadSignals.js';
import { collectMatches, redactEmail, redactPhone, redactWord, EMAIL_PATTERN } from './patterns.js';
import type { ContentEnvelope, GpsCoordinates } from '../plugins/types.js';

function envelope(text: string, gps?: GpsCoordinates | null): ContentEnvelope {
  return { text, source: 'UPLOAD', gps };
}

describe('uploadSignals', () => {
  it('lists the detectors in priority order', () => {
    expect(UPLOAD_DETECTORS.map((d) => d.id)).toEqual([
      'upload-email-v1',
      'upload-phone-v1',
      'upload-address-v1',
      'upload-gps-v1',
    ]);
  });

  it('counts every email address', () => {
    expect(emailDetector.analyze(envelope('a@b.com and c@d.org')).occurrences).toBe(2);
  });

  it('counts dotted phone numbers', () => {
    expect(phoneDetector.analyze(envelope('call 704.555.0199')).occurrences).toBe(1);
  });

  it('counts street addresses', () => {
    expect(addressDetector.analyze(envelope('I live at 42 Oak Avenue')).occurrences).toBe(1);
  });

  describe('gpsDetector', () => {
    it('reports a valid position once', () => {
      const result = gpsDetector.analyze(envelope('', { latitude: 35.2271, longitude: -80.8431 }));

      expect(result.occurrences).toBe(1);
      expect(result.summary).toEqual({ present: true, position: '35.227100,-80.843100' });
    });

    it('reports nothing without a position', () => {
      const result = gpsDetector.analyze(envelope('', null));

      expect(result.occurrences).toBe(0);
      expect(result.summary).toEqual({ present: false });
    });

    it('rejects non-finite coordinates', () => {
      expect(gpsDetector.analyze(envelope('', { latitude: Number.NaN, longitude: 0 })).occurrences).toBe(0);
    });
  });

  describe('isValidCoordinate', () => {
    it('accepts the range boundaries', () => {
      expect(isValidCoordinate({ latitude: 90, longitude: 180 })).toBe(true);
      expect(isValidCoordinate({ latitude: -90, longitude: -180 })).toBe(true);
    });

    it('rejects values outside the range', () => {
      expect(isValidCoordinate({ latitude: -90.1, longitude: 0 })).toBe(false);
      expect(isValidCoordinate({ latitude: 0, longitude: 180.5 })).toBe(false);
    });
  });
});

describe('patterns', () => {
  it('redacts emails to a prefix and the domain', () => {
    expect(redactEmail('alice@example.com')).toBe('al***@example.com');
    expect(redactEmail('bad')).toBe('***@***.***');
  });

  it('masks short phone fragments entirely', () => {
    expect(redactPhone('12')).toBe('***');
  });

  it('masks all but the first character of a word', () => {
    expect(redactWord('a')).toBe('*');
    expect(redactWord('jess')).toBe('j***');
  });

  it('gives the same matches on repeated calls', () => {
    const first = collectMatches('x@y.io', [EMAIL_PATTERN]);
    const second = collectMatches('x@y.io', [EMAIL_PATTERN]);

    expect(first).toEqual([{ patternId: 'email-address', start: 0, end: 6, redacted: 'x***@y.io' }]);
    expect(second).toEqual(first);
  });
});

/**
 * Caption signal detectors for platform-ingested content.
 *
 * Four independent classes: location, contact, schedule and workplace.
 * Patterns are intentionally lightweight; they flag captions worth a second
 * look rather than prove an exposure.
 */
import type {
  SignalDetector,
  ContentEnvelope,
  DetectionResult,
  DetectionMatch,
} from '../plugins/types.js';
import {
  collectMatches,
  keepAsIs,
  redactWord,
  EMAIL_PATTERN,
  PHONE_PATTERN,
  STREET_ADDRESS_PATTERN,
} from './patterns.js';
import type { SignalPattern } from './patterns.js';

const PLACE_NAMES = [
  'uncc',
  'uptown',
  'downtown',
  'south end',
  'noda',
  'plaza midwood',
  'dilworth',
  'ballantyne',
  'university city',
  'campus',
  'dorm',
];

function placeNameRegex(names: string[]): RegExp {
  const alternatives = names.map((name) => name.replace(/\s+/g, '\\s+')).join('|');
  return new RegExp(`\\b(?:${alternatives})\\b`, 'gi');
}

const LOCATION_PATTERNS: SignalPattern[] = [
  {
    id: 'place-name',
    description: 'Known place name or neighborhood abbreviation',
    regex: placeNameRegex(PLACE_NAMES),
    redact: keepAsIs,
  },
  {
    id: 'pin-emoji',
    description: 'Location pin emoji',
    regex: /\u{1F4CD}/gu,
    redact: keepAsIs,
  },
  STREET_ADDRESS_PATTERN,
];

const CONTACT_PATTERNS: SignalPattern[] = [
  {
    id: 'handle-mention',
    description: 'Account handle mention',
    regex: /(?<![\w.])@[A-Za-z0-9_.]{2,30}/g,
    redact: (text) => '@' + redactWord(text.slice(1)),
  },
  PHONE_PATTERN,
  EMAIL_PATTERN,
];

const SCHEDULE_KEYWORDS: SignalPattern = {
  id: 'schedule-keyword',
  description: 'Recurring or same-day plan',
  regex: /\b(?:every|tonight)\b/gi,
  redact: keepAsIs,
};

const WEEKDAY: SignalPattern = {
  id: 'weekday',
  description: 'Weekday name',
  regex: /\b(?:mon|tues|wednes|thurs|fri|satur|sun)days?\b/gi,
  redact: keepAsIs,
};

const CLOCK_TIME: SignalPattern = {
  id: 'clock-time',
  description: 'Clock time',
  regex: /\b(?:(?:1[0-2]|0?[1-9])(?::[0-5]\d)?\s?(?:am|pm)|(?:[01]?\d|2[0-3]):[0-5]\d)\b/gi,
  redact: keepAsIs,
};

const WORKPLACE_PATTERNS: SignalPattern[] = [
  {
    id: 'work-vocabulary',
    description: 'Job and shift vocabulary',
    regex: /\b(?:shifts?|work(?:ing)?|job|office|boss|co-?workers?|manager|clock(?:ing)?\s+in)\b/gi,
    redact: keepAsIs,
  },
];

function resultFrom(matches: DetectionMatch[], patternsChecked: number): DetectionResult {
  return {
    occurrences: matches.length,
    matches,
    summary: { patternsChecked, matchCount: matches.length },
  };
}

function patternDetector(
  id: string,
  signal: SignalDetector['signal'],
  priority: number,
  patterns: SignalPattern[],
): SignalDetector {
  return {
    id,
    signal,
    priority,
    enabled: true,
    analyze(content: ContentEnvelope): DetectionResult {
      return resultFrom(collectMatches(content.text, patterns), patterns.length);
    },
  };
}

export const locationDetector = patternDetector(
  'caption-location-v1',
  'possible_location',
  10,
  LOCATION_PATTERNS,
);

export const contactDetector = patternDetector(
  'caption-contact-v1',
  'contact_info',
  20,
  CONTACT_PATTERNS,
);

/**
 * A weekday only counts together with a clock time ("friday at 9pm");
 * "every" and "tonight" count on their own.
 */
export const scheduleDetector: SignalDetector = {
  id: 'caption-schedule-v1',
  signal: 'schedule_time',
  priority: 30,
  enabled: true,

  analyze(content: ContentEnvelope): DetectionResult {
    const matches = collectMatches(content.text, [SCHEDULE_KEYWORDS]);
    const weekdays = collectMatches(content.text, [WEEKDAY]);
    const times = collectMatches(content.text, [CLOCK_TIME]);

    if (weekdays.length > 0 && times.length > 0) {
      matches.push(...weekdays, ...times);
    }

    return resultFrom(matches, 3);
  },
};

export const workplaceDetector = patternDetector(
  'caption-workplace-v1',
  'workplace',
  40,
  WORKPLACE_PATTERNS,
);

export const CAPTION_DETECTORS: SignalDetector[] = [
  locationDetector,
  contactDetector,
  scheduleDetector,
  workplaceDetector,
];

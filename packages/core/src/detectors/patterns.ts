import type { DetectionMatch } from '../plugins/types.js';

/** A regex pattern with its redaction rule */
export interface SignalPattern {
  id: string;
  description: string;
  /** Must carry the `g` flag */
  regex: RegExp;
  redact: (text: string) => string;
}

/** Redact an email address: show first 2 chars + domain */
export function redactEmail(email: string): string {
  const [local, domain] = email.split('@');
  if (!local || !domain) return '***@***.***';
  const prefix = local.slice(0, 2);
  return `${prefix}***@${domain}`;
}

/** Redact a phone number: show last 4 digits */
export function redactPhone(phone: string): string {
  const digits = phone.replace(/\D/g, '');
  if (digits.length < 4) return '***';
  return '***-***-' + digits.slice(-4);
}

/** Keep the first character and mask the rest */
export function redactWord(text: string): string {
  if (text.length <= 1) return '*';
  return text.slice(0, 1) + '*'.repeat(text.length - 1);
}

export function keepAsIs(text: string): string {
  return text;
}

/**
 * Run every pattern over the text and collect all matches in pattern order.
 */
export function collectMatches(text: string, patterns: SignalPattern[]): DetectionMatch[] {
  const matches: DetectionMatch[] = [];

  for (const pattern of patterns) {
    pattern.regex.lastIndex = 0;

    let match: RegExpExecArray | null;
    while ((match = pattern.regex.exec(text)) !== null) {
      const matchedText = match[0];
      matches.push({
        patternId: pattern.id,
        start: match.index,
        end: match.index + matchedText.length,
        redacted: pattern.redact(matchedText),
      });
    }
  }

  return matches;
}

/** Email-shaped token */
export const EMAIL_PATTERN: SignalPattern = {
  id: 'email-address',
  description: 'Email address',
  regex: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
  redact: redactEmail,
};

/** US phone number in the usual separators, optional country code */
export const PHONE_PATTERN: SignalPattern = {
  id: 'phone-number',
  description: 'Phone-number-shaped digit group',
  regex: /\b(?:\+?1[-.\s]?)?(?:\(?\d{3}\)?[-.\s]?)?\d{3}[-.\s]?\d{4}\b/g,
  redact: redactPhone,
};

/** House number, street name and a street suffix */
export const STREET_ADDRESS_PATTERN: SignalPattern = {
  id: 'street-address',
  description: 'Street number followed by a street name',
  regex: /\b\d{1,5}\s+[A-Za-z0-9.'-]+\s+(?:St|Street|Ave|Avenue|Rd|Road|Blvd|Lane|Ln|Drive|Dr|Court|Ct)\b/gi,
  redact: (text) => text.replace(/^\d+/, '***'),
};

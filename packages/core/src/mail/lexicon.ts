import { readFileSync } from 'node:fs';
import { LexiconError } from '../errors.js';

/**
 * Phrase and domain lists the feature extractor matches against. Versioned so
 * a deployment can swap or extend them without touching scoring.
 */
export interface DetectionLexicon {
  version: string;
  suspiciousPhrases: readonly string[];
  trustPhrases: readonly string[];
  /** Low-trust TLD suffixes, matched as substrings */
  suspiciousTlds: readonly string[];
  /** Urgency terms, matched case-insensitively on word boundaries */
  urgencyTerms: readonly string[];
}

export const DEFAULT_LEXICON: DetectionLexicon = {
  version: '2024.1',
  suspiciousPhrases: [
    'verify your account',
    'update your password',
    'urgent action required',
    'suspended',
    'click here',
    'login now',
    'bank account',
    'invoice attached',
    'verify identity',
    'account locked',
    'security alert',
    'confirm your identity',
    'act now',
    'limited time',
    'expires soon',
    'click below',
    'verify now',
    'unusual activity',
    'verify payment',
    'update payment',
  ],
  trustPhrases: [
    'newsletter',
    'receipt',
    'schedule',
    'meeting',
    'thank you',
    'invoice number',
    'order confirmation',
    'shipping',
    'tracking',
    'delivery',
  ],
  suspiciousTlds: ['.tk', '.ml', '.ga', '.cf', '.gq', '.xyz', '.top', '.click', '.download'],
  urgencyTerms: ['urgent', 'immediate', 'asap', 'now', 'expire', 'limited', 'act now', 'verify now'],
};

function stringList(record: Record<string, unknown>, key: string): string[] {
  const value = record[key];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string' && v.length > 0)) {
    throw new LexiconError(`lexicon.${key} must be an array of non-empty strings`);
  }
  return value.map((s) => s.toLowerCase());
}

/** Validates an untrusted lexicon object. Entries are lower-cased on the way in. */
export function parseLexicon(value: unknown): DetectionLexicon {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new LexiconError('lexicon must be a JSON object');
  }
  const record: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  const version = record.version;
  if (typeof version !== 'string' || !version) {
    throw new LexiconError('lexicon.version must be a non-empty string');
  }
  return {
    version,
    suspiciousPhrases: stringList(record, 'suspiciousPhrases'),
    trustPhrases: stringList(record, 'trustPhrases'),
    suspiciousTlds: stringList(record, 'suspiciousTlds'),
    urgencyTerms: stringList(record, 'urgencyTerms'),
  };
}

export function loadLexicon(path: string): DetectionLexicon {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new LexiconError(`Cannot read lexicon file ${path}`, { cause: err });
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new LexiconError(`Lexicon file ${path} is not valid JSON`, { cause: err });
  }
  return parseLexicon(json);
}

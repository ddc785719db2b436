import { DEFAULT_LEXICON, type DetectionLexicon } from './lexicon.js';
import type { EmailContent, EmailFeatures } from './types.js';

// --- Compiled regex patterns ---

const RE_URL = /https?:\/\/(?:[a-zA-Z0-9$-_@.&+!*\\(),]|%[0-9a-fA-F]{2})+/g;
const RE_TAG = /<[^>]+>/g;
const RE_LINK_TAG_WITH_TEXT = /<a[^>]+href=["']([^"']+)["'][^>]*>([^<]+)<\/a>/gi;
const RE_ADDRESS_DOMAIN = /@([\w.-]+)/;
const RE_UPPERCASE = /\p{Lu}/u;
// Authority of an absolute or protocol-relative URL, userinfo and port included
const RE_NETLOC = /^(?:[a-z][a-z0-9+.-]*:)?\/\/([^/?#]*)/i;

// Run-length heuristics standing in for a dictionary check
const UNUSUAL_PATTERNS = [/[a-z]{15,}/g, /[A-Z]{5,}/g, /[0-9]{4,}/g];

const UPPERCASE_SAMPLE_LENGTH = 1000;

const urgencyCache = new WeakMap<DetectionLexicon, RegExp[]>();

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function urgencyPatterns(lexicon: DetectionLexicon): RegExp[] {
  let patterns = urgencyCache.get(lexicon);
  if (!patterns) {
    // Word boundaries that treat any letter or digit as part of a word, not just ASCII
    patterns = lexicon.urgencyTerms.map(
      (term) => new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(term)}(?![\\p{L}\\p{N}_])`, 'giu'),
    );
    urgencyCache.set(lexicon, patterns);
  }
  return patterns;
}

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

function countChar(text: string, char: string): number {
  return text.split(char).length - 1;
}

export function countHits(text: string, phrases: readonly string[]): number {
  let count = 0;
  for (const phrase of phrases) {
    if (text.includes(phrase)) count++;
  }
  return count;
}

export function extractUrls(text: string): string[] {
  return text.match(RE_URL) ?? [];
}

export function extractDomain(address: string): string {
  return RE_ADDRESS_DOMAIN.exec(address)?.[1] ?? '';
}

/** Relative and scheme-only hrefs have no authority and yield ''. */
function netlocOf(href: string): string {
  return RE_NETLOC.exec(href)?.[1].toLowerCase() ?? '';
}

/**
 * Flags `<a href="X">TEXT</a>` where TEXT shows a URL that does not mention
 * the host X points to. Tag matching is approximate; obfuscated markup can
 * slip past it.
 */
export function hasLinkTextMismatch(html: string): boolean {
  for (const match of html.matchAll(RE_LINK_TAG_WITH_TEXT)) {
    const host = netlocOf(match[1]);
    const text = match[2].toLowerCase();
    if (text.includes('http') && !text.includes(host)) return true;
  }
  return false;
}

export function uppercaseRatio(text: string): number {
  const sample = Array.from(text).slice(0, UPPERCASE_SAMPLE_LENGTH);
  if (sample.length === 0) return 0;
  const upper = sample.filter((c) => RE_UPPERCASE.test(c)).length;
  return clamp01(upper / sample.length);
}

export function estimateSpellingErrors(text: string): number {
  let errors = 0;
  for (const pattern of UNUSUAL_PATTERNS) errors += countMatches(text, pattern);
  const words = text.split(/\s+/).filter(Boolean).length;
  return clamp01((errors / Math.max(1, words)) * 0.1);
}

export function countUrgencyWords(text: string, lexicon: DetectionLexicon = DEFAULT_LEXICON): number {
  let count = 0;
  for (const pattern of urgencyPatterns(lexicon)) count += countMatches(text, pattern);
  return count;
}

function isSuspiciousHost(value: string, lexicon: DetectionLexicon): boolean {
  const lower = value.toLowerCase();
  return lexicon.suspiciousTlds.some((tld) => lower.includes(tld));
}

/**
 * Computes the fixed feature record for one message. Keyword and urgency
 * matching run on the normalized text; URLs, punctuation, casing and markup
 * are read from the original body.
 *
 * `lowerHeaders` is accepted so header-based signals can be added without
 * changing callers; none read it today.
 */
export function extractFeatures(
  content: EmailContent,
  normalizedBody: string,
  normalizedSubject: string,
  _lowerHeaders: string,
  lexicon: DetectionLexicon = DEFAULT_LEXICON,
): EmailFeatures {
  const combined = `${normalizedBody} ${normalizedSubject}`;
  const body = content.body;
  const subject = content.subject ?? '';

  const urls = extractUrls(body);
  const bodyLength = Array.from(body).length;

  const fromDomain = content.fromAddress !== undefined ? extractDomain(content.fromAddress) : '';
  const replyToDifferent =
    content.fromAddress !== undefined &&
    content.replyTo !== undefined &&
    extractDomain(content.replyTo) !== fromDomain;

  return {
    suspiciousKeywordCount: countHits(combined, lexicon.suspiciousPhrases),
    trustKeywordCount: countHits(combined, lexicon.trustPhrases),
    urlCount: urls.length,
    suspiciousDomainCount: urls.filter((url) => isSuspiciousHost(url, lexicon)).length,
    exclamationCount: countChar(body, '!') + countChar(subject, '!'),
    questionCount: countChar(body, '?') + countChar(subject, '?'),
    uppercaseRatio: uppercaseRatio(body),
    bodyLength,
    subjectLength: Array.from(subject).length,
    hasHtml: content.htmlBody !== undefined || body.toLowerCase().includes('<html'),
    htmlRatio: bodyLength > 0 ? clamp01(countMatches(body, RE_TAG) / bodyLength) : 0,
    linkTextMismatch: hasLinkTextMismatch(body),
    fromDomainSuspicious: fromDomain !== '' && isSuspiciousHost(fromDomain, lexicon),
    replyToDifferent,
    urgencyWords: countUrgencyWords(combined, lexicon),
    spellingErrorsEstimate: estimateSpellingErrors(normalizedBody),
  };
}

import { formatHighlight, getCatalog, type HighlightKind } from './messages.js';
import { fixedWeightProvider, type WeightProvider, type WeightTable } from './weights.js';
import type { AnalysisInsight, EmailFeatures, Locale, ScoreResult, Verdict } from './types.js';

// --- Types ---

interface Signal {
  weight: keyof Omit<WeightTable, 'base'>;
  /** Saturating strength of the signal in 0..1 */
  strength: (f: EmailFeatures) => number;
  /** -1 for trust signals, which lower the score */
  direction: 1 | -1;
}

interface HighlightRule {
  kind: HighlightKind;
  test: (f: EmailFeatures) => boolean;
  params?: (f: EmailFeatures) => number[];
}

export interface ScoreOptions {
  weights?: WeightProvider;
  locale?: Locale;
}

export const PHISHING_THRESHOLD = 0.5;

const flag = (value: boolean): number => (value ? 1 : 0);
const saturate = (value: number): number => Math.min(1, value);

// --- Signal definitions ---

const SIGNALS: Signal[] = [
  { weight: 'suspiciousKeywords', direction: 1, strength: (f) => saturate(f.suspiciousKeywordCount / 5) },
  { weight: 'urlCount', direction: 1, strength: (f) => saturate(f.urlCount / 3) },
  { weight: 'suspiciousDomains', direction: 1, strength: (f) => saturate(f.suspiciousDomainCount / 2) },
  { weight: 'exclamation', direction: 1, strength: (f) => saturate(f.exclamationCount / 5) },
  { weight: 'uppercaseRatio', direction: 1, strength: (f) => saturate(f.uppercaseRatio * 2) },
  { weight: 'htmlRatio', direction: 1, strength: (f) => saturate(f.htmlRatio * 10) },
  { weight: 'linkMismatch', direction: 1, strength: (f) => flag(f.linkTextMismatch) },
  { weight: 'suspiciousFrom', direction: 1, strength: (f) => flag(f.fromDomainSuspicious) },
  { weight: 'replyDifferent', direction: 1, strength: (f) => flag(f.replyToDifferent) },
  { weight: 'urgency', direction: 1, strength: (f) => saturate(f.urgencyWords / 3) },
  { weight: 'spelling', direction: 1, strength: (f) => saturate(f.spellingErrorsEstimate) },
  { weight: 'trustKeywords', direction: -1, strength: (f) => saturate(f.trustKeywordCount / 3) },
];

// Order here is the order highlights are reported in
const HIGHLIGHT_RULES: HighlightRule[] = [
  { kind: 'suspicious_keywords', test: (f) => f.suspiciousKeywordCount > 0, params: (f) => [f.suspiciousKeywordCount] },
  { kind: 'suspicious_domains', test: (f) => f.suspiciousDomainCount > 0, params: (f) => [f.suspiciousDomainCount] },
  { kind: 'many_urls', test: (f) => f.urlCount > 3, params: (f) => [f.urlCount] },
  { kind: 'link_mismatch', test: (f) => f.linkTextMismatch },
  { kind: 'from_domain_suspicious', test: (f) => f.fromDomainSuspicious },
  { kind: 'reply_to_different', test: (f) => f.replyToDifferent },
  { kind: 'excessive_urgency', test: (f) => f.urgencyWords > 2 },
  { kind: 'trust_signals', test: (f) => f.trustKeywordCount > 0, params: (f) => [f.trustKeywordCount] },
];

// --- Scoring ---

export function computeScore(features: EmailFeatures, weights: WeightTable = fixedWeightProvider.getWeights()): number {
  let score = weights.base;
  for (const signal of SIGNALS) {
    score += signal.direction * signal.strength(features) * Math.abs(weights[signal.weight]);
  }
  return Math.max(0, Math.min(1, score));
}

export function verdictFor(score: number): Verdict {
  return score >= PHISHING_THRESHOLD ? 'phishing' : 'legitimate';
}

/** Distance from the decision boundary, rescaled so the boundary is 0 and either extreme is 1. */
export function confidenceFor(score: number): number {
  return Math.abs(score - PHISHING_THRESHOLD) * 2;
}

export function buildHighlights(features: EmailFeatures, locale: Locale = 'en'): string[] {
  return HIGHLIGHT_RULES
    .filter((rule) => rule.test(features))
    .map((rule) => formatHighlight(rule.kind, rule.params?.(features) ?? [], locale));
}

/**
 * The six display records, always in the same order. Their weights are
 * advisory and computed apart from the score.
 */
export function buildInsights(features: EmailFeatures, locale: Locale = 'en'): AnalysisInsight[] {
  const describe = getCatalog(locale).insights;
  return [
    {
      name: 'suspicious_keywords',
      value: features.suspiciousKeywordCount,
      weight: saturate(features.suspiciousKeywordCount * 0.2),
      description: describe.suspicious_keywords,
    },
    {
      name: 'url_count',
      value: features.urlCount,
      weight: saturate(features.urlCount * 0.15),
      description: describe.url_count,
    },
    {
      name: 'suspicious_domains',
      value: features.suspiciousDomainCount,
      weight: saturate(features.suspiciousDomainCount * 0.3),
      description: describe.suspicious_domains,
    },
    {
      name: 'link_mismatch',
      value: flag(features.linkTextMismatch),
      weight: features.linkTextMismatch ? 0.15 : 0,
      description: describe.link_mismatch,
    },
    {
      name: 'from_domain_suspicious',
      value: flag(features.fromDomainSuspicious),
      weight: features.fromDomainSuspicious ? 0.12 : 0,
      description: describe.from_domain_suspicious,
    },
    {
      name: 'trust_signals',
      value: features.trustKeywordCount,
      weight: saturate(features.trustKeywordCount * 0.15),
      description: describe.trust_signals,
    },
  ];
}

export function scoreFeatures(features: EmailFeatures, options: ScoreOptions = {}): ScoreResult {
  const weights = (options.weights ?? fixedWeightProvider).getWeights();
  return {
    score: computeScore(features, weights),
    highlights: buildHighlights(features, options.locale),
    insights: buildInsights(features, options.locale),
  };
}

export type Verdict = 'phishing' | 'legitimate';

export type Locale = 'en' | 'ar';

/** Decoded email, built fresh for every analysis call. */
export interface EmailContent {
  subject?: string;
  body: string;
  rawHeaders?: string;
  fromAddress?: string;
  replyTo?: string;
  toAddresses: string[];
  htmlBody?: string;
}

export interface EmailFeatures {
  suspiciousKeywordCount: number;
  trustKeywordCount: number;
  urlCount: number;
  suspiciousDomainCount: number;
  exclamationCount: number;
  questionCount: number;
  /** Upper-case letters among the first 1000 characters of the body, 0..1 */
  uppercaseRatio: number;
  bodyLength: number;
  subjectLength: number;
  hasHtml: boolean;
  /** Tag-like substrings per body character, 0..1 */
  htmlRatio: number;
  linkTextMismatch: boolean;
  fromDomainSuspicious: boolean;
  replyToDifferent: boolean;
  urgencyWords: number;
  spellingErrorsEstimate: number;
}

export type InsightName =
  | 'suspicious_keywords'
  | 'url_count'
  | 'suspicious_domains'
  | 'link_mismatch'
  | 'from_domain_suspicious'
  | 'trust_signals';

export interface AnalysisInsight {
  name: InsightName;
  value: number;
  /** Display-only importance in 0..1. Never feeds back into the score. */
  weight?: number;
  description?: string;
}

export interface ScoreResult {
  score: number;
  highlights: string[];
  insights: AnalysisInsight[];
}

/** Absent values are sent as null so every key stays on the wire. */
export interface EmailMetadata {
  subject: string | null;
  from_address: string | null;
  reply_to: string | null;
  to_addresses: string[];
}

export interface AnalysisResponse {
  verdict: Verdict;
  confidence: number;
  model_version: string;
  metadata: EmailMetadata;
  highlights: string[];
  insights: AnalysisInsight[];
}

export interface AnalyzeTextInput {
  body: string;
  subject?: string;
  headers?: string;
}

// @phishlens/core — Public API

// Config
export { resolveConfig, type PhishLensConfig, type PhishLensConfigOverrides } from './config.js';

// Errors & logging
export { MalformedMessageError, LexiconError } from './errors.js';
export { debug } from './debug.js';

// Analysis pipeline
export {
  EmailAnalyzer,
  createAnalyzer,
  createAnalyzerFromConfig,
  DEFAULT_MODEL_VERSION,
  type EmailAnalyzerOptions,
} from './mail/analyzer.js';
export { decodeMessage } from './mail/decoder.js';
export { normalizeText, stripMarkup } from './mail/normalizer.js';
export {
  extractFeatures,
  extractUrls,
  extractDomain,
  countHits,
  countUrgencyWords,
  hasLinkTextMismatch,
  uppercaseRatio,
  estimateSpellingErrors,
} from './mail/features.js';
export {
  scoreFeatures,
  computeScore,
  verdictFor,
  confidenceFor,
  buildHighlights,
  buildInsights,
  PHISHING_THRESHOLD,
  type ScoreOptions,
} from './mail/scoring.js';
export { FIXED_WEIGHTS, fixedWeightProvider, type WeightTable, type WeightProvider } from './mail/weights.js';
export { DEFAULT_LEXICON, loadLexicon, parseLexicon, type DetectionLexicon } from './mail/lexicon.js';
export {
  getCatalog,
  formatHighlight,
  formatTemplate,
  isLocale,
  SUPPORTED_LOCALES,
  type HighlightKind,
  type MessageCatalog,
} from './mail/messages.js';
export type {
  EmailContent,
  EmailFeatures,
  ScoreResult,
  AnalysisInsight,
  InsightName,
  AnalysisResponse,
  AnalyzeTextInput,
  EmailMetadata,
  Verdict,
  Locale,
} from './mail/types.js';

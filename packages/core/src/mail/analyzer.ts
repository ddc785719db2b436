import type { PhishLensConfig } from '../config.js';
import { debug } from '../debug.js';
import { decodeMessage } from './decoder.js';
import { extractFeatures } from './features.js';
import { DEFAULT_LEXICON, loadLexicon, type DetectionLexicon } from './lexicon.js';
import { normalizeText } from './normalizer.js';
import { confidenceFor, scoreFeatures, verdictFor } from './scoring.js';
import { fixedWeightProvider, type WeightProvider } from './weights.js';
import type { AnalysisResponse, AnalyzeTextInput, EmailContent, Locale } from './types.js';

export const DEFAULT_MODEL_VERSION = '0.1.0-ml';

const RE_HTML_DOCUMENT = /<html|<body/i;

export interface EmailAnalyzerOptions {
  modelVersion?: string;
  locale?: Locale;
  lexicon?: DetectionLexicon;
  weights?: WeightProvider;
}

/**
 * Runs the normalize → extract → score pipeline and assembles the response.
 * Holds only immutable configuration, so one instance can serve any number
 * of concurrent requests.
 */
export class EmailAnalyzer {
  readonly modelVersion: string;
  readonly locale: Locale;
  readonly lexicon: DetectionLexicon;
  private readonly weights: WeightProvider;

  constructor(options: EmailAnalyzerOptions = {}) {
    this.modelVersion = options.modelVersion ?? DEFAULT_MODEL_VERSION;
    this.locale = options.locale ?? 'en';
    this.lexicon = options.lexicon ?? DEFAULT_LEXICON;
    this.weights = options.weights ?? fixedWeightProvider;
  }

  /** Analyzes a submission whose body, subject and headers were supplied directly. */
  analyzeText(input: AnalyzeTextInput): AnalysisResponse {
    return this.analyzeContent({
      subject: input.subject,
      body: input.body,
      rawHeaders: input.headers,
      toAddresses: [],
      htmlBody: RE_HTML_DOCUMENT.test(input.body) ? input.body : undefined,
    });
  }

  /** Decodes an RFC822 message and analyzes it. Rejects with MalformedMessageError. */
  async analyzeRaw(raw: Buffer | string): Promise<AnalysisResponse> {
    const content = await decodeMessage(raw);
    return this.analyzeContent(content);
  }

  analyzeContent(content: EmailContent): AnalysisResponse {
    const normalizedBody = normalizeText(content.body);
    const normalizedSubject = normalizeText(content.subject ?? '');
    const headers = (content.rawHeaders ?? '').toLowerCase();

    const features = extractFeatures(content, normalizedBody, normalizedSubject, headers, this.lexicon);
    const { score, highlights, insights } = scoreFeatures(features, { weights: this.weights, locale: this.locale });
    const verdict = verdictFor(score);

    debug('analyzer', `verdict=${verdict} score=${score.toFixed(3)} lexicon=${this.lexicon.version}`);

    return {
      verdict,
      confidence: confidenceFor(score),
      model_version: this.modelVersion,
      metadata: {
        subject: content.subject ?? null,
        from_address: content.fromAddress ?? null,
        reply_to: content.replyTo ?? null,
        to_addresses: content.toAddresses,
      },
      highlights,
      insights,
    };
  }
}

export function createAnalyzer(options?: EmailAnalyzerOptions): EmailAnalyzer {
  return new EmailAnalyzer(options);
}

/** Builds the analyzer a deployment runs with. Throws LexiconError for a bad lexicon file. */
export function createAnalyzerFromConfig(config: PhishLensConfig): EmailAnalyzer {
  return new EmailAnalyzer({
    modelVersion: config.modelVersion,
    locale: config.locale,
    lexicon: config.lexiconPath ? loadLexicon(config.lexiconPath) : DEFAULT_LEXICON,
  });
}

/**
 * Linear weights of the scoring engine. Positive weights push toward
 * phishing; `trustKeywords` is subtracted.
 */
export interface WeightTable {
  /** Prior before any signal is added, biased toward legitimate */
  base: number;
  suspiciousKeywords: number;
  trustKeywords: number;
  urlCount: number;
  suspiciousDomains: number;
  exclamation: number;
  uppercaseRatio: number;
  htmlRatio: number;
  linkMismatch: number;
  suspiciousFrom: number;
  replyDifferent: number;
  urgency: number;
  spelling: number;
}

/** Source of the weight table. Lets a trained table replace the fixed one. */
export interface WeightProvider {
  getWeights(): WeightTable;
}

export const FIXED_WEIGHTS: Readonly<WeightTable> = Object.freeze({
  base: 0.3,
  suspiciousKeywords: 0.15,
  trustKeywords: 0.08,
  urlCount: 0.12,
  suspiciousDomains: 0.2,
  exclamation: 0.05,
  uppercaseRatio: 0.08,
  htmlRatio: 0.06,
  linkMismatch: 0.15,
  suspiciousFrom: 0.12,
  replyDifferent: 0.1,
  urgency: 0.1,
  spelling: 0.05,
});

export const fixedWeightProvider: WeightProvider = {
  getWeights: () => FIXED_WEIGHTS,
};

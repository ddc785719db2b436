/** The input could not be read as a structured mail message at all. */
export class MalformedMessageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedMessageError';
  }
}

/** A configured detection lexicon file is missing or has the wrong shape. */
export class LexiconError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LexiconError';
  }
}

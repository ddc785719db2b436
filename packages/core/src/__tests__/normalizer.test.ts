import { describe, it, expect } from 'vitest';
import { normalizeText, stripMarkup } from '../mail/normalizer.js';

describe('stripMarkup', () => {
  it('replaces each tag with a single space', () => {
    expect(stripMarkup('a<br>b<i>c</i>')).toBe('a b c ');
  });

  it('leaves a lone angle bracket alone', () => {
    expect(stripMarkup('1 < 2')).toBe('1 < 2');
  });
});

describe('normalizeText', () => {
  it('strips tags, collapses whitespace, trims and lower-cases', () => {
    expect(normalizeText('  <p>Hello   <b>World</b></p>\n\n ')).toBe('hello world');
  });

  it('returns an empty string for empty or markup-only input', () => {
    expect(normalizeText('')).toBe('');
    expect(normalizeText('<div></div>')).toBe('');
  });

  it('keeps punctuation and URLs intact', () => {
    expect(normalizeText('Click HERE: http://Example.com/Path!')).toBe('click here: http://example.com/path!');
  });

  it('is idempotent', () => {
    const samples = [
      'Dear User,\n\n<b>VERIFY</b>   your account <a href="http://x.tk">now</a>',
      '<<a>b>  TAB\tSEPARATED ',
      '1 < 2 and 3 > 1',
      '',
    ];
    for (const sample of samples) {
      const once = normalizeText(sample);
      expect(normalizeText(once)).toBe(once);
      expect(once).toBe(once.toLowerCase());
      expect(once).not.toMatch(/<[^>]+>/);
    }
  });
});

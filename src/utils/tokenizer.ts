/**
 * Word tokenization for staging files.
 * The locale is always passed in; nothing here reads process-wide locale state.
 */

export interface Tokenizer {
  tokenize(text: string): string[];
}

export class WordTokenizer implements Tokenizer {
  private segmenter: Intl.Segmenter;

  constructor(public readonly locale: string = 'en') {
    this.segmenter = new Intl.Segmenter(locale, { granularity: 'word' });
  }

  /**
   * Words and punctuation marks become tokens; whitespace is dropped
   */
  tokenize(text: string): string[] {
    const tokens: string[] = [];
    for (const { segment } of this.segmenter.segment(text)) {
      if (segment.trim()) tokens.push(segment);
    }
    return tokens;
  }
}

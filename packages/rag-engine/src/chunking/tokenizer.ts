// Any run of Unicode whitespace separates words
const WHITESPACE = /\p{White_Space}+/u;

/**
 * Word tokenizer for chunk sizing
 */
export class Tokenizer {
  /**
   * Split text into words; punctuation and non-Latin scripts stay inside words
   */
  words(text: string): string[] {
    return text.split(WHITESPACE).filter(word => word.length > 0);
  }
}

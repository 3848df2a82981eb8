export interface SentenceOptions {
  /** Words that keep their casing wherever they appear in the sentence. */
  noTransform?: readonly string[];
}

/**
 * Join `words` into a sentence. The first word is kept verbatim; every other
 * word is lowercased unless it's listed in `noTransform`.
 */
export function toSentence(words: readonly string[], options: SentenceOptions = {}): string {
  const noTransform = options.noTransform ?? [];

  return words
    .map((word, idx) => (idx === 0 || noTransform.includes(word) ? word : word.toLowerCase()))
    .join(' ');
}

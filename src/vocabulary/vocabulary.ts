/**
 * Ordered word list with occurrence counts. Words are trimmed and lowercased
 * on the way in so membership tests line up with the tokenizer output; blank
 * entries are dropped. Repeated words are kept in {@link words} and counted
 * in {@link frequency}, which is what the corrector ranks candidates with.
 */
export class Vocabulary {
  readonly words: readonly string[];
  /** Each word once, in order of first appearance. */
  readonly distinctWords: readonly string[];
  private readonly counts: ReadonlyMap<string, number>;

  private constructor(words: string[]) {
    const counts = new Map<string, number>();
    const distinct: string[] = [];
    for (const word of words) {
      const seen = counts.get(word);
      if (seen === undefined) {
        distinct.push(word);
      }
      counts.set(word, (seen ?? 0) + 1);
    }
    this.words = Object.freeze(words);
    this.distinctWords = Object.freeze(distinct);
    this.counts = counts;
  }

  static from(words: Iterable<string>): Vocabulary {
    const normalised: string[] = [];
    for (const raw of words) {
      const word = raw.trim().toLowerCase();
      if (word.length > 0) {
        normalised.push(word);
      }
    }
    return new Vocabulary(normalised);
  }

  get size(): number {
    return this.words.length;
  }

  has(word: string): boolean {
    return this.counts.has(word.toLowerCase());
  }

  /** Number of times the word occurs in the list (0 when absent). */
  frequency(word: string): number {
    return this.counts.get(word.toLowerCase()) ?? 0;
  }
}

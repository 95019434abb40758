import defaultKeywords from './reserved-keywords.json';

/**
 * Immutable, case-insensitive keyword set. A parenthesized value whose
 * content starts with one of these words is structure, not a literal.
 */
export class ReservedKeywords {
  private readonly words: ReadonlySet<string>;

  constructor(words: Iterable<string>) {
    const normalized = new Set<string>();
    for (const word of words) {
      const trimmed = word.trim();
      if (trimmed) normalized.add(trimmed.toUpperCase());
    }
    this.words = normalized;
  }

  static defaults(): ReservedKeywords {
    return new ReservedKeywords(defaultKeywords);
  }

  has(word: string): boolean {
    return this.words.has(word.trim().toUpperCase());
  }

  get size(): number {
    return this.words.size;
  }

  /** A new set holding these keywords plus `extra`. */
  extend(extra: Iterable<string>): ReservedKeywords {
    return new ReservedKeywords([...this.words, ...extra]);
  }
}

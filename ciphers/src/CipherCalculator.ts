/**
 * Tabula Ciphers - Cipher Calculator
 *
 * A letter-value cipher: each letter of one script maps to an integer and a
 * text's value is the sum over its letters. Lookup ignores case and
 * diacritics; characters outside the table contribute nothing.
 *
 * @example
 * const tq = new CipherCalculator({ name: 'English (TQ)', script: 'latin', values: { l: 1, i: 0 } });
 * tq.calculate('Li'); // 1
 */

export type CipherScript = 'latin' | 'hebrew' | 'greek';

export interface CipherDefinition {
  /** Display name; handlers are keyed by its uppercase form */
  name: string;
  script: CipherScript;
  /** Lowercase, unaccented letter -> value */
  values: Readonly<Record<string, number>>;
}

export interface LetterValue {
  letter: string;
  value: number;
}

const COMBINING_MARKS = /\p{M}/gu;

/**
 * Fold a text to the form used as table keys: decomposed, marks removed,
 * lowercase.
 */
export function normalizeText(text: string): string {
  return text.normalize('NFD').replace(COMBINING_MARKS, '').toLowerCase();
}

export class CipherCalculator {
  readonly name: string;
  readonly script: CipherScript;
  private values: Map<string, number>;

  constructor(definition: CipherDefinition) {
    this.name = definition.name;
    this.script = definition.script;
    this.values = new Map(Object.entries(definition.values));
  }

  /** Operation key this cipher answers to */
  get key(): string {
    return this.name.toUpperCase();
  }

  /**
   * Sum of letter values. Empty or unmapped text is 0.
   */
  calculate(text: string): number {
    let total = 0;
    for (const { value } of this.breakdown(text)) {
      total += value;
    }
    return total;
  }

  /**
   * Mapped letters of a text in order, with their values.
   */
  breakdown(text: string): LetterValue[] {
    const letters: LetterValue[] = [];
    for (const letter of normalizeText(text)) {
      const value = this.values.get(letter);
      if (value !== undefined) {
        letters.push({ letter, value });
      }
    }
    return letters;
  }

  /** Value of a single letter, null when the cipher has none */
  getLetterValue(letter: string): number | null {
    return this.values.get(normalizeText(letter)) ?? null;
  }

  /** Number of mapped letters */
  get size(): number {
    return this.values.size;
  }
}

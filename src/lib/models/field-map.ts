const PK_KEYS = ['id', 'ID'] as const;

/** Renames `orig` to `new`; with `keep` the original key stays as well. */
export interface KeySubstitution {
  orig: string;
  new: string;
  keep?: boolean;
}

const isZeroId = (value: unknown): boolean => value === 0 || value === BigInt(0);

/**
 * Column values of one record, keyed by field or column name. Values are
 * stored as given, temporal values included.
 */
export class FieldMap {
  private readonly entries: Map<string, unknown>;

  constructor(entries?: Iterable<readonly [string, unknown]>) {
    this.entries = new Map(entries);
  }

  static from(values: Record<string, unknown>): FieldMap {
    return new FieldMap(Object.entries(values));
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  values(): unknown[] {
    return [...this.entries.values()];
  }

  get(key: string): unknown {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  set(key: string, value: unknown): this {
    this.entries.set(key, value);
    return this;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /** Drops the `id` and `ID` entries. */
  removePK(): void {
    for (const key of PK_KEYS) {
      this.entries.delete(key);
    }
  }

  /** Drops `id`/`ID` only when it holds the integer zero (a record not yet saved). */
  removePKIfZero(): void {
    for (const key of PK_KEYS) {
      if (this.entries.has(key) && isZeroId(this.entries.get(key))) {
        this.entries.delete(key);
      }
    }
  }

  /**
   * Applies substitutions in order. Missing source keys are skipped; an
   * existing target key is overwritten.
   */
  substituteKeys(substitutions: readonly KeySubstitution[]): void {
    for (const substitution of substitutions) {
      if (!this.entries.has(substitution.orig)) {
        continue;
      }
      const value = this.entries.get(substitution.orig);
      if (!substitution.keep) {
        this.entries.delete(substitution.orig);
      }
      this.entries.set(substitution.new, value);
    }
  }

  toJSON(): Record<string, unknown> {
    return Object.fromEntries(this.entries);
  }
}

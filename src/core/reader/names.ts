// src/core/reader/names.ts
// Interning table for every string the scanner sees, plus result-code minting

/** Stable integer id of an interned string. */
export type NameId = number;

/**
 * Append-only string table. An id is the insertion index of its string and
 * stays valid for the lifetime of the table. Ids and result codes from two
 * tables must never be compared.
 */
export class NameTable {
  private readonly list: string[] = [];
  private readonly index = new Map<string, NameId>();
  private codeCount = 0;

  /**
   * Mint `n` result codes no other caller of this table will receive.
   * Collaborators use these as private error sentinels.
   */
  allocate(n: number): number[] {
    if (!Number.isInteger(n) || n < 0) {
      throw new TypeError(`allocate expects a non-negative integer, got ${String(n)}`);
    }
    const start = this.codeCount;
    this.codeCount += n;
    return Array.from({ length: n }, (_, i) => start + i);
  }

  query(text: string): NameId | null {
    return this.index.get(text) ?? null;
  }

  intern(text: string): NameId {
    const existing = this.index.get(text);
    if (existing !== undefined) return existing;
    const id = this.list.length;
    this.list.push(text);
    this.index.set(text, id);
    return id;
  }

  internMany(texts: readonly string[]): NameId[] {
    return texts.map((t) => this.intern(t));
  }

  resolve(id: NameId): string | null {
    if (!Number.isInteger(id) || id < 0 || id >= this.list.length) return null;
    return this.list[id];
  }

  get size(): number {
    return this.list.length;
  }
}

import { canonicalFormatIdentifier, compareKeys, parsePropertyIdentifier, toLookupKey } from './lib/canon.js';
import type { CanonicalEntry } from './types/index.js';

/**
 * Read-only collection of canonical entries, ordered by format identifier
 * and then property identifier.
 */
export class KnowledgeBase {
  private readonly entries: readonly CanonicalEntry[];
  private readonly byKey: ReadonlyMap<string, CanonicalEntry>;

  private constructor(entries: CanonicalEntry[]) {
    const sorted = [...entries].sort(compareKeys);
    const byKey = new Map<string, CanonicalEntry>();
    for (const entry of sorted) {
      const key = toLookupKey(entry);
      if (byKey.has(key)) {
        throw new Error(`Duplicate knowledge base key ${key}`);
      }
      byKey.set(key, Object.freeze({ ...entry, provenance: Object.freeze([...entry.provenance]) }));
    }
    this.byKey = byKey;
    this.entries = Object.freeze([...byKey.values()]);
  }

  static fromEntries(entries: Iterable<CanonicalEntry>): KnowledgeBase {
    return new KnowledgeBase([...entries]);
  }

  static empty(): KnowledgeBase {
    return new KnowledgeBase([]);
  }

  get size(): number {
    return this.entries.length;
  }

  lookup(formatIdentifier: string, propertyIdentifier: number | string): CanonicalEntry | undefined {
    const format_identifier = canonicalFormatIdentifier(formatIdentifier);
    const property_identifier = parsePropertyIdentifier(propertyIdentifier);
    if (format_identifier === undefined || property_identifier === undefined) return undefined;
    return this.byKey.get(toLookupKey({ format_identifier, property_identifier }));
  }

  has(lookupKey: string): boolean {
    return this.byKey.has(lookupKey);
  }

  get(lookupKey: string): CanonicalEntry | undefined {
    return this.byKey.get(lookupKey);
  }

  keys(): IterableIterator<string> {
    return this.byKey.keys();
  }

  *all(): Generator<CanonicalEntry, void, undefined> {
    yield* this.entries;
  }

  [Symbol.iterator](): Iterator<CanonicalEntry> {
    return this.all();
  }
}

/**
 * Learned associations from statement details text to member names.
 */

import type { MappingDocument, MappingEntry } from '@duesledger/types';

export class MappingStore {
  // Map keeps insertion order, which is the lookup order.
  private entries: Map<string, string>;

  private constructor(entries: Map<string, string>) {
    this.entries = entries;
  }

  static empty(): MappingStore {
    return new MappingStore(new Map());
  }

  static fromDocument(doc: MappingDocument): MappingStore {
    return new MappingStore(new Map(doc.map((entry) => [entry.details, entry.member])));
  }

  toDocument(): MappingDocument {
    return this.list();
  }

  get size(): number {
    return this.entries.size;
  }

  list(): MappingEntry[] {
    return Array.from(this.entries, ([details, member]) => ({ details, member }));
  }

  has(details: string): boolean {
    return this.entries.has(details.trim());
  }

  /**
   * Add a mapping keyed by the trimmed details text. Existing keys are never
   * overwritten; returns false when nothing was added.
   */
  add(details: string, member: string): boolean {
    const key = details.trim();
    if (key === '' || this.has(key)) {
      return false;
    }
    this.entries.set(key, member);
    return true;
  }

  /**
   * First entry, in insertion order, whose key occurs in the details text
   * (case-insensitive).
   */
  match(details: string): MappingEntry | undefined {
    const haystack = details.trim().toLowerCase();
    if (haystack === '') {
      return undefined;
    }
    for (const [key, member] of this.entries) {
      if (haystack.includes(key.toLowerCase())) {
        return { details: key, member };
      }
    }
    return undefined;
  }
}

import type { DocumentStore, LoadResult } from '@duesledger/types';

/**
 * In-memory document store for development, dry runs and testing.
 * Values are cloned on the way in and out, like a round trip through disk.
 */
export class InMemoryDocumentStore<T> implements DocumentStore<T> {
  readonly location: string;
  private value: T | undefined;
  private createEmpty: () => T;
  private saveCount = 0;

  constructor(createEmpty: () => T, initial?: T, location = 'memory') {
    this.createEmpty = createEmpty;
    this.value = initial === undefined ? undefined : structuredClone(initial);
    this.location = location;
  }

  async load(): Promise<LoadResult<T>> {
    if (this.value === undefined) {
      return { ok: true, value: this.createEmpty(), created: true };
    }
    return { ok: true, value: structuredClone(this.value), created: false };
  }

  async save(value: T): Promise<void> {
    this.value = structuredClone(value);
    this.saveCount++;
  }

  /** Number of completed saves. */
  get saves(): number {
    return this.saveCount;
  }

  /** Current stored value, or undefined if nothing was ever stored. */
  peek(): T | undefined {
    return this.value === undefined ? undefined : structuredClone(this.value);
  }
}

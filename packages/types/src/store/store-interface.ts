/**
 * Load/save contract shared by the ledger and the mapping store backends.
 */

import type { PersistError } from '../errors.js';

export type LoadResult<T> =
  | { ok: true; value: T; created: boolean }
  | { ok: false; value: T; error: PersistError };

export interface DocumentStore<T> {
  readonly location: string;
  /** Never rejects; a missing backing document loads as an empty one. */
  load(): Promise<LoadResult<T>>;
  /** Whole-document overwrite. Rejects with PersistError. */
  save(value: T): Promise<void>;
}

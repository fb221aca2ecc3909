/**
 * Ledger and mapping store, with their file and in-memory persistence.
 */

export { Ledger, type MemberRef } from './ledger.js';
export { MappingStore } from './mapping-store.js';
export {
  JsonFileStore,
  createLedgerFileStore,
  createMappingFileStore,
  DEFAULT_LEDGER_PATH,
  DEFAULT_MAPPINGS_PATH,
} from './file-store.js';
export { InMemoryDocumentStore } from './memory-store.js';

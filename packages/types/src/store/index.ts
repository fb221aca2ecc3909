export type { DocumentStore, LoadResult } from './store-interface.js';

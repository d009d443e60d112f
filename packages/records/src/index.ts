export { RecordStore } from './record-store.js';
export type { SavedRecord, RecordStoreOptions } from './record-store.js';

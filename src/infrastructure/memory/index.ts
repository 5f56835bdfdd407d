export { InMemoryReportingStorage } from './in-memory-storage.js';
export type { InMemoryStorageOptions } from './in-memory-storage.js';

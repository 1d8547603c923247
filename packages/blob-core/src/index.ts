export * from './artifact-hash.js';
export * from './errors.js';
export * from './store/i-artifact-store.js';
export { QuotaLedger } from './store/quota.js';
export { FileArtifactStore, type FileArtifactStoreInit } from './store/file-artifact-store.js';
export { MemoryArtifactStore } from './store/memory-artifact-store.js';

/**
 * In-memory implementations for tests and dry runs.
 */
export { MemoryRemoteClient } from './memory_remote_client';
export type { MemoryRemoteClientOptions, RecordedCall, StoredFile } from './memory_remote_client';

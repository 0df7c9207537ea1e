export { FileSyncer, contentsPath } from './file_syncer';
export type { FileArtifact, FileUploadRecord, FileSyncerOptions } from './file_syncer.types';

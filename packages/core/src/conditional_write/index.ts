export { conditionalWrite, probeMarker, ConditionalWriteConflict } from './conditional_write';
export type { ConditionalWriteOptions, ConditionalWriteResult } from './conditional_write.types';

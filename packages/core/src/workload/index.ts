export { FsWorkloadSource } from './fs/fs_workload_source';
export { MemoryWorkloadSource } from './memory/memory_workload_source';
export type { WorkloadSource, WorkloadCheck, FsWorkloadSourceOptions } from './workload.types';

/**
 * Storage backend exports
 */

export { FilesystemBackend } from './filesystem';
export { MemoryBackend } from './memory';
export { summarizeDeployment } from './summary';

/**
 * Metadata module - framework and test discovery
 */

export { FilesystemMetadata, createFilesystemMetadata } from './filesystem-metadata';
export { Framework, BenchmarkTest, getTestName } from './entities';

export type { BundleReader, BundleWriter } from './types.js';
export {
  createFilesystemReader,
  createFilesystemWriter,
  createInMemoryReader,
  createInMemoryWriter,
} from './fs.js';
export { getCodec, jsonCodec, superjsonCodec } from './codecs.js';
export type { CodecName, SnapshotCodec } from './codecs.js';

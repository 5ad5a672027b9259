export {
  Archive,
  ArchiveReader,
  AsyncArchiveReader,
  DEFAULT_INITIAL_CAPACITY,
  isMutableStore,
  resolveOptions,
} from './archive'
export type {
  ArchiveOptions,
  ArchiveStats,
  EntryInfo,
  RenameOptions,
  RepackOptions,
  RepackResult,
} from './archive'
export { ArchiveIndex, DEFAULT_MAX_LOAD_FACTOR } from './archive_index'
export type { IndexEntry } from './archive_index'
export { DeflateCodec, DEFAULT_COMPRESSION_LEVEL } from './codec'
export type { Codec } from './codec'
export { Crc32, crc32 } from './crc32'
export {
  ArchiveLoader,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_INDEX_BATCH_SLOTS,
  HeaderDecoder,
  IndexTableDecoder,
  MachineSequence,
  PayloadDecoder,
  RangeCopier,
  WriteSequence,
} from './engine'
export type { ChunkSink, DecodedHeader, LoadedArchive, RangeMove } from './engine'
export { createConsoleLogger, isLogLevel, parseLogLevel, silentLogger } from './logger'
export type { LogLevel, Logger } from './logger'
export { SpaceAllocator } from './space_allocator'
export type { CompactionStep, Extent, NamedExtent } from './space_allocator'
export {
  AsyncReadDriver,
  BufferSource,
  FileHandleStore,
  FileStore,
  MemoryStore,
  ReadOnlyFileStore,
  SyncDriver,
  SyncReadDriver,
} from './transport'
export type { AsyncReadableStore, MutableStore, ReadableStore } from './transport'

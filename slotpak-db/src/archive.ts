import {
  ArchiveError,
  ArchiveHeader,
  EntryDescriptor,
  FORMAT_VERSION,
  INDEX_OFFSET,
  IoRequest,
  MAX_ENTRY_BYTES,
  MutationRequest,
  Resumable,
  alreadyExists,
  dataStartFor,
  encodeHeader,
  notFound,
  validateEntryName,
} from 'slotpak-protocol'
import { ArchiveIndex, DEFAULT_MAX_LOAD_FACTOR, validateLoadFactor } from './archive_index'
import { Codec, DEFAULT_COMPRESSION_LEVEL, DeflateCodec } from './codec'
import { crc32 } from './crc32'
import {
  ArchiveLoader,
  ChunkSink,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_INDEX_BATCH_SLOTS,
  LoadedArchive,
  MachineSequence,
  PayloadDecoder,
  RangeCopier,
  RangeMove,
  WriteSequence,
  slotWrite,
} from './engine'
import { Logger, createConsoleLogger } from './logger'
import { NamedExtent, SpaceAllocator } from './space_allocator'
import { AsyncReadDriver, AsyncReadableStore, MutableStore, ReadableStore, SyncDriver, SyncReadDriver } from './transport'

export const DEFAULT_INITIAL_CAPACITY = 64

/** Repack stages before this one only touch bytes past the referenced data. */
const FIRST_COMMIT_STAGE = 2

export interface ArchiveOptions {
  /** Slot count of a newly created archive. */
  initialCapacity?: number
  maxLoadFactor?: number
  /** Largest read or copy request the engine issues. */
  chunkSize?: number
  /** Index slots decoded per read while opening. */
  indexBatchSlots?: number
  codec?: Codec
  /** Deflate level for the default codec; ignored when `codec` is given. */
  compressionLevel?: number
  logger?: Logger
}

interface ResolvedOptions {
  initialCapacity: number
  maxLoadFactor: number
  chunkSize: number
  indexBatchSlots: number
  codec: Codec
  logger: Logger
}

export interface EntryInfo {
  name: string
  /** Uncompressed size in bytes. */
  size: number
  storedSize: number
  compressed: boolean
  checksum: number
  offset: number
}

export interface ArchiveStats {
  capacity: number
  liveCount: number
  tombstoneCount: number
  dataStart: number
  dataEnd: number
  freeBytes: number
  storedBytes: number
  uncompressedBytes: number
}

export interface RepackOptions {
  /** Slot count after the repack; defaults to the current capacity. */
  capacity?: number
}

export interface RepackResult {
  capacity: number
  previousLength: number
  length: number
}

export interface RenameOptions {
  overwrite?: boolean
}

interface ArchiveState {
  index: ArchiveIndex
  allocator: SpaceAllocator
}

function positiveInteger(label: string, value: number, max: number = Number.MAX_SAFE_INTEGER): number {
  if (!Number.isInteger(value) || value < 1 || value > max) {
    throw new RangeError(`${label} must be an integer from 1 to ${max}, got ${value}`)
  }
  return value
}

export function resolveOptions(options: ArchiveOptions = {}): ResolvedOptions {
  return {
    initialCapacity: positiveInteger('Initial capacity', options.initialCapacity ?? DEFAULT_INITIAL_CAPACITY, 0xffffffff),
    maxLoadFactor: validateLoadFactor(options.maxLoadFactor ?? DEFAULT_MAX_LOAD_FACTOR),
    chunkSize: positiveInteger('Chunk size', options.chunkSize ?? DEFAULT_CHUNK_SIZE),
    indexBatchSlots: positiveInteger('Index batch size', options.indexBatchSlots ?? DEFAULT_INDEX_BATCH_SLOTS),
    codec: options.codec ?? new DeflateCodec(options.compressionLevel ?? DEFAULT_COMPRESSION_LEVEL),
    logger: options.logger ?? createConsoleLogger('slotpak'),
  }
}

export function isMutableStore(store: ReadableStore): store is MutableStore {
  return store.mutable && 'write' in store && 'truncate' in store && 'sync' in store
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function toEntryInfo(name: string, descriptor: EntryDescriptor): EntryInfo {
  return {
    name,
    size: descriptor.uncompressedLength,
    storedSize: descriptor.storedLength,
    compressed: descriptor.compressed,
    checksum: descriptor.checksum,
    offset: descriptor.offset,
  }
}

/**
 * Turns a decoded header and slot table into the in-memory index and free
 * list. Header counts are only advisory: the slots are authoritative.
 */
function buildState(loaded: LoadedArchive, options: ResolvedOptions): ArchiveState {
  const { header, slots } = loaded
  const index = ArchiveIndex.fromSlots(slots, options.maxLoadFactor)
  if (header.liveCount !== index.liveCount || header.tombstoneCount !== index.tombstoneCount) {
    options.logger.warn(
      `Header records ${header.liveCount} live and ${header.tombstoneCount} removed entries, ` +
      `the index holds ${index.liveCount} and ${index.tombstoneCount}; using the index`
    )
  }
  const extents: NamedExtent[] = []
  for (const entry of index.entries()) {
    extents.push({ name: entry.name, offset: entry.descriptor.offset, length: entry.descriptor.storedLength })
  }
  const allocator = SpaceAllocator.fromExtents(header.dataStart, header.dataEnd, extents)
  options.logger.debug(
    `Opened archive: ${index.liveCount} entries in ${index.capacity} slots, data ${header.dataStart}..${header.dataEnd}`
  )
  return { index, allocator }
}

function loadState(store: ReadableStore, options: ResolvedOptions): ArchiveState {
  return buildState(new SyncReadDriver(store).run(new ArchiveLoader(options.indexBatchSlots)), options)
}

function headerFor(index: ArchiveIndex, allocator: SpaceAllocator): ArchiveHeader {
  return {
    version: FORMAT_VERSION,
    capacity: index.capacity,
    liveCount: index.liveCount,
    tombstoneCount: index.tombstoneCount,
    indexOffset: INDEX_OFFSET,
    dataStart: allocator.start,
    dataEnd: allocator.end,
  }
}

/** Read access to an archive. Holds no mutation methods. */
export class ArchiveReader {
  protected closed = false
  protected generation = 0
  protected index: ArchiveIndex
  protected allocator: SpaceAllocator

  protected constructor(
    protected readonly store: ReadableStore,
    protected readonly options: ResolvedOptions,
    state: ArchiveState
  ) {
    this.index = state.index
    this.allocator = state.allocator
  }

  static open(store: ReadableStore, options: ArchiveOptions = {}): ArchiveReader {
    const resolved = resolveOptions(options)
    return new ArchiveReader(store, resolved, loadState(store, resolved))
  }

  get isClosed(): boolean {
    return this.closed
  }

  get(name: string): Buffer {
    const chunks: Buffer[] = []
    const size = this.extractTo(name, chunk => chunks.push(chunk))
    return Buffer.concat(chunks, size)
  }

  /**
   * Streams the entry to `sink` and returns its size. Uncompressed entries
   * are delivered chunk by chunk; the checksum is verified after the last
   * chunk, so a sink can receive data from an entry that then fails with
   * `IntegrityMismatch`.
   */
  extractTo(name: string, sink: ChunkSink): number {
    this.ensureOpen()
    validateEntryName(name)
    const descriptor = this.index.lookup(name)
    if (!descriptor) {
      throw notFound(name)
    }
    return new SyncReadDriver(this.store).run(
      new PayloadDecoder(name, descriptor, this.options.codec, sink, this.options.chunkSize)
    )
  }

  contains(name: string): boolean {
    this.ensureOpen()
    return this.index.lookup(name) !== undefined
  }

  stat(name: string): EntryInfo {
    this.ensureOpen()
    const descriptor = this.index.lookup(name)
    if (!descriptor) {
      throw notFound(name)
    }
    return toEntryInfo(name, descriptor)
  }

  /** Entry names in index order. Mutating the archive invalidates the iterator. */
  *list(): IterableIterator<string> {
    for (const entry of this.entries()) {
      yield entry.name
    }
  }

  *entries(): IterableIterator<EntryInfo> {
    this.ensureOpen()
    const generation = this.generation
    for (const entry of this.index.entries()) {
      yield toEntryInfo(entry.name, entry.descriptor)
      if (this.generation !== generation) {
        throw new ArchiveError('ConcurrentModification', 'Archive was modified while its entries were being listed')
      }
    }
  }

  stats(): ArchiveStats {
    this.ensureOpen()
    let storedBytes = 0
    let uncompressedBytes = 0
    for (const entry of this.index.entries()) {
      storedBytes += entry.descriptor.storedLength
      uncompressedBytes += entry.descriptor.uncompressedLength
    }
    return {
      capacity: this.index.capacity,
      liveCount: this.index.liveCount,
      tombstoneCount: this.index.tombstoneCount,
      dataStart: this.allocator.start,
      dataEnd: this.allocator.end,
      freeBytes: this.allocator.freeBytes,
      storedBytes,
      uncompressedBytes,
    }
  }

  /** Releases the store. Nothing is written. */
  close(): void {
    if (this.closed) {
      return
    }
    this.closed = true
    this.store.close()
  }

  protected ensureOpen(): void {
    if (this.closed) {
      throw new ArchiveError('Closed', 'Archive handle has been closed')
    }
  }
}

/**
 * Read-write archive. Every mutation writes the payload into space no slot
 * references, then the header, then the slot, and only then truncates, so a
 * crash between two writes leaves at worst stale header counts behind.
 */
export class Archive extends ArchiveReader {
  private constructor(
    private readonly writable: MutableStore,
    options: ResolvedOptions,
    state: ArchiveState
  ) {
    super(writable, options, state)
  }

  static open(store: ReadableStore, options: ArchiveOptions = {}): Archive {
    if (!isMutableStore(store)) {
      throw new ArchiveError('ReadOnly', 'Store was opened without write access')
    }
    const resolved = resolveOptions(options)
    return new Archive(store, resolved, loadState(store, resolved))
  }

  /** Writes an empty header and index, discarding whatever the store held. */
  static create(store: MutableStore, options: ArchiveOptions = {}): Archive {
    const resolved = resolveOptions(options)
    const index = ArchiveIndex.empty(resolved.initialCapacity, resolved.maxLoadFactor)
    const allocator = SpaceAllocator.empty(dataStartFor(index.capacity))
    new SyncDriver(store).runMutation(new WriteSequence([
      { kind: 'write', offset: 0, data: encodeHeader(headerFor(index, allocator)) },
      { kind: 'write', offset: INDEX_OFFSET, data: index.encodeTable() },
      { kind: 'truncate', length: allocator.end },
      { kind: 'sync' },
    ]))
    resolved.logger.debug(`Created archive with ${index.capacity} slots`)
    return new Archive(store, resolved, { index, allocator })
  }

  insert(name: string, bytes: Buffer, compress: boolean = false): void {
    this.ensureOpen()
    validateEntryName(name)
    if (this.index.lookup(name)) {
      throw alreadyExists(name)
    }
    this.insertOrReplace(name, bytes, compress)
  }

  insertOrReplace(name: string, bytes: Buffer, compress: boolean = false): void {
    this.ensureOpen()
    validateEntryName(name)
    if (bytes.length > MAX_ENTRY_BYTES) {
      throw new ArchiveError('EntryTooLarge', `Entry '${name}' is ${bytes.length} bytes, the limit is ${MAX_ENTRY_BYTES}`, {
        entryName: name,
      })
    }
    const payload = compress ? this.options.codec.compress(bytes) : bytes
    if (payload.length > MAX_ENTRY_BYTES) {
      throw new ArchiveError('EntryTooLarge', `Compressed entry '${name}' is ${payload.length} bytes`, { entryName: name })
    }

    const replacing = this.index.find(name)
    if (!replacing && this.index.wouldExceedLoad(1)) {
      const capacity = this.index.grownCapacity(1)
      this.options.logger.info(`Index is at its load limit, repacking into ${capacity} slots`)
      this.repack({ capacity })
    }

    this.mutate(() => {
      const descriptor: EntryDescriptor = {
        offset: this.allocator.allocate(payload.length),
        storedLength: payload.length,
        uncompressedLength: bytes.length,
        compressed: compress,
        checksum: crc32(bytes),
      }
      const requests: MutationRequest[] = []
      if (payload.length > 0) {
        requests.push({ kind: 'write', offset: descriptor.offset, data: payload })
      }
      const slot = replacing ? this.index.update(name, descriptor).slot : this.index.insert(name, descriptor)
      requests.push(this.headerWrite(), slotWrite(slot, this.index.encodeSlot(slot)))
      if (replacing) {
        this.allocator.release(replacing.descriptor.offset, replacing.descriptor.storedLength)
        this.pushTrim(requests)
      }
      this.options.logger.debug(
        `${replacing ? 'Replaced' : 'Inserted'} '${name}': ${bytes.length} bytes stored as ${payload.length} at ${descriptor.offset}`
      )
      return new WriteSequence(requests)
    })
  }

  /** Tombstones the entry and frees its payload. Returns false when absent. */
  remove(name: string): boolean {
    this.ensureOpen()
    validateEntryName(name)
    if (!this.index.lookup(name)) {
      return false
    }
    this.mutate(() => {
      const removed = this.index.remove(name)
      if (!removed) {
        throw notFound(name)
      }
      this.allocator.release(removed.descriptor.offset, removed.descriptor.storedLength)
      const requests: MutationRequest[] = [this.headerWrite(), slotWrite(removed.slot, this.index.encodeSlot(removed.slot))]
      this.pushTrim(requests)
      this.options.logger.debug(`Removed '${name}' from slot ${removed.slot}`)
      return new WriteSequence(requests)
    })
    return true
  }

  /**
   * Moves an entry to a new name. The payload is copied first so that the
   * old and the new slot never share bytes on disk.
   */
  rename(from: string, to: string, options: RenameOptions = {}): void {
    this.ensureOpen()
    validateEntryName(from)
    validateEntryName(to)
    const source = this.index.lookup(from)
    if (!source) {
      throw notFound(from)
    }
    if (from === to) {
      return
    }
    const target = this.index.lookup(to)
    if (target && !options.overwrite) {
      throw alreadyExists(to)
    }
    if (!target && this.index.wouldExceedLoad(1)) {
      this.repack({ capacity: this.index.grownCapacity(1) })
    }

    this.mutate(() => {
      const moved: EntryDescriptor = { ...source, offset: this.allocator.allocate(source.storedLength) }
      const moves: RangeMove[] = [{ from: source.offset, to: moved.offset, length: source.storedLength }]
      const requests: MutationRequest[] = []

      const slot = target ? this.index.update(to, moved).slot : this.index.insert(to, moved)
      requests.push(this.headerWrite(), slotWrite(slot, this.index.encodeSlot(slot)))
      if (target) {
        this.allocator.release(target.offset, target.storedLength)
      }

      const removed = this.index.remove(from)
      if (!removed) {
        throw notFound(from)
      }
      this.allocator.release(removed.descriptor.offset, removed.descriptor.storedLength)
      requests.push(this.headerWrite(), slotWrite(removed.slot, this.index.encodeSlot(removed.slot)))
      this.pushTrim(requests)
      this.options.logger.debug(`Renamed '${from}' to '${to}'`)

      return new MachineSequence<IoRequest>([
        () => new RangeCopier(moves, this.options.chunkSize),
        () => new WriteSequence(requests),
      ])
    })
  }

  /**
   * Rewrites the archive with every live payload packed after the index,
   * optionally resizing the index. Payloads are first staged past the end
   * of all referenced data, the index is switched to the staged copies, and
   * only then are they copied down to their final place.
   */
  repack(options: RepackOptions = {}): RepackResult {
    this.ensureOpen()
    const capacity = options.capacity ?? this.index.capacity
    positiveInteger('Index capacity', capacity, 0xffffffff)
    if (capacity < this.index.liveCount) {
      throw new RangeError(`Cannot fit ${this.index.liveCount} entries into ${capacity} slots`)
    }
    const previousLength = this.writable.size()
    if (
      capacity === this.index.capacity &&
      this.index.tombstoneCount === 0 &&
      this.allocator.freeBytes === 0 &&
      previousLength === this.allocator.end
    ) {
      this.options.logger.debug('Archive is already packed')
      return { capacity, previousLength, length: previousLength }
    }

    const packed = this.index.rehash(capacity)
    const newStart = dataStartFor(capacity)
    const extents: NamedExtent[] = []
    for (const entry of packed.entries()) {
      extents.push({ name: entry.name, offset: entry.descriptor.offset, length: entry.descriptor.storedLength })
    }
    const plan = SpaceAllocator.planCompaction(extents, newStart)
    const packedEnd = plan.reduce((end, step) => end + step.length, newStart)
    const stagingBase = Math.max(this.allocator.end, previousLength, packedEnd)

    const stagedOffsets = new Map<string, number>()
    const finalOffsets = new Map<string, number>()
    for (const step of plan) {
      stagedOffsets.set(step.name, stagingBase + step.to - newStart)
      finalOffsets.set(step.name, step.to)
    }
    const staged = packed.withOffsets(stagedOffsets)
    const final = packed.withOffsets(finalOffsets)
    const stagedAllocator = SpaceAllocator.fromExtents(
      newStart,
      stagingBase + packedEnd - newStart,
      plan.map(step => ({ name: step.name, offset: stagingBase + step.to - newStart, length: step.length }))
    )
    const finalAllocator = SpaceAllocator.fromExtents(
      newStart,
      packedEnd,
      plan.map(step => ({ name: step.name, offset: step.to, length: step.length }))
    )
    const commit = (index: ArchiveIndex, allocator: SpaceAllocator): MutationRequest[] => [
      { kind: 'write', offset: INDEX_OFFSET, data: index.encodeTable() },
      { kind: 'write', offset: 0, data: encodeHeader(headerFor(index, allocator)) },
    ]

    const sequence = new MachineSequence<IoRequest>([
      () => new RangeCopier(plan.map(step => ({ from: step.from, to: stagingBase + step.to - newStart, length: step.length })), this.options.chunkSize),
      () => new WriteSequence([{ kind: 'sync' }]),
      () => new WriteSequence([...commit(staged, stagedAllocator), { kind: 'sync' }]),
      () => new RangeCopier(plan.map(step => ({ from: stagingBase + step.to - newStart, to: step.to, length: step.length })), this.options.chunkSize),
      () => new WriteSequence([...commit(final, finalAllocator), { kind: 'truncate', length: packedEnd }, { kind: 'sync' }]),
    ])

    try {
      new SyncDriver(this.writable).runMutation(sequence)
    } catch (error) {
      if (sequence.completedStages < FIRST_COMMIT_STAGE) {
        this.discardStaging(previousLength, error)
      } else {
        this.recover(error)
      }
      throw error
    }

    this.index = final
    this.allocator = finalAllocator
    this.generation++
    this.options.logger.info(`Repacked archive: ${previousLength} -> ${packedEnd} bytes, ${capacity} slots`)
    return { capacity, previousLength, length: packedEnd }
  }

  /** Rewrites header and index from memory and syncs the store. */
  flush(): void {
    this.ensureOpen()
    this.mutate(() => new WriteSequence([
      { kind: 'write', offset: INDEX_OFFSET, data: this.index.encodeTable() },
      this.headerWrite(),
      { kind: 'sync' },
    ]))
  }

  private headerWrite(): MutationRequest {
    return { kind: 'write', offset: 0, data: encodeHeader(headerFor(this.index, this.allocator)) }
  }

  /** Lowers the data end past trailing free space; the header goes first. */
  private pushTrim(requests: MutationRequest[]) {
    if (this.allocator.trimTail()) {
      requests.push(this.headerWrite(), { kind: 'truncate', length: this.allocator.end })
    }
  }

  /**
   * Applies the in-memory changes made by `plan` and runs the IO it returns.
   * If anything fails once planning has started, memory is resynchronised
   * from the store.
   */
  private mutate(plan: () => Resumable<unknown, IoRequest>): void {
    this.generation++
    try {
      new SyncDriver(this.writable).runMutation(plan())
    } catch (error) {
      this.recover(error)
      throw error
    }
  }

  private recover(cause: unknown) {
    this.options.logger.warn(`Write failed (${describeError(cause)}), reloading archive state from the store`)
    try {
      const state = loadState(this.writable, this.options)
      this.index = state.index
      this.allocator = state.allocator
      this.generation++
    } catch (reloadError) {
      this.options.logger.error(`Archive could not be reloaded (${describeError(reloadError)}), closing it`)
      this.closed = true
      try {
        this.writable.close()
      } catch (closeError) {
        this.options.logger.error(`Closing the store failed: ${describeError(closeError)}`)
      }
    }
  }

  private discardStaging(previousLength: number, cause: unknown) {
    this.options.logger.warn(`Repack failed before commit (${describeError(cause)}), discarding staged data`)
    try {
      this.writable.truncate(previousLength)
    } catch (truncateError) {
      this.options.logger.warn(`Staged data could not be discarded: ${describeError(truncateError)}`)
    }
  }
}

/** Promise-based read access, driven by the same machines as the sync handle. */
export class AsyncArchiveReader {
  private closed = false

  private constructor(
    private readonly store: AsyncReadableStore,
    private readonly options: ResolvedOptions,
    private readonly index: ArchiveIndex
  ) { }

  static async open(store: AsyncReadableStore, options: ArchiveOptions = {}): Promise<AsyncArchiveReader> {
    const resolved = resolveOptions(options)
    const loaded = await new AsyncReadDriver(store).run(new ArchiveLoader(resolved.indexBatchSlots))
    return new AsyncArchiveReader(store, resolved, buildState(loaded, resolved).index)
  }

  async get(name: string): Promise<Buffer> {
    this.ensureOpen()
    validateEntryName(name)
    const descriptor = this.index.lookup(name)
    if (!descriptor) {
      throw notFound(name)
    }
    const chunks: Buffer[] = []
    const size = await new AsyncReadDriver(this.store).run(
      new PayloadDecoder(name, descriptor, this.options.codec, chunk => chunks.push(chunk), this.options.chunkSize)
    )
    return Buffer.concat(chunks, size)
  }

  contains(name: string): boolean {
    this.ensureOpen()
    return this.index.lookup(name) !== undefined
  }

  stat(name: string): EntryInfo {
    this.ensureOpen()
    const descriptor = this.index.lookup(name)
    if (!descriptor) {
      throw notFound(name)
    }
    return toEntryInfo(name, descriptor)
  }

  list(): IterableIterator<string> {
    this.ensureOpen()
    return this.index.names()
  }

  async close(): Promise<void> {
    if (this.closed) {
      return
    }
    this.closed = true
    await this.store.close()
  }

  private ensureOpen() {
    if (this.closed) {
      throw new ArchiveError('Closed', 'Archive handle has been closed')
    }
  }
}

import {
  ArchiveError,
  ArchiveErrorCode,
  ArchiveErrorOptions,
  ArchiveHeader,
  EntryDescriptor,
  HEADER_SIZE,
  IndexSlot,
  IoRequest,
  IoRequestKind,
  IoResponse,
  MAGIC,
  MutationRequest,
  ReadSeekRequest,
  Resumable,
  SLOT_SIZE,
  Step,
  decodeHeader,
  decodeSlot,
  slotPosition,
} from 'slotpak-protocol'
import { Codec } from './codec'
import { Crc32 } from './crc32'

export const DEFAULT_CHUNK_SIZE = 64 * 1024
export const DEFAULT_INDEX_BATCH_SLOTS = 64

export type ChunkSink = (chunk: Buffer) => void

function answers(kind: IoRequestKind, response: IoResponse): boolean {
  switch (kind) {
    case 'size':
      return response.kind === 'size'
    case 'read':
    case 'readMore':
      return response.kind === 'data' || response.kind === 'eof'
    default:
      return response.kind === 'ack'
  }
}

/**
 * Shared bookkeeping for every resumable computation: which request is
 * outstanding, whether the machine has finished, and the child machine (if
 * any) that currently owns the conversation with the driver.
 */
abstract class Machine<TValue, TRequest extends IoRequest> implements Resumable<TValue, TRequest> {
  private started = false
  private finished = false
  private awaiting: IoRequestKind | null = null
  private forward: ((response: IoResponse) => Step<TValue, TRequest>) | null = null

  start(): Step<TValue, TRequest> {
    if (this.started) {
      throw new Error(`${this.label} has already been started`)
    }
    this.started = true
    return this.advance(() => this.begin())
  }

  feed(response: IoResponse): Step<TValue, TRequest> {
    const awaiting = this.awaiting
    if (this.finished || awaiting === null) {
      throw new Error(`${this.label} is not waiting for a response`)
    }
    if (!answers(awaiting, response)) {
      throw new Error(`${this.label} asked for '${awaiting}' but was answered with '${response.kind}'`)
    }
    this.awaiting = null
    const forward = this.forward
    return this.advance(() => (forward ? forward(response) : this.resume(response)))
  }

  protected abstract begin(): Step<TValue, TRequest>

  protected resume(response: IoResponse): Step<TValue, TRequest> {
    return this.unexpected(response)
  }

  protected need(request: TRequest): Step<TValue, TRequest> {
    return { status: 'need', request }
  }

  protected done(value: TValue): Step<TValue, TRequest> {
    return { status: 'done', value }
  }

  protected fail(code: ArchiveErrorCode, message: string, options?: ArchiveErrorOptions): Step<TValue, TRequest> {
    return { status: 'failed', error: new ArchiveError(code, message, options) }
  }

  protected unexpected(response: IoResponse): never {
    throw new Error(`${this.label} cannot handle a '${response.kind}' response here`)
  }

  /**
   * Hands the driver over to `machine` until it finishes, then continues
   * with `next`. A failure of the child fails this machine too.
   */
  protected enter<TChild>(
    machine: Resumable<TChild, TRequest>,
    next: (value: TChild) => Step<TValue, TRequest>
  ): Step<TValue, TRequest> {
    const settle = (step: Step<TChild, TRequest>): Step<TValue, TRequest> => {
      switch (step.status) {
        case 'need':
          return step
        case 'failed':
          this.forward = null
          return step
        case 'done':
          this.forward = null
          return next(step.value)
      }
    }
    this.forward = response => settle(machine.feed(response))
    return settle(machine.start())
  }

  private advance(run: () => Step<TValue, TRequest>): Step<TValue, TRequest> {
    let step: Step<TValue, TRequest>
    try {
      step = run()
    } catch (error) {
      if (!(error instanceof ArchiveError)) {
        throw error
      }
      step = { status: 'failed', error }
    }
    if (step.status === 'need') {
      this.awaiting = step.request.kind
    } else {
      this.finished = true
      this.forward = null
    }
    return step
  }

  private get label(): string {
    return this.constructor.name
  }
}

export interface DecodedHeader {
  header: ArchiveHeader
  storeSize: number
}

/** Asks for the store length, then for the fixed-size header at offset 0. */
export class HeaderDecoder extends Machine<DecodedHeader, ReadSeekRequest> {
  private storeSize = 0

  protected begin() {
    return this.need({ kind: 'size' })
  }

  protected resume(response: IoResponse) {
    switch (response.kind) {
      case 'size':
        this.storeSize = response.size
        return this.need({ kind: 'read', offset: 0, length: HEADER_SIZE })
      case 'eof': {
        const prefix = response.data.subarray(0, Math.min(response.data.length, MAGIC.length))
        if (!prefix.equals(MAGIC.subarray(0, prefix.length))) {
          return this.fail('BadMagic', 'Store does not start with the archive magic number', { offset: 0 })
        }
        return this.fail(
          'UnexpectedEof',
          `Store holds ${this.storeSize} bytes, too few for the ${HEADER_SIZE}-byte header`,
          { offset: response.data.length }
        )
      }
      case 'data':
        return this.done({ header: decodeHeader(response.data), storeSize: this.storeSize })
      default:
        return this.unexpected(response)
    }
  }
}

/**
 * Reads the slot table in batches of `batchSlots`, classifying each slot as
 * empty, tombstone or occupied.
 */
export class IndexTableDecoder extends Machine<IndexSlot[], ReadSeekRequest> {
  private readonly slots: IndexSlot[] = []

  constructor(
    private readonly header: ArchiveHeader,
    private readonly batchSlots: number = DEFAULT_INDEX_BATCH_SLOTS
  ) {
    super()
    if (!Number.isInteger(batchSlots) || batchSlots < 1) {
      throw new RangeError(`Index batch size must be a positive integer, got ${batchSlots}`)
    }
  }

  protected begin() {
    return this.requestBatch()
  }

  protected resume(response: IoResponse) {
    switch (response.kind) {
      case 'eof': {
        const decoded = this.slots.length + Math.floor(response.data.length / SLOT_SIZE)
        return this.fail(
          'UnexpectedEof',
          `Index table ends after ${decoded} of ${this.header.capacity} slots`,
          { offset: this.header.indexOffset + this.slots.length * SLOT_SIZE + response.data.length }
        )
      }
      case 'data':
        for (let pos = 0; pos + SLOT_SIZE <= response.data.length; pos += SLOT_SIZE) {
          this.slots.push(decodeSlot(response.data.subarray(pos, pos + SLOT_SIZE), this.slots.length))
        }
        return this.slots.length < this.header.capacity ? this.requestBatch() : this.done(this.slots)
      default:
        return this.unexpected(response)
    }
  }

  private requestBatch() {
    const count = Math.min(this.batchSlots, this.header.capacity - this.slots.length)
    return this.need({
      kind: 'read',
      offset: this.header.indexOffset + this.slots.length * SLOT_SIZE,
      length: count * SLOT_SIZE,
    })
  }
}

export interface LoadedArchive {
  header: ArchiveHeader
  storeSize: number
  slots: IndexSlot[]
}

/** Header, then the full index table, then the data area bounds check. */
export class ArchiveLoader extends Machine<LoadedArchive, ReadSeekRequest> {
  constructor(private readonly batchSlots: number = DEFAULT_INDEX_BATCH_SLOTS) {
    super()
  }

  protected begin() {
    return this.enter(new HeaderDecoder(), ({ header, storeSize }) =>
      this.enter(new IndexTableDecoder(header, this.batchSlots), slots => {
        if (header.dataEnd > storeSize) {
          return this.fail(
            'UnexpectedEof',
            `Data area ends at ${header.dataEnd} but the store holds ${storeSize} bytes`,
            { offset: storeSize }
          )
        }
        return this.done({ header, storeSize, slots })
      })
    )
  }
}

/**
 * Streams one entry payload to `sink`. Raw payloads are forwarded chunk by
 * chunk as they arrive, so the sink may see bytes before the checksum has
 * been verified; compressed payloads are buffered and inflated first.
 * Resolves to the number of bytes delivered.
 */
export class PayloadDecoder extends Machine<number, ReadSeekRequest> {
  private remaining: number
  private readonly crc = new Crc32()
  private readonly compressedChunks: Buffer[] = []

  constructor(
    private readonly name: string,
    private readonly descriptor: EntryDescriptor,
    private readonly codec: Codec,
    private readonly sink: ChunkSink,
    private readonly chunkSize: number = DEFAULT_CHUNK_SIZE
  ) {
    super()
    this.remaining = descriptor.storedLength
  }

  protected begin() {
    if (this.remaining === 0) {
      return this.finish()
    }
    return this.need({
      kind: 'read',
      offset: this.descriptor.offset,
      length: Math.min(this.chunkSize, this.remaining),
    })
  }

  protected resume(response: IoResponse) {
    switch (response.kind) {
      case 'eof': {
        const consumed = this.descriptor.storedLength - this.remaining + response.data.length
        return this.fail(
          'UnexpectedEof',
          `Entry '${this.name}' ends after ${consumed} of ${this.descriptor.storedLength} stored bytes`,
          { entryName: this.name, offset: this.descriptor.offset + consumed }
        )
      }
      case 'data':
        this.consume(response.data)
        if (this.remaining > 0) {
          return this.need({ kind: 'readMore', minLength: 1, maxLength: Math.min(this.chunkSize, this.remaining) })
        }
        return this.finish()
      default:
        return this.unexpected(response)
    }
  }

  private consume(data: Buffer) {
    const chunk = data.length > this.remaining ? data.subarray(0, this.remaining) : data
    this.remaining -= chunk.length
    if (this.descriptor.compressed) {
      this.compressedChunks.push(chunk)
      return
    }
    this.crc.update(chunk)
    this.sink(chunk)
  }

  private finish() {
    const { compressed, storedLength, uncompressedLength, checksum } = this.descriptor
    let content: Buffer | null = null
    if (compressed) {
      try {
        content = this.codec.decompress(Buffer.concat(this.compressedChunks, storedLength), uncompressedLength)
      } catch (error) {
        if (!(error instanceof ArchiveError)) {
          throw error
        }
        return this.fail(error.code, `Entry '${this.name}': ${error.message}`, {
          entryName: this.name,
          offset: this.descriptor.offset,
          cause: error,
        })
      }
      this.crc.update(content)
    }
    const actual = this.crc.digest()
    if (actual !== checksum) {
      return this.fail(
        'IntegrityMismatch',
        `Entry '${this.name}' checksum mismatch: expected 0x${hex(checksum)}, got 0x${hex(actual)}`,
        { entryName: this.name, offset: this.descriptor.offset }
      )
    }
    if (content) {
      this.sink(content)
    }
    return this.done(uncompressedLength)
  }
}

/** Emits a fixed list of mutation requests, one suspension each. */
export class WriteSequence extends Machine<void, MutationRequest> {
  private next = 0

  constructor(private readonly requests: readonly MutationRequest[]) {
    super()
  }

  protected begin() {
    return this.emit()
  }

  protected resume(response: IoResponse) {
    return response.kind === 'ack' ? this.emit() : this.unexpected(response)
  }

  private emit() {
    if (this.next >= this.requests.length) {
      return this.done(undefined)
    }
    return this.need(this.requests[this.next++])
  }
}

export interface RangeMove {
  from: number
  to: number
  length: number
}

/**
 * Copies byte ranges inside the store with read-then-write request pairs.
 * A move whose destination overlaps the tail of its own source is copied
 * back to front.
 */
export class RangeCopier extends Machine<number, IoRequest> {
  private moveIndex = 0
  private copied = 0
  private pending = 0
  private total = 0

  constructor(
    private readonly moves: readonly RangeMove[],
    private readonly chunkSize: number = DEFAULT_CHUNK_SIZE
  ) {
    super()
  }

  protected begin() {
    return this.nextRead()
  }

  protected resume(response: IoResponse) {
    const move = this.moves[this.moveIndex]
    switch (response.kind) {
      case 'eof':
        return this.fail(
          'UnexpectedEof',
          `Store ended while relocating ${move.length} bytes from offset ${move.from}`,
          { offset: this.chunkStart(move, this.pending) + response.data.length }
        )
      case 'data':
        return this.need({ kind: 'write', offset: move.to + this.chunkStart(move, this.pending) - move.from, data: response.data })
      case 'ack':
        this.copied += this.pending
        this.total += this.pending
        this.pending = 0
        return this.nextRead()
      default:
        return this.unexpected(response)
    }
  }

  private nextRead() {
    while (this.moveIndex < this.moves.length) {
      const move = this.moves[this.moveIndex]
      if (move.from !== move.to && this.copied < move.length) {
        this.pending = Math.min(this.chunkSize, move.length - this.copied)
        return this.need({ kind: 'read', offset: this.chunkStart(move, this.pending), length: this.pending })
      }
      this.moveIndex++
      this.copied = 0
    }
    return this.done(this.total)
  }

  /** Absolute source offset of the chunk currently being copied. */
  private chunkStart(move: RangeMove, length: number): number {
    const backwards = move.to > move.from && move.to < move.from + move.length
    return backwards ? move.from + move.length - this.copied - length : move.from + this.copied
  }
}

/**
 * Runs machines one after another. `completedStages` tells a caller that
 * saw a failure how far the sequence got.
 */
export class MachineSequence<TRequest extends IoRequest> extends Machine<void, TRequest> {
  private completed = 0

  constructor(private readonly stages: ReadonlyArray<() => Resumable<unknown, TRequest>>) {
    super()
  }

  get completedStages(): number {
    return this.completed
  }

  protected begin() {
    return this.runStage()
  }

  private runStage(): Step<void, TRequest> {
    if (this.completed >= this.stages.length) {
      return this.done(undefined)
    }
    return this.enter(this.stages[this.completed](), () => {
      this.completed++
      return this.runStage()
    })
  }
}

function hex(value: number): string {
  return value.toString(16).padStart(8, '0')
}

export function slotWrite(slotIndex: number, bytes: Buffer): MutationRequest {
  return { kind: 'write', offset: slotPosition(slotIndex), data: bytes }
}

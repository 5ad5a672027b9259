import * as fs from 'fs'
import {
  AckResponse,
  AsyncRequestHandlers,
  IoRequest,
  IoResponse,
  ReadResponse,
  ReadSeekRequest,
  Resumable,
  SyncRequestHandlers,
} from 'slotpak-protocol'

export interface ReadableStore {
  readonly mutable: boolean
  size(): number
  /** Reads into `target` starting at `position`; returns 0 at the end of the store. */
  read(target: Buffer, position: number): number
  close(): void
}

export interface MutableStore extends ReadableStore {
  readonly mutable: true
  write(data: Buffer, position: number): void
  truncate(length: number): void
  sync(): void
}

export interface AsyncReadableStore {
  size(): Promise<number>
  read(target: Buffer, position: number): Promise<number>
  close(): Promise<void>
}

/** Growable in-memory store. */
export class MemoryStore implements MutableStore {
  readonly mutable = true
  private buf: Buffer
  private length: number

  constructor(initial: Buffer = Buffer.alloc(0)) {
    this.buf = Buffer.from(initial)
    this.length = initial.length
  }

  size(): number {
    return this.length
  }

  read(target: Buffer, position: number): number {
    if (position >= this.length) {
      return 0
    }
    return this.buf.copy(target, 0, position, Math.min(this.length, position + target.length))
  }

  write(data: Buffer, position: number): void {
    this.ensureCapacity(position + data.length)
    if (position > this.length) {
      this.buf.fill(0, this.length, position)
    }
    data.copy(this.buf, position)
    this.length = Math.max(this.length, position + data.length)
  }

  truncate(length: number): void {
    if (length > this.length) {
      this.ensureCapacity(length)
      this.buf.fill(0, this.length, length)
    }
    this.length = length
  }

  sync(): void { }

  close(): void { }

  /** A copy of the current contents. */
  contents(): Buffer {
    return Buffer.from(this.buf.subarray(0, this.length))
  }

  private ensureCapacity(size: number) {
    if (this.buf.length >= size) {
      return
    }
    const next = Buffer.alloc(Math.max(size, Math.floor(this.buf.length * 1.5)))
    this.buf.copy(next, 0, 0, this.length)
    this.buf = next
  }
}

/** Read-only view over a buffer that already holds an archive. */
export class BufferSource implements ReadableStore {
  readonly mutable = false

  constructor(private readonly bytes: Buffer) { }

  size(): number {
    return this.bytes.length
  }

  read(target: Buffer, position: number): number {
    if (position >= this.bytes.length) {
      return 0
    }
    return this.bytes.copy(target, 0, position, Math.min(this.bytes.length, position + target.length))
  }

  close(): void { }
}

export class ReadOnlyFileStore implements ReadableStore {
  readonly mutable: boolean = false
  protected fd: number | null

  constructor(readonly filePath: string, flags: string = 'r') {
    this.fd = fs.openSync(filePath, flags)
  }

  size(): number {
    return fs.fstatSync(this.descriptor()).size
  }

  read(target: Buffer, position: number): number {
    return fs.readSync(this.descriptor(), target, 0, target.length, position)
  }

  close(): void {
    if (this.fd === null) {
      return
    }
    const fd = this.fd
    this.fd = null
    fs.closeSync(fd)
  }

  protected descriptor(): number {
    if (this.fd === null) {
      throw new Error(`File store '${this.filePath}' is closed`)
    }
    return this.fd
  }
}

/** Read-write file store. `create` truncates or creates the file. */
export class FileStore extends ReadOnlyFileStore implements MutableStore {
  readonly mutable = true

  constructor(filePath: string, options: { create?: boolean } = {}) {
    super(filePath, options.create ? 'w+' : 'r+')
  }

  write(data: Buffer, position: number): void {
    let written = 0
    while (written < data.length) {
      written += fs.writeSync(this.descriptor(), data, written, data.length - written, position + written)
    }
  }

  truncate(length: number): void {
    fs.ftruncateSync(this.descriptor(), length)
  }

  sync(): void {
    fs.fsyncSync(this.descriptor())
  }
}

export class FileHandleStore implements AsyncReadableStore {
  private constructor(private readonly handle: fs.promises.FileHandle) { }

  static async open(filePath: string): Promise<FileHandleStore> {
    return new FileHandleStore(await fs.promises.open(filePath, 'r'))
  }

  async size(): Promise<number> {
    return (await this.handle.stat()).size
  }

  async read(target: Buffer, position: number): Promise<number> {
    const { bytesRead } = await this.handle.read(target, 0, target.length, position)
    return bytesRead
  }

  async close(): Promise<void> {
    await this.handle.close()
  }
}

type ReadKinds = ReadSeekRequest['kind']
type MutationKinds = Exclude<IoRequest['kind'], ReadKinds>

const ACK: AckResponse = Object.freeze({ kind: 'ack' })

function spanResponse(buf: Buffer, filled: number, min: number): ReadResponse {
  const data = buf.subarray(0, filled)
  return filled < min ? { kind: 'eof', data, wanted: min } : { kind: 'data', data }
}

function runSync<TValue, TRequest extends IoRequest>(
  machine: Resumable<TValue, TRequest>,
  dispatch: (request: TRequest) => IoResponse
): TValue {
  let step = machine.start()
  for (;;) {
    switch (step.status) {
      case 'done':
        return step.value
      case 'failed':
        throw step.error
      case 'need':
        step = machine.feed(dispatch(step.request))
    }
  }
}

/** Answers read requests synchronously against a `ReadableStore`. */
export class SyncReadDriver {
  protected cursor = 0

  private readonly readHandlers: SyncRequestHandlers<ReadKinds> = {
    size: () => ({ kind: 'size', size: this.store.size() }),
    read: request => this.readSpan(request.offset, request.length, request.length),
    readMore: request => this.readSpan(this.cursor, request.minLength, request.maxLength),
  }

  constructor(protected readonly store: ReadableStore) { }

  run<TValue>(machine: Resumable<TValue, ReadSeekRequest>): TValue {
    return runSync(machine, request => this.dispatchRead(request))
  }

  protected dispatchRead(request: ReadSeekRequest): IoResponse {
    switch (request.kind) {
      case 'size':
        return this.readHandlers.size(request)
      case 'read':
        return this.readHandlers.read(request)
      case 'readMore':
        return this.readHandlers.readMore(request)
    }
  }

  private readSpan(position: number, min: number, max: number): ReadResponse {
    const buf = Buffer.alloc(max)
    let filled = 0
    while (filled < min) {
      const n = this.store.read(buf.subarray(filled), position + filled)
      if (n === 0) {
        break
      }
      filled += n
    }
    this.cursor = position + filled
    return spanResponse(buf, filled, min)
  }
}

/** Adds write, truncate and sync to the read driver. */
export class SyncDriver extends SyncReadDriver {
  private readonly mutationHandlers: SyncRequestHandlers<MutationKinds> = {
    write: request => {
      this.mutableStore.write(request.data, request.offset)
      this.cursor = request.offset + request.data.length
      return ACK
    },
    truncate: request => {
      this.mutableStore.truncate(request.length)
      return ACK
    },
    sync: () => {
      this.mutableStore.sync()
      return ACK
    },
  }

  constructor(private readonly mutableStore: MutableStore) {
    super(mutableStore)
  }

  runMutation<TValue>(machine: Resumable<TValue, IoRequest>): TValue {
    return runSync(machine, request => {
      switch (request.kind) {
        case 'write':
          return this.mutationHandlers.write(request)
        case 'truncate':
          return this.mutationHandlers.truncate(request)
        case 'sync':
          return this.mutationHandlers.sync(request)
        default:
          return this.dispatchRead(request)
      }
    })
  }
}

/** The same read protocol against a promise-based store. */
export class AsyncReadDriver {
  private cursor = 0

  private readonly handlers: AsyncRequestHandlers<ReadKinds> = {
    size: async () => ({ kind: 'size', size: await this.store.size() }),
    read: request => this.readSpan(request.offset, request.length, request.length),
    readMore: request => this.readSpan(this.cursor, request.minLength, request.maxLength),
  }

  constructor(private readonly store: AsyncReadableStore) { }

  async run<TValue>(machine: Resumable<TValue, ReadSeekRequest>): Promise<TValue> {
    let step = machine.start()
    for (;;) {
      switch (step.status) {
        case 'done':
          return step.value
        case 'failed':
          throw step.error
        case 'need':
          step = machine.feed(await this.dispatch(step.request))
      }
    }
  }

  private dispatch(request: ReadSeekRequest): Promise<IoResponse> {
    switch (request.kind) {
      case 'size':
        return this.handlers.size(request)
      case 'read':
        return this.handlers.read(request)
      case 'readMore':
        return this.handlers.readMore(request)
    }
  }

  private async readSpan(position: number, min: number, max: number): Promise<ReadResponse> {
    const buf = Buffer.alloc(max)
    let filled = 0
    while (filled < min) {
      const n = await this.store.read(buf.subarray(filled), position + filled)
      if (n === 0) {
        break
      }
      filled += n
    }
    this.cursor = position + filled
    return spanResponse(buf, filled, min)
  }
}

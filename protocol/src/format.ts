import { ArchiveError } from './errors';

export const MAGIC = Buffer.from('SPAK', 'ascii');
export const FORMAT_VERSION = 1;
export const HEADER_SIZE = 64;
export const SLOT_SIZE = 128;
export const INDEX_OFFSET = HEADER_SIZE;
export const SLOT_NAME_OFFSET = 32;
export const MAX_NAME_BYTES = SLOT_SIZE - SLOT_NAME_OFFSET;
export const MAX_ENTRY_BYTES = 0xffffffff;

export const SlotState = {
  EMPTY: 0,
  OCCUPIED: 1,
  TOMBSTONE: 2,
} as const;

export const EntryFlags = {
  DEFLATED: 0x01,
} as const;

const KNOWN_ENTRY_FLAGS = EntryFlags.DEFLATED;

export interface ArchiveHeader {
  version: number;
  /** Number of slots in the index table. */
  capacity: number;
  liveCount: number;
  tombstoneCount: number;
  indexOffset: number;
  /** First byte of the data area, directly after the index table. */
  dataStart: number;
  /** One past the last byte of the data area. */
  dataEnd: number;
}

export interface EntryDescriptor {
  offset: number;
  storedLength: number;
  uncompressedLength: number;
  compressed: boolean;
  /** CRC-32 of the uncompressed content. */
  checksum: number;
}

export type IndexSlot =
  | { state: 'empty' }
  | { state: 'tombstone' }
  | { state: 'occupied'; name: string; hash: number; descriptor: EntryDescriptor };

export type OccupiedSlot = Extract<IndexSlot, { state: 'occupied' }>;

export const EMPTY_SLOT: IndexSlot = Object.freeze({ state: 'empty' });
export const TOMBSTONE_SLOT: IndexSlot = Object.freeze({ state: 'tombstone' });

class HeaderView {
  private static readonly VERSION_OFFSET = 4;
  private static readonly HEADER_SIZE_OFFSET = 6;
  private static readonly SLOT_SIZE_OFFSET = 8;
  private static readonly FLAGS_OFFSET = 10;
  private static readonly CAPACITY_OFFSET = 12;
  private static readonly LIVE_COUNT_OFFSET = 16;
  private static readonly TOMBSTONE_COUNT_OFFSET = 20;
  private static readonly INDEX_OFFSET_OFFSET = 24;
  private static readonly DATA_START_OFFSET = 32;
  private static readonly DATA_END_OFFSET = 40;

  constructor(private buf: Buffer) { }

  get magicMatches() { return this.buf.subarray(0, MAGIC.length).equals(MAGIC); }
  writeMagic() { MAGIC.copy(this.buf, 0); }

  get version() { return this.buf.readUInt16BE(HeaderView.VERSION_OFFSET); }
  set version(v: number) { this.buf.writeUInt16BE(v, HeaderView.VERSION_OFFSET); }

  get headerSize() { return this.buf.readUInt16BE(HeaderView.HEADER_SIZE_OFFSET); }
  set headerSize(v: number) { this.buf.writeUInt16BE(v, HeaderView.HEADER_SIZE_OFFSET); }

  get slotSize() { return this.buf.readUInt16BE(HeaderView.SLOT_SIZE_OFFSET); }
  set slotSize(v: number) { this.buf.writeUInt16BE(v, HeaderView.SLOT_SIZE_OFFSET); }

  get flags() { return this.buf.readUInt16BE(HeaderView.FLAGS_OFFSET); }
  set flags(v: number) { this.buf.writeUInt16BE(v, HeaderView.FLAGS_OFFSET); }

  get capacity() { return this.buf.readUInt32BE(HeaderView.CAPACITY_OFFSET); }
  set capacity(v: number) { this.buf.writeUInt32BE(v >>> 0, HeaderView.CAPACITY_OFFSET); }

  get liveCount() { return this.buf.readUInt32BE(HeaderView.LIVE_COUNT_OFFSET); }
  set liveCount(v: number) { this.buf.writeUInt32BE(v >>> 0, HeaderView.LIVE_COUNT_OFFSET); }

  get tombstoneCount() { return this.buf.readUInt32BE(HeaderView.TOMBSTONE_COUNT_OFFSET); }
  set tombstoneCount(v: number) { this.buf.writeUInt32BE(v >>> 0, HeaderView.TOMBSTONE_COUNT_OFFSET); }

  get indexOffset() { return Number(this.buf.readBigUInt64BE(HeaderView.INDEX_OFFSET_OFFSET)); }
  set indexOffset(v: number) { this.buf.writeBigUInt64BE(BigInt(v), HeaderView.INDEX_OFFSET_OFFSET); }

  get dataStart() { return Number(this.buf.readBigUInt64BE(HeaderView.DATA_START_OFFSET)); }
  set dataStart(v: number) { this.buf.writeBigUInt64BE(BigInt(v), HeaderView.DATA_START_OFFSET); }

  get dataEnd() { return Number(this.buf.readBigUInt64BE(HeaderView.DATA_END_OFFSET)); }
  set dataEnd(v: number) { this.buf.writeBigUInt64BE(BigInt(v), HeaderView.DATA_END_OFFSET); }
}

class SlotView {
  private static readonly STATE_OFFSET = 0;
  private static readonly FLAGS_OFFSET = 1;
  private static readonly NAME_LENGTH_OFFSET = 2;
  private static readonly HASH_OFFSET = 4;
  private static readonly DATA_OFFSET = 8;
  private static readonly STORED_LENGTH_OFFSET = 16;
  private static readonly UNCOMPRESSED_LENGTH_OFFSET = 20;
  private static readonly CHECKSUM_OFFSET = 24;

  constructor(private buf: Buffer) { }

  get state() { return this.buf.readUInt8(SlotView.STATE_OFFSET); }
  set state(v: number) { this.buf.writeUInt8(v, SlotView.STATE_OFFSET); }

  get flags() { return this.buf.readUInt8(SlotView.FLAGS_OFFSET); }
  set flags(v: number) { this.buf.writeUInt8(v & 0xff, SlotView.FLAGS_OFFSET); }

  get nameLength() { return this.buf.readUInt16BE(SlotView.NAME_LENGTH_OFFSET); }
  set nameLength(v: number) { this.buf.writeUInt16BE(v, SlotView.NAME_LENGTH_OFFSET); }

  get hash() { return this.buf.readUInt32BE(SlotView.HASH_OFFSET); }
  set hash(v: number) { this.buf.writeUInt32BE(v >>> 0, SlotView.HASH_OFFSET); }

  get dataOffset() { return Number(this.buf.readBigUInt64BE(SlotView.DATA_OFFSET)); }
  set dataOffset(v: number) { this.buf.writeBigUInt64BE(BigInt(v), SlotView.DATA_OFFSET); }

  get storedLength() { return this.buf.readUInt32BE(SlotView.STORED_LENGTH_OFFSET); }
  set storedLength(v: number) { this.buf.writeUInt32BE(v >>> 0, SlotView.STORED_LENGTH_OFFSET); }

  get uncompressedLength() { return this.buf.readUInt32BE(SlotView.UNCOMPRESSED_LENGTH_OFFSET); }
  set uncompressedLength(v: number) { this.buf.writeUInt32BE(v >>> 0, SlotView.UNCOMPRESSED_LENGTH_OFFSET); }

  get checksum() { return this.buf.readUInt32BE(SlotView.CHECKSUM_OFFSET); }
  set checksum(v: number) { this.buf.writeUInt32BE(v >>> 0, SlotView.CHECKSUM_OFFSET); }

  get nameBytes() { return this.buf.subarray(SLOT_NAME_OFFSET, SLOT_NAME_OFFSET + this.nameLength); }
  writeName(bytes: Buffer) { bytes.copy(this.buf, SLOT_NAME_OFFSET); }
}

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

export function dataStartFor(capacity: number): number {
  return INDEX_OFFSET + capacity * SLOT_SIZE;
}

export function slotPosition(slotIndex: number): number {
  return INDEX_OFFSET + slotIndex * SLOT_SIZE;
}

/**
 * Rotate-xor hash over the UTF-8 bytes of an entry name. ASCII letters are
 * folded to lower case before mixing.
 */
export function nameHash(name: string): number {
  let hash = 0;
  for (const byte of Buffer.from(name, 'utf8')) {
    const folded = byte >= 0x41 && byte <= 0x5a ? byte + 0x20 : byte;
    hash = (((hash << 27) | (hash >>> 5)) ^ folded) >>> 0;
  }
  return hash;
}

export function validateEntryName(name: string): void {
  if (name.length === 0) {
    throw new ArchiveError('InvalidName', 'Entry name must not be empty', { entryName: name });
  }
  if (name.includes('\0')) {
    throw new ArchiveError('InvalidName', `Entry name '${name}' contains a NUL character`, { entryName: name });
  }
  const encoded = Buffer.from(name, 'utf8');
  if (encoded.toString('utf8') !== name) {
    throw new ArchiveError('InvalidName', `Entry name '${name}' is not well-formed UTF-16`, { entryName: name });
  }
  const byteLength = encoded.length;
  if (byteLength > MAX_NAME_BYTES) {
    throw new ArchiveError(
      'InvalidName',
      `Entry name '${name}' is ${byteLength} bytes, the limit is ${MAX_NAME_BYTES}`,
      { entryName: name }
    );
  }
}

export function encodeHeader(header: ArchiveHeader): Buffer {
  const buf = Buffer.alloc(HEADER_SIZE, 0);
  const hv = new HeaderView(buf);
  hv.writeMagic();
  hv.version = header.version;
  hv.headerSize = HEADER_SIZE;
  hv.slotSize = SLOT_SIZE;
  hv.flags = 0;
  hv.capacity = header.capacity;
  hv.liveCount = header.liveCount;
  hv.tombstoneCount = header.tombstoneCount;
  hv.indexOffset = header.indexOffset;
  hv.dataStart = header.dataStart;
  hv.dataEnd = header.dataEnd;
  return buf;
}

/**
 * Structural checks only; whether the data area fits inside the store is
 * decided by the caller, which knows the store length.
 */
export function decodeHeader(buf: Buffer): ArchiveHeader {
  if (buf.length < HEADER_SIZE) {
    throw new ArchiveError('UnexpectedEof', `Header needs ${HEADER_SIZE} bytes, got ${buf.length}`, { offset: 0 });
  }
  const hv = new HeaderView(buf);
  if (!hv.magicMatches) {
    throw new ArchiveError('BadMagic', 'Store does not start with the archive magic number', { offset: 0 });
  }
  if (hv.version !== FORMAT_VERSION) {
    throw new ArchiveError('UnsupportedVersion', `Unsupported archive format version: ${hv.version}`, { offset: 4 });
  }
  if (hv.headerSize !== HEADER_SIZE) {
    throw corruptHeader(`Unexpected header size ${hv.headerSize}, expected ${HEADER_SIZE}`);
  }
  if (hv.slotSize !== SLOT_SIZE) {
    throw corruptHeader(`Unexpected slot size ${hv.slotSize}, expected ${SLOT_SIZE}`);
  }
  if (hv.flags !== 0) {
    throw corruptHeader(`Unrecognised header flags 0x${hv.flags.toString(16)}`);
  }
  const header: ArchiveHeader = {
    version: hv.version,
    capacity: hv.capacity,
    liveCount: hv.liveCount,
    tombstoneCount: hv.tombstoneCount,
    indexOffset: hv.indexOffset,
    dataStart: hv.dataStart,
    dataEnd: hv.dataEnd,
  };
  if (header.capacity < 1) {
    throw corruptHeader('Index capacity must be at least one slot');
  }
  if (header.liveCount + header.tombstoneCount > header.capacity) {
    throw corruptHeader(
      `Header claims ${header.liveCount} live and ${header.tombstoneCount} removed slots in a table of ${header.capacity}`
    );
  }
  if (header.indexOffset !== INDEX_OFFSET) {
    throw corruptHeader(`Index table must start at ${INDEX_OFFSET}, header says ${header.indexOffset}`);
  }
  if (header.dataStart !== dataStartFor(header.capacity)) {
    throw corruptHeader(`Data area start ${header.dataStart} does not follow an index of ${header.capacity} slots`);
  }
  if (!Number.isSafeInteger(header.dataEnd) || header.dataEnd < header.dataStart) {
    throw corruptHeader(`Data area end ${header.dataEnd} is before its start ${header.dataStart}`);
  }
  return header;
}

export function emptySlotBytes(state: 'empty' | 'tombstone' = 'empty'): Buffer {
  const buf = Buffer.alloc(SLOT_SIZE, 0);
  buf.writeUInt8(state === 'empty' ? SlotState.EMPTY : SlotState.TOMBSTONE, 0);
  return buf;
}

export function encodeSlot(slot: IndexSlot): Buffer {
  if (slot.state !== 'occupied') {
    return emptySlotBytes(slot.state);
  }
  const buf = Buffer.alloc(SLOT_SIZE, 0);
  const name = Buffer.from(slot.name, 'utf8');
  const view = new SlotView(buf);
  view.state = SlotState.OCCUPIED;
  view.flags = slot.descriptor.compressed ? EntryFlags.DEFLATED : 0;
  view.nameLength = name.length;
  view.hash = slot.hash;
  view.dataOffset = slot.descriptor.offset;
  view.storedLength = slot.descriptor.storedLength;
  view.uncompressedLength = slot.descriptor.uncompressedLength;
  view.checksum = slot.descriptor.checksum;
  view.writeName(name);
  return buf;
}

export function decodeSlot(bytes: Buffer, slotIndex: number): IndexSlot {
  if (bytes.length < SLOT_SIZE) {
    throw new ArchiveError('UnexpectedEof', `Slot ${slotIndex} is truncated`, { offset: slotPosition(slotIndex) });
  }
  const view = new SlotView(bytes);
  switch (view.state) {
    case SlotState.EMPTY:
      return EMPTY_SLOT;
    case SlotState.TOMBSTONE:
      return TOMBSTONE_SLOT;
    case SlotState.OCCUPIED:
      break;
    default:
      throw corruptSlot(slotIndex, `unknown slot state ${view.state}`);
  }

  const flags = view.flags;
  if ((flags & ~KNOWN_ENTRY_FLAGS) !== 0) {
    throw corruptSlot(slotIndex, `unrecognised entry flags 0x${flags.toString(16).padStart(2, '0')}`);
  }
  const nameLength = view.nameLength;
  if (nameLength === 0 || nameLength > MAX_NAME_BYTES) {
    throw corruptSlot(slotIndex, `name length ${nameLength} is out of range`);
  }
  let name: string;
  try {
    name = strictUtf8.decode(view.nameBytes);
  } catch (error) {
    throw corruptSlot(slotIndex, 'name is not valid UTF-8', error);
  }
  if (name.includes('\0')) {
    throw corruptSlot(slotIndex, 'name contains a NUL character');
  }
  const hash = view.hash;
  if (hash !== nameHash(name)) {
    throw corruptSlot(slotIndex, `stored hash 0x${hash.toString(16)} does not match name '${name}'`);
  }
  const offset = view.dataOffset;
  if (!Number.isSafeInteger(offset)) {
    throw corruptSlot(slotIndex, 'payload offset exceeds the addressable range');
  }
  const compressed = (flags & EntryFlags.DEFLATED) !== 0;
  const storedLength = view.storedLength;
  const uncompressedLength = view.uncompressedLength;
  if (!compressed && storedLength !== uncompressedLength) {
    throw corruptSlot(slotIndex, `uncompressed entry '${name}' stores ${storedLength} of ${uncompressedLength} bytes`);
  }
  return {
    state: 'occupied',
    name,
    hash,
    descriptor: { offset, storedLength, uncompressedLength, compressed, checksum: view.checksum },
  };
}

function corruptHeader(message: string): ArchiveError {
  return new ArchiveError('CorruptHeader', message, { offset: 0 });
}

function corruptSlot(slotIndex: number, detail: string, cause?: unknown): ArchiveError {
  return new ArchiveError('CorruptSlot', `Slot ${slotIndex}: ${detail}`, {
    offset: slotPosition(slotIndex),
    cause,
  });
}

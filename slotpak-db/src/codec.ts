import * as zlib from 'zlib'
import { ArchiveError } from 'slotpak-protocol'

export interface Codec {
  compress(data: Buffer): Buffer
  /** Must return exactly `expectedLength` bytes or throw `IntegrityMismatch`. */
  decompress(data: Buffer, expectedLength: number): Buffer
}

export const DEFAULT_COMPRESSION_LEVEL = 6

/** zlib-wrapped deflate, the compression used by deflate-flagged entries. */
export class DeflateCodec implements Codec {
  constructor(private readonly level: number = DEFAULT_COMPRESSION_LEVEL) {
    if (!Number.isInteger(level) || level < 0 || level > 9) {
      throw new RangeError(`Compression level must be an integer from 0 to 9, got ${level}`)
    }
  }

  compress(data: Buffer): Buffer {
    try {
      return zlib.deflateSync(data, { level: this.level })
    } catch (error) {
      throw new ArchiveError('CompressionFailed', 'Deflate compression failed', { cause: error })
    }
  }

  decompress(data: Buffer, expectedLength: number): Buffer {
    let out: Buffer
    try {
      out = zlib.inflateSync(data, { maxOutputLength: Math.max(1, expectedLength) })
    } catch (error) {
      throw new ArchiveError('IntegrityMismatch', 'Compressed payload could not be inflated', { cause: error })
    }
    if (out.length !== expectedLength) {
      throw new ArchiveError(
        'IntegrityMismatch',
        `Inflated payload is ${out.length} bytes, expected ${expectedLength}`
      )
    }
    return out
  }
}

const TABLE = (() => {
  const table = new Uint32Array(256)
  for (let i = 0; i < 256; i++) {
    let c = i
    for (let k = 0; k < 8; k++) {
      c = (c & 1) !== 0 ? 0xedb88320 ^ (c >>> 1) : c >>> 1
    }
    table[i] = c >>> 0
  }
  return table
})()

/** Incremental CRC-32 (IEEE 802.3), for payloads that arrive in chunks. */
export class Crc32 {
  private value = 0xffffffff

  update(chunk: Uint8Array): this {
    let crc = this.value
    for (let i = 0; i < chunk.length; i++) {
      crc = TABLE[(crc ^ chunk[i]) & 0xff] ^ (crc >>> 8)
    }
    this.value = crc >>> 0
    return this
  }

  digest(): number {
    return (this.value ^ 0xffffffff) >>> 0
  }
}

export function crc32(data: Uint8Array): number {
  return new Crc32().update(data).digest()
}

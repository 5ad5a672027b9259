import {
  ArchiveError,
  EMPTY_SLOT,
  EntryDescriptor,
  IndexSlot,
  TOMBSTONE_SLOT,
  alreadyExists,
  encodeSlot,
  nameHash,
  notFound,
  slotPosition,
} from 'slotpak-protocol'

export const DEFAULT_MAX_LOAD_FACTOR = 0.75

export interface IndexEntry {
  name: string
  slot: number
  descriptor: EntryDescriptor
}

export function validateLoadFactor(value: number): number {
  if (!(value > 0 && value <= 1)) {
    throw new RangeError(`Maximum load factor must lie in (0, 1], got ${value}`)
  }
  return value
}

/**
 * Open-addressing table that mirrors the on-disk index slot for slot.
 * Probing is linear from `hash mod capacity`; removal leaves a tombstone so
 * that later probe chains stay intact.
 */
export class ArchiveIndex {
  private live = 0
  private tombstones = 0
  private version = 0

  private constructor(
    private readonly slots: IndexSlot[],
    readonly maxLoadFactor: number
  ) {
    validateLoadFactor(maxLoadFactor)
    for (const slot of slots) {
      if (slot.state === 'occupied') {
        this.live++
      } else if (slot.state === 'tombstone') {
        this.tombstones++
      }
    }
  }

  static empty(capacity: number, maxLoadFactor: number = DEFAULT_MAX_LOAD_FACTOR): ArchiveIndex {
    if (!Number.isInteger(capacity) || capacity < 1 || capacity > 0xffffffff) {
      throw new RangeError(`Index capacity must be a positive 32-bit integer, got ${capacity}`)
    }
    return new ArchiveIndex(new Array<IndexSlot>(capacity).fill(EMPTY_SLOT), maxLoadFactor)
  }

  /**
   * Adopts a decoded slot table. Duplicate names and entries that a probe
   * from their home slot could never reach are reported as corrupt.
   */
  static fromSlots(slots: readonly IndexSlot[], maxLoadFactor: number = DEFAULT_MAX_LOAD_FACTOR): ArchiveIndex {
    if (slots.length < 1) {
      throw new ArchiveError('CorruptHeader', 'Index table has no slots')
    }
    const seen = new Map<string, number>()
    slots.forEach((slot, index) => {
      if (slot.state !== 'occupied') {
        return
      }
      const previous = seen.get(slot.name)
      if (previous !== undefined) {
        throw new ArchiveError(
          'CorruptSlot',
          `Slot ${index}: entry '${slot.name}' is also stored in slot ${previous}`,
          { entryName: slot.name, offset: slotPosition(index) }
        )
      }
      seen.set(slot.name, index)
      for (let probe = slot.hash % slots.length; probe !== index; probe = (probe + 1) % slots.length) {
        if (slots[probe].state === 'empty') {
          throw new ArchiveError(
            'CorruptSlot',
            `Slot ${index}: entry '${slot.name}' is unreachable, slot ${probe} on its probe path is empty`,
            { entryName: slot.name, offset: slotPosition(index) }
          )
        }
      }
    })
    return new ArchiveIndex([...slots], maxLoadFactor)
  }

  get capacity(): number {
    return this.slots.length
  }

  get liveCount(): number {
    return this.live
  }

  get tombstoneCount(): number {
    return this.tombstones
  }

  lookup(name: string): EntryDescriptor | undefined {
    return this.find(name)?.descriptor
  }

  find(name: string): IndexEntry | undefined {
    const capacity = this.slots.length
    const home = nameHash(name) % capacity
    for (let i = 0; i < capacity; i++) {
      const index = (home + i) % capacity
      const slot = this.slots[index]
      if (slot.state === 'empty') {
        return undefined
      }
      if (slot.state === 'occupied' && slot.name === name) {
        return { name, slot: index, descriptor: slot.descriptor }
      }
    }
    return undefined
  }

  /** Places a new entry and returns its slot index. */
  insert(name: string, descriptor: EntryDescriptor): number {
    const capacity = this.slots.length
    const hash = nameHash(name)
    const home = hash % capacity
    let target: number | null = null
    for (let i = 0; i < capacity; i++) {
      const index = (home + i) % capacity
      const slot = this.slots[index]
      if (slot.state !== 'occupied') {
        if (target === null) {
          target = index
        }
        if (slot.state === 'empty') {
          break
        }
        continue
      }
      if (slot.name === name) {
        throw alreadyExists(name)
      }
    }
    if (target === null) {
      throw new ArchiveError('IndexFull', `No free slot left for '${name}' in a table of ${capacity}`, {
        entryName: name,
      })
    }
    if (this.slots[target].state === 'tombstone') {
      this.tombstones--
    }
    this.slots[target] = { state: 'occupied', name, hash, descriptor }
    this.live++
    this.version++
    return target
  }

  update(name: string, descriptor: EntryDescriptor): { slot: number; previous: EntryDescriptor } {
    const found = this.find(name)
    if (!found) {
      throw notFound(name)
    }
    this.slots[found.slot] = { state: 'occupied', name, hash: nameHash(name), descriptor }
    return { slot: found.slot, previous: found.descriptor }
  }

  remove(name: string): { slot: number; descriptor: EntryDescriptor } | undefined {
    const found = this.find(name)
    if (!found) {
      return undefined
    }
    this.slots[found.slot] = TOMBSTONE_SLOT
    this.live--
    this.tombstones++
    this.version++
    return { slot: found.slot, descriptor: found.descriptor }
  }

  /** Live entries in table order. */
  *entries(): IterableIterator<IndexEntry> {
    const expected = this.version
    for (let index = 0; index < this.slots.length; index++) {
      this.assertUnchanged(expected)
      const slot = this.slots[index]
      if (slot.state === 'occupied') {
        yield { name: slot.name, slot: index, descriptor: slot.descriptor }
      }
    }
    this.assertUnchanged(expected)
  }

  *names(): IterableIterator<string> {
    for (const entry of this.entries()) {
      yield entry.name
    }
  }

  slotAt(index: number): IndexSlot {
    const slot = this.slots[index]
    if (slot === undefined) {
      throw new RangeError(`Slot ${index} is outside a table of ${this.slots.length}`)
    }
    return slot
  }

  /** Whether `additional` more entries would push occupancy past the load factor. */
  wouldExceedLoad(additional: number = 1): boolean {
    return this.live + this.tombstones + additional > this.slots.length * this.maxLoadFactor
  }

  /** Smallest doubling of the current capacity that holds the live entries plus `additional`. */
  grownCapacity(additional: number = 1): number {
    const needed = Math.ceil((this.live + additional) / this.maxLoadFactor)
    let capacity = this.slots.length
    while (capacity < needed) {
      capacity *= 2
    }
    return capacity
  }

  /** A fresh table of `capacity` slots holding the live entries; this table is untouched. */
  rehash(capacity: number = this.slots.length): ArchiveIndex {
    if (capacity < this.live) {
      throw new RangeError(`Cannot fit ${this.live} entries into ${capacity} slots`)
    }
    const next = ArchiveIndex.empty(capacity, this.maxLoadFactor)
    for (const entry of this.entries()) {
      next.insert(entry.name, entry.descriptor)
    }
    return next
  }

  /** Same layout with payload offsets replaced for the named entries. */
  withOffsets(offsets: ReadonlyMap<string, number>): ArchiveIndex {
    const slots = this.slots.map((slot): IndexSlot => {
      if (slot.state !== 'occupied') {
        return slot
      }
      const offset = offsets.get(slot.name)
      return offset === undefined ? slot : { ...slot, descriptor: { ...slot.descriptor, offset } }
    })
    return new ArchiveIndex(slots, this.maxLoadFactor)
  }

  encodeTable(): Buffer {
    return Buffer.concat(this.slots.map(slot => encodeSlot(slot)))
  }

  encodeSlot(index: number): Buffer {
    return encodeSlot(this.slotAt(index))
  }

  private assertUnchanged(expected: number) {
    if (this.version !== expected) {
      throw new ArchiveError('ConcurrentModification', 'Archive index changed while it was being iterated')
    }
  }
}

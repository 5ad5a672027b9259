import { ArchiveError } from 'slotpak-protocol'

export interface Extent {
  offset: number
  length: number
}

export interface NamedExtent extends Extent {
  name: string
}

export interface CompactionStep {
  name: string
  from: number
  to: number
  length: number
}

/**
 * Tracks the unused ranges of the data area. Regions are kept sorted by
 * offset and are never adjacent to one another.
 */
export class SpaceAllocator {
  private constructor(
    readonly start: number,
    private dataEnd: number,
    private freeRegions: Extent[]
  ) { }

  static empty(start: number): SpaceAllocator {
    return new SpaceAllocator(start, start, [])
  }

  /** Seeds the free list from the gaps between the given payload extents. */
  static fromExtents(start: number, end: number, used: readonly NamedExtent[]): SpaceAllocator {
    const sorted = used.filter(ext => ext.length > 0).sort((a, b) => a.offset - b.offset)
    const free: Extent[] = []
    let cursor = start
    let previous: NamedExtent | null = null
    for (const ext of sorted) {
      if (ext.offset < start || ext.offset + ext.length > end) {
        throw new ArchiveError(
          'CorruptSlot',
          `Entry '${ext.name}' spans ${ext.offset}..${ext.offset + ext.length}, outside the data area ${start}..${end}`,
          { entryName: ext.name, offset: ext.offset }
        )
      }
      if (previous && ext.offset < cursor) {
        throw new ArchiveError(
          'CorruptSlot',
          `Entry '${ext.name}' overlaps entry '${previous.name}' at offset ${ext.offset}`,
          { entryName: ext.name, offset: ext.offset }
        )
      }
      if (ext.offset > cursor) {
        free.push({ offset: cursor, length: ext.offset - cursor })
      }
      cursor = ext.offset + ext.length
      previous = ext
    }
    if (cursor < end) {
      free.push({ offset: cursor, length: end - cursor })
    }
    return new SpaceAllocator(start, end, free)
  }

  /**
   * Ascending-offset sequential layout starting at `newStart`, the order in
   * which a repack rewrites payloads.
   */
  static planCompaction(extents: readonly NamedExtent[], newStart: number): CompactionStep[] {
    let cursor = newStart
    return [...extents]
      .sort((a, b) => a.offset - b.offset)
      .map(ext => {
        const step = { name: ext.name, from: ext.offset, to: cursor, length: ext.length }
        cursor += ext.length
        return step
      })
  }

  get end(): number {
    return this.dataEnd
  }

  get freeBytes(): number {
    return this.freeRegions.reduce((total, ext) => total + ext.length, 0)
  }

  regions(): Extent[] {
    return this.freeRegions.map(ext => ({ ...ext }))
  }

  clone(): SpaceAllocator {
    return new SpaceAllocator(this.start, this.dataEnd, this.regions())
  }

  /**
   * First fit over the free regions; the remainder of a larger region stays
   * free. Falls back to growing the data area. Zero-length requests take no
   * space and report the data area start.
   */
  allocate(length: number): number {
    if (length <= 0) {
      return this.start
    }
    for (let i = 0; i < this.freeRegions.length; i++) {
      const ext = this.freeRegions[i]
      if (ext.length < length) {
        continue
      }
      if (ext.length === length) {
        this.freeRegions.splice(i, 1)
      } else {
        this.freeRegions[i] = { offset: ext.offset + length, length: ext.length - length }
      }
      return ext.offset
    }
    const tail = this.freeRegions[this.freeRegions.length - 1]
    if (tail && tail.offset + tail.length === this.dataEnd) {
      this.freeRegions.pop()
      this.dataEnd = tail.offset + length
      return tail.offset
    }
    const offset = this.dataEnd
    this.dataEnd += length
    return offset
  }

  /** Returns a range to the free list, merging it with touching regions. */
  release(offset: number, length: number): void {
    if (length <= 0) {
      return
    }
    const start = Math.max(offset, this.start)
    const end = Math.min(offset + length, this.dataEnd)
    if (end <= start) {
      return
    }
    const merged: Extent[] = []
    let mergedStart = start
    let mergedEnd = end
    let inserted = false
    for (const ext of this.freeRegions) {
      const extEnd = ext.offset + ext.length
      if (extEnd < mergedStart) {
        merged.push(ext)
        continue
      }
      if (ext.offset > mergedEnd) {
        if (!inserted) {
          merged.push({ offset: mergedStart, length: mergedEnd - mergedStart })
          inserted = true
        }
        merged.push(ext)
        continue
      }
      mergedStart = Math.min(mergedStart, ext.offset)
      mergedEnd = Math.max(mergedEnd, extEnd)
    }
    if (!inserted) {
      merged.push({ offset: mergedStart, length: mergedEnd - mergedStart })
    }
    this.freeRegions = merged
  }

  /** Drops a free region that touches the data end. Returns whether the end moved. */
  trimTail(): boolean {
    const last = this.freeRegions[this.freeRegions.length - 1]
    if (!last || last.offset + last.length !== this.dataEnd) {
      return false
    }
    this.freeRegions.pop()
    this.dataEnd = Math.max(this.start, last.offset)
    return true
  }
}

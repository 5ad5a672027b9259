import { describe, test, expect } from '@jest/globals';
import { SpaceAllocator } from '../space_allocator';

describe('SpaceAllocator.fromExtents', () => {
  test('should turn the gaps between payloads into free regions', () => {
    const allocator = SpaceAllocator.fromExtents(100, 200, [
      { name: 'b', offset: 150, length: 10 },
      { name: 'a', offset: 110, length: 20 },
    ]);
    expect(allocator.regions()).toEqual([
      { offset: 100, length: 10 },
      { offset: 130, length: 20 },
      { offset: 160, length: 40 },
    ]);
    expect(allocator.freeBytes).toBe(70);
    expect(allocator.end).toBe(200);
  });

  test('should ignore empty payloads', () => {
    const allocator = SpaceAllocator.fromExtents(100, 120, [
      { name: 'empty', offset: 999, length: 0 },
      { name: 'a', offset: 100, length: 20 },
    ]);
    expect(allocator.regions()).toEqual([]);
  });

  test('should reject overlapping payloads', () => {
    expect(() => SpaceAllocator.fromExtents(100, 200, [
      { name: 'a', offset: 100, length: 20 },
      { name: 'b', offset: 110, length: 20 },
    ])).toThrow("Entry 'b' overlaps entry 'a' at offset 110");
  });

  test('should reject payloads outside the data area', () => {
    expect(() => SpaceAllocator.fromExtents(100, 200, [{ name: 'a', offset: 190, length: 20 }]))
      .toThrow("Entry 'a' spans 190..210, outside the data area 100..200");
  });
});

describe('SpaceAllocator.allocate', () => {
  test('should take the first region that fits and keep the remainder', () => {
    const allocator = SpaceAllocator.fromExtents(0, 100, [
      { name: 'a', offset: 10, length: 10 },
      { name: 'b', offset: 50, length: 10 },
    ]);
    // free: 0..10, 20..50, 60..100
    expect(allocator.allocate(15)).toBe(20);
    expect(allocator.regions()).toEqual([
      { offset: 0, length: 10 },
      { offset: 35, length: 15 },
      { offset: 60, length: 40 },
    ]);
    expect(allocator.allocate(10)).toBe(0);
    expect(allocator.regions()[0]).toEqual({ offset: 35, length: 15 });
  });

  test('should grow the data area when nothing fits', () => {
    const allocator = SpaceAllocator.fromExtents(0, 30, [
      { name: 'a', offset: 0, length: 10 },
      { name: 'b', offset: 15, length: 15 },
    ]);
    expect(allocator.allocate(8)).toBe(30);
    expect(allocator.end).toBe(38);
    expect(allocator.regions()).toEqual([{ offset: 10, length: 5 }]);
  });

  test('should extend a free region that touches the end', () => {
    const allocator = SpaceAllocator.fromExtents(0, 30, [{ name: 'a', offset: 0, length: 20 }]);
    expect(allocator.allocate(25)).toBe(20);
    expect(allocator.end).toBe(45);
    expect(allocator.regions()).toEqual([]);
  });

  test('should hand out no space for empty payloads', () => {
    const allocator = SpaceAllocator.empty(64);
    expect(allocator.allocate(0)).toBe(64);
    expect(allocator.end).toBe(64);
  });
});

describe('SpaceAllocator.release', () => {
  test('should merge with both neighbours', () => {
    const allocator = SpaceAllocator.fromExtents(0, 30, [
      { name: 'a', offset: 0, length: 10 },
      { name: 'b', offset: 10, length: 10 },
      { name: 'c', offset: 20, length: 10 },
    ]);
    allocator.release(0, 10);
    allocator.release(20, 10);
    expect(allocator.regions()).toEqual([{ offset: 0, length: 10 }, { offset: 20, length: 10 }]);
    allocator.release(10, 10);
    expect(allocator.regions()).toEqual([{ offset: 0, length: 30 }]);
  });

  test('should keep separate regions apart', () => {
    const allocator = SpaceAllocator.fromExtents(0, 40, [
      { name: 'a', offset: 0, length: 40 },
    ]);
    allocator.release(30, 5);
    allocator.release(5, 5);
    expect(allocator.regions()).toEqual([{ offset: 5, length: 5 }, { offset: 30, length: 5 }]);
  });
});

describe('SpaceAllocator.trimTail', () => {
  test('should drop a free region at the end', () => {
    const allocator = SpaceAllocator.fromExtents(0, 30, [{ name: 'a', offset: 0, length: 10 }]);
    expect(allocator.trimTail()).toBe(true);
    expect(allocator.end).toBe(10);
    expect(allocator.regions()).toEqual([]);
    expect(allocator.trimTail()).toBe(false);
  });

  test('should leave an inner region alone', () => {
    const allocator = SpaceAllocator.fromExtents(0, 30, [{ name: 'a', offset: 20, length: 10 }]);
    expect(allocator.trimTail()).toBe(false);
    expect(allocator.end).toBe(30);
  });

  test('should not affect a clone', () => {
    const allocator = SpaceAllocator.fromExtents(0, 30, [{ name: 'a', offset: 0, length: 10 }]);
    const copy = allocator.clone();
    allocator.trimTail();
    expect(copy.end).toBe(30);
    expect(copy.freeBytes).toBe(20);
  });
});

describe('SpaceAllocator.planCompaction', () => {
  test('should lay payloads out back to back in offset order', () => {
    const plan = SpaceAllocator.planCompaction([
      { name: 'late', offset: 900, length: 5 },
      { name: 'early', offset: 300, length: 10 },
      { name: 'empty', offset: 500, length: 0 },
    ], 192);
    expect(plan).toEqual([
      { name: 'early', from: 300, to: 192, length: 10 },
      { name: 'empty', from: 500, to: 202, length: 0 },
      { name: 'late', from: 900, to: 202, length: 5 },
    ]);
  });
});

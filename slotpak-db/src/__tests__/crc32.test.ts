import { describe, test, expect } from '@jest/globals';
import { Crc32, crc32 } from '../crc32';

describe('crc32', () => {
  test('should match the standard check value', () => {
    expect(crc32(Buffer.from('123456789', 'ascii'))).toBe(0xcbf43926);
  });

  test('should be zero for empty input', () => {
    expect(crc32(Buffer.alloc(0))).toBe(0);
  });

  test('should give the same digest when fed in chunks', () => {
    const digest = new Crc32()
      .update(Buffer.from('hello', 'ascii'))
      .update(Buffer.from(' ', 'ascii'))
      .update(Buffer.from('world', 'ascii'))
      .digest();
    expect(digest).toBe(0x0d4a1185);
    expect(digest).toBe(crc32(Buffer.from('hello world', 'ascii')));
  });
});

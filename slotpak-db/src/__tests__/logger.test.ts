import { describe, test, expect } from '@jest/globals';
import { createConsoleLogger, parseLogLevel } from '../logger';

describe('createConsoleLogger', () => {
  test('should drop messages below the level', () => {
    const lines: string[] = [];
    const logger = createConsoleLogger('pack', 'warn', line => lines.push(line));
    logger.debug('hidden');
    logger.info('hidden too');
    logger.warn('low space');
    logger.error('broken');
    expect(lines).toEqual(['[pack] warn: low space', '[pack] error: broken']);
  });

  test('should print info lines without a level prefix', () => {
    const lines: string[] = [];
    const logger = createConsoleLogger('pack', 'debug', line => lines.push(line));
    logger.info('opened');
    logger.debug('slot 3');
    expect(lines).toEqual(['[pack] opened', '[pack] debug: slot 3']);
  });

  test('should print nothing when silent', () => {
    const lines: string[] = [];
    const logger = createConsoleLogger('pack', 'silent', line => lines.push(line));
    logger.error('ignored');
    expect(lines).toEqual([]);
  });
});

describe('parseLogLevel', () => {
  test('should accept known levels in any case', () => {
    expect(parseLogLevel(' DEBUG ', 'warn')).toBe('debug');
    expect(parseLogLevel('silent', 'warn')).toBe('silent');
  });

  test('should fall back for missing or unknown values', () => {
    expect(parseLogLevel(undefined, 'warn')).toBe('warn');
    expect(parseLogLevel('chatty', 'error')).toBe('error');
  });
});

import { describe, it, expect } from 'vitest';
import { LOG_LEVEL_PRIORITY, LogLevelSchema, parseLogLevel } from '../../../src/logging/levels.js';

describe('log levels', () => {
  it('should order levels by severity', () => {
    expect(LOG_LEVEL_PRIORITY.emergency).toBeLessThan(LOG_LEVEL_PRIORITY.error);
    expect(LOG_LEVEL_PRIORITY.error).toBeLessThan(LOG_LEVEL_PRIORITY.debug);
  });

  it('should accept every RFC 5424 name', () => {
    for (const level of Object.keys(LOG_LEVEL_PRIORITY)) {
      expect(LogLevelSchema.safeParse(level).success).toBe(true);
    }
  });

  describe('parseLogLevel', () => {
    it('should parse case-insensitively', () => {
      expect(parseLogLevel('WARNING')).toBe('warning');
      expect(parseLogLevel('debug')).toBe('debug');
    });

    it('should return undefined for unknown or missing values', () => {
      expect(parseLogLevel('verbose')).toBeUndefined();
      expect(parseLogLevel('')).toBeUndefined();
      expect(parseLogLevel(undefined)).toBeUndefined();
    });
  });
});

import { afterEach, describe, expect, it } from 'vitest';
import { logger, redactObject, setLogLevel } from '../../src/infra/logger';

describe('redactObject', () => {
  it('masks sensitive keys at any depth', () => {
    expect(
      redactObject({
        username: 'admin',
        password: 'admin123',
        nested: { accessToken: 'abc', items: [{ sessionSecret: 'x', count: 2 }] },
      })
    ).toEqual({
      username: 'admin',
      password: '[REDACTED]',
      nested: { accessToken: '[REDACTED]', items: [{ sessionSecret: '[REDACTED]', count: 2 }] },
    });
  });

  it('leaves primitives untouched', () => {
    expect(redactObject('plain')).toBe('plain');
    expect(redactObject(null)).toBeNull();
  });
});

describe('setLogLevel', () => {
  afterEach(() => {
    logger.level = 'error';
  });

  it('applies a known level', () => {
    setLogLevel('debug');
    expect(logger.level).toBe('debug');
  });

  it('keeps the current level for an unknown one', () => {
    logger.level = 'warn';
    setLogLevel('loud');
    expect(logger.level).toBe('warn');
  });
});

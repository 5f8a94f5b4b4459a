import { describe, it, expect, afterEach } from 'vitest';
import { envFlag, envNumber, envString } from '../../src/util/env.js';

const NAME = 'PSG_TEST_ENV_VALUE';

describe('env helpers', (): void => {
  afterEach((): void => {
    delete process.env[NAME];
  });

  it('reads flags as 1 or true', (): void => {
    expect(envFlag(NAME)).toBe(false);
    process.env[NAME] = '1';
    expect(envFlag(NAME)).toBe(true);
    process.env[NAME] = 'true';
    expect(envFlag(NAME)).toBe(true);
    process.env[NAME] = 'yes';
    expect(envFlag(NAME)).toBe(false);
  });

  it('parses numbers with a fallback', (): void => {
    expect(envNumber(NAME, 7)).toBe(7);
    process.env[NAME] = '1789772.5';
    expect(envNumber(NAME, 7)).toBe(1789772.5);
    process.env[NAME] = 'fast';
    expect(envNumber(NAME, 7)).toBe(7);
    process.env[NAME] = '  ';
    expect(envNumber(NAME, 7)).toBe(7);
  });

  it('reads strings with a fallback for empty values', (): void => {
    expect(envString(NAME, 'YM2149')).toBe('YM2149');
    process.env[NAME] = '';
    expect(envString(NAME, 'YM2149')).toBe('YM2149');
    process.env[NAME] = 'AY-3-8910';
    expect(envString(NAME, 'YM2149')).toBe('AY-3-8910');
  });
});

import { describe, it, expect, vi, afterEach } from 'vitest';
import { envNumber, envString } from '../env.js';

describe('env helpers', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('envString: 비어 있으면 기본값, 앞뒤 공백 제거', () => {
    vi.stubEnv('TEST_STRING', '  value ');
    vi.stubEnv('TEST_EMPTY', '');

    expect(envString('TEST_STRING', 'fallback')).toBe('value');
    expect(envString('TEST_EMPTY', 'fallback')).toBe('fallback');
  });

  it('envNumber: 숫자가 아니면 에러', () => {
    vi.stubEnv('TEST_NUMBER', '42.5');
    vi.stubEnv('TEST_NAN', 'abc');
    vi.stubEnv('TEST_NONE', '');

    expect(envNumber('TEST_NUMBER')).toBe(42.5);
    expect(envNumber('TEST_NONE', 7)).toBe(7);
    expect(() => envNumber('TEST_NAN')).toThrow('Environment variable TEST_NAN must be a number, got: abc');
  });
});

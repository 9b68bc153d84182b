import { describe, it, expect, vi, afterEach } from 'vitest';
import { validateEnv } from './env-validator';

describe('validateEnv', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should apply defaults to an empty environment', () => {
    const config = validateEnv({});

    expect(config.QUARRY_GATEWAY_URL).toBe('https://localhost:5000/v1/api');
    expect(config.QUARRY_REQUEST_SPACING_MS).toBe(3000);
    expect(config.QUARRY_MAX_RETRIES).toBe(2);
    expect(config.QUARRY_RETRY_BASE_DELAY_MS).toBe(3000);
    expect(config.QUARRY_REQUEST_TIMEOUT_MS).toBeUndefined();
    expect(config.QUARRY_OUTPUT_DIR).toBe('data');
    expect(config.LOG_FILE_ENABLED).toBe(false);
  });

  it('should coerce numeric and boolean variables', () => {
    const config = validateEnv({
      QUARRY_REQUEST_SPACING_MS: '1500',
      QUARRY_REQUEST_TIMEOUT_MS: '20000',
      LOG_FILE_ENABLED: 'true',
    });

    expect(config.QUARRY_REQUEST_SPACING_MS).toBe(1500);
    expect(config.QUARRY_REQUEST_TIMEOUT_MS).toBe(20000);
    expect(config.LOG_FILE_ENABLED).toBe(true);
  });

  it('should exit the process on invalid values', () => {
    const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });

    expect(() => validateEnv({ QUARRY_MAX_RETRIES: '-1' })).toThrow('process.exit');
    expect(exit).toHaveBeenCalledWith(1);
  });
});

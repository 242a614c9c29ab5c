import { parseEnv } from '@/config/env';
import { DEFAULT_BASE_URL } from '@/constants/weather';

describe('parseEnv (unit)', () => {
  it('uses defaults for an empty environment', () => {
    expect(parseEnv({})).toEqual({
      NODE_ENV: undefined,
      LOG_LEVEL: 'warn',
      OPENWEATHER_BASE_URL: DEFAULT_BASE_URL,
    });
  });

  it('keeps valid values', () => {
    expect(
      parseEnv({
        NODE_ENV: 'development',
        LOG_LEVEL: 'debug',
        OPENWEATHER_BASE_URL: 'http://localhost:8080/data/2.5',
      })
    ).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'debug',
      OPENWEATHER_BASE_URL: 'http://localhost:8080/data/2.5',
    });
  });

  /**
   * Purpose:
   * Verifies Defensive behavior:
   * - bad values never throw, they fall back to defaults
   */
  it('falls back on invalid values instead of throwing', () => {
    expect(
      parseEnv({
        NODE_ENV: 'staging',
        LOG_LEVEL: 'loud',
        OPENWEATHER_BASE_URL: 'not a url',
      })
    ).toEqual({
      NODE_ENV: undefined,
      LOG_LEVEL: 'warn',
      OPENWEATHER_BASE_URL: DEFAULT_BASE_URL,
    });
  });
});

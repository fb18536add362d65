import { describe, expect, it } from 'vitest';
import { ConfigError, loadConfig, requireXCredentials } from './index.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const cfg = loadConfig({ POST_TIMEZONE: 'UTC' });
    expect(cfg).toMatchObject({
      port: 8787,
      monthlyVerseLimit: 400,
      timeGateEnabled: true,
      minPostIntervalMinutes: 60,
      stateFile: 'progress_state.json',
      timezone: 'UTC',
      quranApiBase: 'https://api.alquran.cloud/v1',
      quranSourceEdition: 'quran-uthmani',
      quranTranslationEdition: 'en.sahih',
      httpTimeoutMs: 12_000,
      xVerifyOnStart: false,
    });
  });

  it('accepts the short credential names', () => {
    const cfg = loadConfig({
      API_KEY: 'test-key',
      API_SECRET: 'test-secret',
      ACCESS_TOKEN: 'test-token',
      ACCESS_TOKEN_SECRET: 'test-token-secret',
      BEARER_TOKEN: 'test-bearer',
    });
    expect(requireXCredentials(cfg)).toEqual({
      consumerKey: 'test-key',
      consumerSecret: 'test-secret',
      accessToken: 'test-token',
      accessTokenSecret: 'test-token-secret',
    });
    expect(cfg.xBearerToken).toBe('test-bearer');
  });

  it('prefers the X_-prefixed names', () => {
    const cfg = loadConfig({ X_CONSUMER_KEY: 'x-key', API_KEY: 'short-key' });
    expect(cfg.xConsumerKey).toBe('x-key');
  });

  it('turns the time gate off', () => {
    expect(loadConfig({ POST_TIME_GATE: '0' }).timeGateEnabled).toBe(false);
    expect(loadConfig({ POST_TIME_GATE: 'false' }).timeGateEnabled).toBe(false);
    expect(loadConfig({ POST_TIME_GATE: 'yes' }).timeGateEnabled).toBe(true);
  });

  it('strips a trailing slash from the API base', () => {
    expect(loadConfig({ QURAN_API_BASE: 'https://quran.test/v1/' }).quranApiBase).toBe('https://quran.test/v1');
  });

  it('rejects malformed numbers', () => {
    expect(() => loadConfig({ MONTHLY_VERSE_LIMIT: 'lots' })).toThrow(ConfigError);
    expect(() => loadConfig({ MIN_POST_INTERVAL_MINUTES: '-5' })).toThrow('MIN_POST_INTERVAL_MINUTES must be a positive integer (got "-5")');
  });

  it('rejects an unknown timezone', () => {
    expect(() => loadConfig({ POST_TIMEZONE: 'Mars/Olympus_Mons' })).toThrow(ConfigError);
  });
});

describe('requireXCredentials', () => {
  it('names every missing credential', () => {
    const cfg = loadConfig({ X_CONSUMER_KEY: 'test-key', X_ACCESS_TOKEN: 'test-token' });
    expect(() => requireXCredentials(cfg)).toThrow('X credentials not configured (X_CONSUMER_SECRET, X_ACCESS_TOKEN_SECRET)');
  });
});

import { describe, it, expect } from 'vitest';
import path from 'path';
import { fileURLToPath } from 'url';
import { DEFAULTS, loadConfig, loadSources, parseSources } from '../index';
import { ConfigError } from '../../errors';

const fixtures = path.dirname(fileURLToPath(new URL('./fixtures/sources.json', import.meta.url)));
const fixture = (name: string) => path.join(fixtures, name);

const validSource = {
  id: 'alpha',
  name: 'Alpha',
  url: 'https://alpha.example.com/feed.xml',
  categories: ['CYBERSEC'],
};

describe('parseSources', () => {
  it('applies defaults for optional fields', () => {
    const [source] = parseSources({ feedSources: [validSource] });

    expect(source).toEqual({
      ...validSource,
      fetchMethod: 'rss',
      updateIntervalMin: 60,
      enabled: true,
    });
  });

  it('freezes the list and each source', () => {
    const sources = parseSources({ feedSources: [validSource] });

    expect(Object.isFrozen(sources)).toBe(true);
    expect(Object.isFrozen(sources[0])).toBe(true);
    expect(Object.isFrozen(sources[0].categories)).toBe(true);
  });

  it('rejects duplicate source ids', () => {
    expect(() => parseSources({ feedSources: [validSource, validSource] })).toThrow(
      'Invalid feed source configuration: feedSources.1.id: duplicate source id "alpha"'
    );
  });

  it('rejects a source without categories', () => {
    expect(() => parseSources({ feedSources: [{ ...validSource, categories: [] }] })).toThrow(ConfigError);
  });

  it('rejects lower-case category tags', () => {
    expect(() => parseSources({ feedSources: [{ ...validSource, categories: ['cybersec'] }] })).toThrow(
      /category must be an upper-case tag/
    );
  });

  it('rejects unsupported fetch methods', () => {
    expect(() => parseSources({ feedSources: [{ ...validSource, fetchMethod: 'scrape' }] })).toThrow(
      ConfigError
    );
  });

  it('rejects an invalid URL', () => {
    expect(() => parseSources({ feedSources: [{ ...validSource, url: 'not a url' }] })).toThrow(
      /feedSources\.0\.url/
    );
  });

  it('rejects a document without a feedSources list', () => {
    expect(() => parseSources({ sources: [] })).toThrow(ConfigError);
  });
});

describe('loadSources', () => {
  it('reads and validates a JSON file', () => {
    const sources = loadSources(fixture('sources.json'));

    expect(sources.map((s) => s.id)).toEqual(['alpha', 'beta']);
    expect(sources[0].updateIntervalMin).toBe(30);
    expect(sources[1].enabled).toBe(true);
  });

  it('reports a missing file as ConfigError', () => {
    expect(() => loadSources(fixture('missing.json'))).toThrow(ConfigError);
  });

  it('reports malformed JSON as ConfigError', () => {
    expect(() => loadSources(fixture('broken.json'))).toThrow(/is not valid JSON/);
  });
});

describe('loadConfig', () => {
  it('uses defaults when only the source path is set', () => {
    const config = loadConfig({ FEED_CONFIG_PATH: 'sources.json' }, fixtures);

    expect(config).toMatchObject({
      feedConfigPath: fixture('sources.json'),
      storeUrl: DEFAULTS.storeUrl,
      fetchTimeoutMs: 30_000,
      maxConcurrentFetches: 5,
      refreshCron: '*/5 * * * *',
      retentionDays: 30,
    });
    expect(config.sources).toHaveLength(2);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig(
      {
        FEED_CONFIG_PATH: fixture('sources.json'),
        STORE_URL: 'memory',
        FETCH_TIMEOUT_SECONDS: '10',
        MAX_CONCURRENT_FETCHES: '2',
        REFRESH_CRON: '0 * * * *',
        RETENTION_DAYS: '7',
      },
      '/'
    );

    expect(config.storeUrl).toBe('memory');
    expect(config.fetchTimeoutMs).toBe(10_000);
    expect(config.maxConcurrentFetches).toBe(2);
    expect(config.refreshCron).toBe('0 * * * *');
    expect(config.retentionDays).toBe(7);
  });

  it('rejects a non-numeric concurrency', () => {
    expect(() =>
      loadConfig({ FEED_CONFIG_PATH: fixture('sources.json'), MAX_CONCURRENT_FETCHES: 'lots' }, '/')
    ).toThrow('MAX_CONCURRENT_FETCHES must be a positive integer, got "lots"');
  });

  it('rejects a zero timeout', () => {
    expect(() =>
      loadConfig({ FEED_CONFIG_PATH: fixture('sources.json'), FETCH_TIMEOUT_SECONDS: '0' }, '/')
    ).toThrow(ConfigError);
  });

  it('rejects an invalid cron expression', () => {
    expect(() =>
      loadConfig({ FEED_CONFIG_PATH: fixture('sources.json'), REFRESH_CRON: 'every five minutes' }, '/')
    ).toThrow('REFRESH_CRON is not a valid cron expression: "every five minutes"');
  });
});

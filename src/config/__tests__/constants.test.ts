import { describe, it, expect } from 'vitest';
import { DEFAULT_RELAYS, loadConfig, parseRelayList } from '../constants.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(8000);
    expect(config.host).toBe('0.0.0.0');
    expect(config.targetCurrency).toBe('USD');
    expect(config.primaryTimeoutMs).toBe(10_000);
    expect(config.relayTimeoutMs).toBe(15_000);
    expect(config.relays).toEqual(DEFAULT_RELAYS);
    expect(config.fallbackRate).toBe(92.5);
    expect(config.history).toEqual({
      days: 30,
      band: 3,
      weekdayVolatility: 0.8,
      weekendVolatility: 0.2,
      driftFactor: 0.001
    });
    expect(config.warnings).toEqual([]);
  });

  it('reads overrides', () => {
    const config = loadConfig({
      PORT: '5000',
      TARGET_CURRENCY: 'eur',
      PRIMARY_TIMEOUT_MS: '12000',
      FALLBACK_RATE: '100.25',
      HISTORY_DAYS: '14',
      HISTORY_BAND: '2.5'
    });

    expect(config.port).toBe(5000);
    expect(config.targetCurrency).toBe('EUR');
    expect(config.primaryTimeoutMs).toBe(12_000);
    expect(config.fallbackRate).toBe(100.25);
    expect(config.history.days).toBe(14);
    expect(config.history.band).toBe(2.5);
  });

  it('keeps the default and warns on a bad number', () => {
    const config = loadConfig({ PRIMARY_TIMEOUT_MS: 'abc' });

    expect(config.primaryTimeoutMs).toBe(10_000);
    expect(config.warnings).toEqual(['PRIMARY_TIMEOUT_MS=abc is not a positive number, using 10000']);
  });

  it('keeps the default history length for a fractional or out-of-range value', () => {
    const fractional = loadConfig({ HISTORY_DAYS: '0.4' });
    const tooLong = loadConfig({ HISTORY_DAYS: '1000' });

    expect(fractional.history.days).toBe(30);
    expect(fractional.warnings).toEqual(['HISTORY_DAYS=0.4 is not an integer between 1 and 365, using 30']);
    expect(tooLong.history.days).toBe(30);
    expect(tooLong.warnings).toEqual(['HISTORY_DAYS=1000 is not an integer between 1 and 365, using 30']);
  });

  it('rejects a band narrower than one cent', () => {
    expect(() => loadConfig({ HISTORY_BAND: '0.004' })).toThrow('HISTORY_BAND must be at least 0.01, got 0.004');
  });

  it('rejects a malformed currency code', () => {
    expect(() => loadConfig({ TARGET_CURRENCY: 'dollars' })).toThrow('TARGET_CURRENCY must be a 3-letter code, got "dollars"');
  });

  it('rejects a fallback rate the jitter could push to zero', () => {
    expect(() => loadConfig({ FALLBACK_RATE: '0.1' })).toThrow('FALLBACK_RATE must exceed the 0.2 jitter, got 0.1');
  });
});

describe('parseRelayList', () => {
  it('tells prefix relays from forward proxies and skips junk', () => {
    const warnings: string[] = [];
    const relays = parseRelayList('a=https://relay.test/?u={url}, b=http://proxy.test:8080, junk, c=ftp://x.test', warnings);

    expect(relays).toEqual([
      { id: 'a', kind: 'prefix', template: 'https://relay.test/?u={url}' },
      { id: 'b', kind: 'proxy', url: 'http://proxy.test:8080' }
    ]);
    expect(warnings).toEqual([
      'Skipping malformed relay entry "junk"',
      'Skipping malformed relay entry "c=ftp://x.test"'
    ]);
  });

  it('returns no relays for an empty list', () => {
    expect(parseRelayList('')).toEqual([]);
  });
});

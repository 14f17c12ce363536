// Configuration constants
import path from 'path';
import { fileURLToPath } from 'url';
import type { Relay } from '../types/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const CBR_DAILY_URL = 'https://www.cbr.ru/scripts/XML_daily.asp';
export const QUOTE_CURRENCY = 'RUB';
export const FALLBACK_SOURCE_ID = 'fallback';
export const MAX_HISTORY_DAYS = 365;
// narrowest band that still holds the cent nearest the anchor
export const MIN_BAND = 0.01;

export const PRIMARY_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0 Safari/537.36',
  'Accept': 'application/xml,text/xml,*/*;q=0.8',
  'Accept-Language': 'ru-RU,ru;q=0.9,en;q=0.8',
  'Cache-Control': 'no-cache'
};

export const JSON_HEADERS: Record<string, string> = {
  'User-Agent': PRIMARY_HEADERS['User-Agent'],
  'Accept': 'application/json'
};

export const DEFAULT_RELAYS: Relay[] = [
  { id: 'allorigins', kind: 'prefix', template: 'https://api.allorigins.win/raw?url={url}' },
  { id: 'corsproxy', kind: 'prefix', template: 'https://corsproxy.io/?url={url}' }
];

export type DateFormat = 'iso' | 'unix-seconds';

/**
 * How to read the rate out of one provider's JSON body. Path segments may
 * contain `{CODE}`, replaced by the target currency when strategies are built.
 */
export interface JsonExtractionRule {
  ratePath: string[];
  nominalPath?: string[];
  previousPath?: string[];
  datePath?: string[];
  dateFormat?: DateFormat;
}

export interface AlternateSource {
  id: string;
  url: string;
  rule: JsonExtractionRule;
}

export const ALTERNATE_SOURCES: AlternateSource[] = [
  {
    id: 'cbr-xml-daily',
    url: 'https://www.cbr-xml-daily.ru/daily_json.js',
    rule: {
      ratePath: ['Valute', '{CODE}', 'Value'],
      nominalPath: ['Valute', '{CODE}', 'Nominal'],
      previousPath: ['Valute', '{CODE}', 'Previous'],
      datePath: ['Date'],
      dateFormat: 'iso'
    }
  },
  {
    id: 'er-api',
    url: 'https://open.er-api.com/v6/latest/{CODE}',
    rule: {
      ratePath: ['rates', QUOTE_CURRENCY],
      datePath: ['time_last_update_unix'],
      dateFormat: 'unix-seconds'
    }
  },
  {
    id: 'exchangerate-api',
    url: 'https://api.exchangerate-api.com/v4/latest/{CODE}',
    rule: {
      ratePath: ['rates', QUOTE_CURRENCY],
      datePath: ['date'],
      dateFormat: 'iso'
    }
  }
];

export interface HistoryConfig {
  days: number;
  band: number;
  weekdayVolatility: number;
  weekendVolatility: number;
  driftFactor: number;
}

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  publicDir: string;
  targetCurrency: string;
  cbrDailyUrl: string;
  primaryTimeoutMs: number;
  relayTimeoutMs: number;
  alternateTimeoutMs: number;
  relays: Relay[];
  alternates: AlternateSource[];
  fallbackRate: number;
  fallbackJitter: number;
  changeRange: number;
  history: HistoryConfig;
  warnings: string[];
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number, warnings: string[]): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    warnings.push(`${key}=${raw} is not a positive number, using ${fallback}`);
    return fallback;
  }
  return value;
}

function readDays(env: Env, key: string, fallback: number, warnings: string[]): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1 || value > MAX_HISTORY_DAYS) {
    warnings.push(`${key}=${raw} is not an integer between 1 and ${MAX_HISTORY_DAYS}, using ${fallback}`);
    return fallback;
  }
  return value;
}

/**
 * Parses RELAY_URLS: comma-separated `id=url` entries. A url holding `{url}`
 * is a prefix relay, anything else an HTTP(S) forward proxy.
 */
export function parseRelayList(raw: string, warnings: string[] = []): Relay[] {
  const relays: Relay[] = [];
  for (const entry of raw.split(',').map(e => e.trim()).filter(Boolean)) {
    const separator = entry.indexOf('=');
    const id = separator > 0 ? entry.slice(0, separator).trim() : '';
    const url = separator > 0 ? entry.slice(separator + 1).trim() : '';

    if (!id || !/^https?:\/\//i.test(url)) {
      warnings.push(`Skipping malformed relay entry "${entry}"`);
      continue;
    }
    relays.push(url.includes('{url}') ? { id, kind: 'prefix', template: url } : { id, kind: 'proxy', url });
  }
  return relays;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const warnings: string[] = [];

  const targetCurrency = (env.TARGET_CURRENCY || 'USD').trim().toUpperCase();
  if (!/^[A-Z]{3}$/.test(targetCurrency)) {
    throw new Error(`TARGET_CURRENCY must be a 3-letter code, got "${env.TARGET_CURRENCY}"`);
  }

  const relays = env.RELAY_URLS === undefined ? DEFAULT_RELAYS : parseRelayList(env.RELAY_URLS, warnings);

  const fallbackJitter = 0.2;
  const fallbackRate = readNumber(env, 'FALLBACK_RATE', 92.5, warnings);
  if (fallbackRate <= fallbackJitter) {
    throw new Error(`FALLBACK_RATE must exceed the ${fallbackJitter} jitter, got ${fallbackRate}`);
  }

  const band = readNumber(env, 'HISTORY_BAND', 3.0, warnings);
  if (band < MIN_BAND) {
    throw new Error(`HISTORY_BAND must be at least ${MIN_BAND}, got ${band}`);
  }

  return {
    port: parseInt(env.PORT || '8000', 10),
    host: env.HOST || '0.0.0.0',
    logLevel: env.LOG_LEVEL || 'info',
    publicDir: env.PUBLIC_DIR || path.join(__dirname, '../../public'),
    targetCurrency,
    cbrDailyUrl: env.CBR_DAILY_URL || CBR_DAILY_URL,
    primaryTimeoutMs: readNumber(env, 'PRIMARY_TIMEOUT_MS', 10_000, warnings),
    relayTimeoutMs: readNumber(env, 'RELAY_TIMEOUT_MS', 15_000, warnings),
    alternateTimeoutMs: readNumber(env, 'ALTERNATE_TIMEOUT_MS', 10_000, warnings),
    relays,
    alternates: ALTERNATE_SOURCES,
    fallbackRate,
    fallbackJitter,
    changeRange: 0.3,
    history: {
      days: readDays(env, 'HISTORY_DAYS', 30, warnings),
      band,
      weekdayVolatility: readNumber(env, 'HISTORY_WEEKDAY_VOLATILITY', 0.8, warnings),
      weekendVolatility: readNumber(env, 'HISTORY_WEEKEND_VOLATILITY', 0.2, warnings),
      driftFactor: readNumber(env, 'HISTORY_DRIFT_FACTOR', 0.001, warnings)
    },
    warnings
  };
}

// Type definitions
import type { FastifyBaseLogger } from 'fastify';

export type Logger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export interface RateQuote {
  currency: string;
  rate: number;
  rawRate: number;
  change: number;
  changePercent: number;
  changeObserved: boolean;
  asOfDate: string;
  source: string;
  isRealData: boolean;
  nominal: number;
}

/**
 * One record pulled out of a source payload, before it becomes a quote.
 * `rate` and `previousRate` are per single unit (already divided by nominal).
 */
export interface RateReading {
  rate: number;
  previousRate?: number;
  asOfDate?: string;
  nominal: number;
}

export interface HistoryPoint {
  date: string;
  displayDate: string;
  price: number;
}

export interface DashboardStats {
  current: number;
  min: number;
  minDate: string;
  max: number;
  maxDate: string;
  average: number;
  change30d: number;
  change30dPercent: number;
  firstDate: string;
  lastDate: string;
}

export interface Dashboard {
  quote: RateQuote;
  history: HistoryPoint[];
  stats: DashboardStats;
  generatedAt: string;
}

export type StrategyTier = 'primary' | 'relay' | 'alternate';

export type AttemptOutcome = 'success' | 'transport' | 'parse' | 'field-not-found';

export interface AttemptEvent {
  strategyId: string;
  tier: StrategyTier | 'fallback';
  outcome: AttemptOutcome;
  latencyMs: number;
  message?: string;
}

export type Relay =
  | { id: string; kind: 'proxy'; url: string }
  | { id: string; kind: 'prefix'; template: string };

export interface HttpRequestOptions {
  headers: Record<string, string>;
  timeoutMs: number;
  relay?: Relay;
}

export interface HttpResponse {
  status: number;
  body: string;
}

export interface HttpTransport {
  get(url: string, options: HttpRequestOptions): Promise<HttpResponse>;
}

export interface Clock {
  now(): Date;
}

export interface RandomSource {
  uniform(low: number, high: number): number;
}

export interface HistoryQuerystring {
  days?: string;
}

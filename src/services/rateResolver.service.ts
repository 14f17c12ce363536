import { err, type Result } from 'neverthrow';
import { FALLBACK_SOURCE_ID, QUOTE_CURRENCY } from '../config/constants.js';
import { AcquisitionError, TransportError, describeError } from '../errors.js';
import type { AttemptEvent, Clock, Logger, RandomSource, RateQuote, RateReading } from '../types/index.js';
import { toIsoDate } from '../utils/date.utils.js';
import { roundTo2 } from '../utils/number.utils.js';
import type { RateStrategy } from './strategies.js';

export interface RateResolverOptions {
  targetCurrency: string;
  fallbackRate: number;
  fallbackJitter: number;
  changeRange: number;
  random: RandomSource;
  clock: Clock;
  onAttempt?: (event: AttemptEvent) => void;
}

/**
 * Walks the strategy chain in order and returns the first usable quote.
 * Never rejects: an exhausted chain yields the fallback quote.
 */
class RateResolverService {
  private logger: Logger;
  private strategies: RateStrategy[];
  private options: RateResolverOptions;

  constructor(logger: Logger, strategies: RateStrategy[], options: RateResolverOptions) {
    this.logger = logger;
    this.strategies = strategies;
    this.options = options;
  }

  getStrategyIds(): string[] {
    return this.strategies.map(s => s.id);
  }

  async resolve(): Promise<RateQuote> {
    const declined: string[] = [];

    for (const strategy of this.strategies) {
      const started = Date.now();
      let result: Result<RateReading, AcquisitionError>;

      try {
        result = await strategy.run();
      } catch (error) {
        result = err(new TransportError(describeError(error), { cause: error }));
      }

      const latencyMs = Date.now() - started;

      if (result.isOk()) {
        this.record({ strategyId: strategy.id, tier: strategy.tier, outcome: 'success', latencyMs });
        return this.toQuote(strategy.id, result.value);
      }

      this.record({
        strategyId: strategy.id,
        tier: strategy.tier,
        outcome: result.error.kind,
        latencyMs,
        message: result.error.message
      });
      declined.push(strategy.id);
    }

    this.logger.warn(
      { declined },
      `All ${declined.length} rate sources declined, serving fallback quote`
    );
    return this.fallback();
  }

  private record(event: AttemptEvent): void {
    if (event.outcome === 'success') {
      this.logger.info(event, `Rate source ${event.strategyId} answered in ${event.latencyMs}ms`);
    } else {
      this.logger.warn(event, `Rate source ${event.strategyId} declined (${event.outcome})`);
    }
    this.options.onAttempt?.(event);
  }

  private sampleChange(): number {
    const { changeRange, random } = this.options;
    return random.uniform(-changeRange, changeRange);
  }

  private toQuote(source: string, reading: RateReading): RateQuote {
    const rawRate = reading.rate;
    const previous = reading.previousRate;
    const observed = previous !== undefined && previous > 0;

    let change: number;
    let changePercent: number;
    if (observed) {
      change = rawRate - previous;
      changePercent = (change / previous) * 100;
    } else {
      change = this.sampleChange();
      changePercent = (change / rawRate) * 100;
    }

    return {
      currency: `${this.options.targetCurrency}/${QUOTE_CURRENCY}`,
      rate: roundTo2(rawRate),
      rawRate,
      change: roundTo2(change),
      changePercent: roundTo2(changePercent),
      changeObserved: observed,
      asOfDate: reading.asOfDate ?? toIsoDate(this.options.clock.now()),
      source,
      isRealData: true,
      nominal: reading.nominal
    };
  }

  private fallback(): RateQuote {
    const { fallbackRate, fallbackJitter, random, clock } = this.options;
    const rawRate = fallbackRate + random.uniform(-fallbackJitter, fallbackJitter);
    const change = this.sampleChange();

    this.record({ strategyId: FALLBACK_SOURCE_ID, tier: 'fallback', outcome: 'success', latencyMs: 0 });

    return {
      currency: `${this.options.targetCurrency}/${QUOTE_CURRENCY}`,
      rate: roundTo2(rawRate),
      rawRate,
      change: roundTo2(change),
      changePercent: roundTo2((change / rawRate) * 100),
      changeObserved: false,
      asOfDate: toIsoDate(clock.now()),
      source: FALLBACK_SOURCE_ID,
      isRealData: false,
      nominal: 1
    };
  }
}

export default RateResolverService;

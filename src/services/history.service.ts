import { MIN_BAND, type HistoryConfig } from '../config/constants.js';
import type { Clock, HistoryPoint, RandomSource } from '../types/index.js';
import { addDays, isWeekend, toDisplayDate, toIsoDate } from '../utils/date.utils.js';
import { roundTo2 } from '../utils/number.utils.js';

export type HistoryParameters = Omit<HistoryConfig, 'days'>;

/**
 * Rounds to cents without leaving the band. Works in whole cents and steps
 * toward the anchor while the stored price would sit past the edge.
 */
function roundWithinBand(value: number, anchor: number, band: number): number {
  let cents = Math.round((value + Number.EPSILON) * 100);
  const toward = value > anchor ? -1 : 1;
  while (Math.abs(cents / 100 - anchor) > band) {
    cents += toward;
  }
  return cents / 100;
}

/**
 * Fabricates a trailing price series around one anchor rate. This is a
 * chart aid, not a model: a bounded random walk whose first and last points
 * are pinned to the anchor.
 */
class HistoryService {
  private params: HistoryParameters;
  private random: RandomSource;
  private clock: Clock;

  constructor(params: HistoryParameters, random: RandomSource, clock: Clock) {
    if (!(params.band >= MIN_BAND)) {
      throw new RangeError(`band must be at least ${MIN_BAND}, got ${params.band}`);
    }
    this.params = params;
    this.random = random;
    this.clock = clock;
  }

  synthesize(anchorRate: number, days: number): HistoryPoint[] {
    if (!Number.isInteger(days) || days < 1) {
      throw new RangeError(`days must be a positive integer, got ${days}`);
    }
    if (!Number.isFinite(anchorRate) || anchorRate <= 0) {
      throw new RangeError(`anchorRate must be a positive number, got ${anchorRate}`);
    }

    const { band, weekdayVolatility, weekendVolatility, driftFactor } = this.params;
    const pinned = roundTo2(anchorRate);
    const drift = anchorRate * driftFactor;
    const today = this.clock.now();
    const points: HistoryPoint[] = [];

    for (let i = 0; i < days; i++) {
      const date = addDays(today, i - (days - 1));
      let price: number;

      if (i === 0 || i === days - 1) {
        price = pinned;
      } else {
        const spread = isWeekend(date) ? weekendVolatility : weekdayVolatility;
        let next = points[i - 1].price + this.random.uniform(-spread, spread) + drift;

        if (Math.abs(next - anchorRate) > band) {
          next = anchorRate + (next > anchorRate ? band : -band);
        }
        price = roundWithinBand(next, anchorRate, band);
      }

      points.push({
        date: toIsoDate(date),
        displayDate: toDisplayDate(date),
        price
      });
    }

    return points;
  }
}

export default HistoryService;

import { describe, it, expect } from 'vitest';
import type { RandomSource } from '../../types/index.js';
import { createSeededRandom, fixedClock } from '../../utils/random.utils.js';
import HistoryService, { type HistoryParameters } from '../history.service.js';

const params: HistoryParameters = {
  band: 3.0,
  weekdayVolatility: 0.8,
  weekendVolatility: 0.2,
  driftFactor: 0.001
};

// Monday
const clock = fixedClock('2026-10-19T08:00:00Z');

const highRandom: RandomSource = { uniform: (_low, high) => high };
const lowRandom: RandomSource = { uniform: low => low };

describe('HistoryService', () => {
  it('returns the requested number of ascending points ending today', () => {
    const history = new HistoryService(params, createSeededRandom(1), clock).synthesize(92.5, 30);

    expect(history).toHaveLength(30);
    expect(history[0].date).toBe('2026-09-20');
    expect(history[29].date).toBe('2026-10-19');
    expect(history[29].displayDate).toBe('19.10');
    for (let i = 1; i < history.length; i++) {
      expect(history[i].date > history[i - 1].date).toBe(true);
    }
  });

  it('pins the first and last points to the rounded anchor', () => {
    const history = new HistoryService(params, createSeededRandom(3), clock).synthesize(92.5031, 30);

    expect(history[0].price).toBe(92.5);
    expect(history[29].price).toBe(92.5);
  });

  it('keeps every point within the band', () => {
    for (let seed = 1; seed <= 25; seed++) {
      const anchor = 92.5;
      const history = new HistoryService(params, createSeededRandom(seed), clock).synthesize(anchor, 30);
      for (const point of history) {
        expect(Math.abs(point.price - anchor)).toBeLessThanOrEqual(params.band);
      }
    }
  });

  it('is reproducible for a fixed seed', () => {
    const first = new HistoryService(params, createSeededRandom(2024), clock).synthesize(92.5, 30);
    const second = new HistoryService(params, createSeededRandom(2024), clock).synthesize(92.5, 30);

    expect(second).toEqual(first);
  });

  it('varies the interior between seeds but not the pinned ends', () => {
    const a = new HistoryService(params, createSeededRandom(11), clock).synthesize(92.5, 30);
    const b = new HistoryService(params, createSeededRandom(12), clock).synthesize(92.5, 30);

    expect(a.slice(1, -1).map(p => p.price)).not.toEqual(b.slice(1, -1).map(p => p.price));
    expect(a[0]).toEqual(b[0]);
    expect(a[29]).toEqual(b[29]);
  });

  it('uses the narrower spread on weekends', () => {
    const spreads: number[] = [];
    const recording: RandomSource = {
      uniform: (_low, high) => {
        spreads.push(high);
        return 0;
      }
    };

    // Mon 12.10 .. Mon 19.10: interior is Tue..Sun
    new HistoryService(params, recording, clock).synthesize(92.5, 8);

    expect(spreads).toEqual([0.8, 0.8, 0.8, 0.8, 0.2, 0.2]);
  });

  it('snaps a runaway walk to the edge of the band', () => {
    const history = new HistoryService(params, highRandom, clock).synthesize(92.5, 10);

    expect(history.map(p => p.price)).toEqual([92.5, 92.79, 93.68, 94.57, 95.46, 95.5, 95.5, 95.5, 95.5, 92.5]);
  });

  it('rounds toward the anchor when cents would cross the band', () => {
    const history = new HistoryService(params, highRandom, clock).synthesize(92.506, 10);

    expect(history[0].price).toBe(92.51);
    expect(Math.max(...history.map(p => p.price))).toBe(95.5);
  });

  it('steps back inside the band when the edge cent is not exact in binary', () => {
    const service = new HistoryService(params, highRandom, clock);

    expect(service.synthesize(61.12, 10).map(p => p.price)).toEqual([
      61.12, 61.38, 62.24, 63.1, 63.96, 64.11, 64.11, 64.11, 64.11, 61.12
    ]);
    expect(new HistoryService(params, lowRandom, clock).synthesize(61.12, 10).map(p => p.price)).toEqual([
      61.12, 60.98, 60.24, 59.5, 58.76, 58.12, 58.12, 58.12, 58.12, 61.12
    ]);
  });

  it('keeps a walk pushed to either edge within the band for any cent anchor', () => {
    for (const random of [highRandom, lowRandom]) {
      const service = new HistoryService(params, random, clock);
      for (let cents = 6000; cents <= 11000; cents++) {
        const anchor = cents / 100;
        for (const point of service.synthesize(anchor, 10)) {
          expect(Math.abs(point.price - anchor)).toBeLessThanOrEqual(params.band);
        }
      }
    }
  });

  it('returns a single pinned point for one day', () => {
    const history = new HistoryService(params, highRandom, clock).synthesize(78.234, 1);

    expect(history).toEqual([{ date: '2026-10-19', displayDate: '19.10', price: 78.23 }]);
  });

  it('rejects invalid arguments', () => {
    const service = new HistoryService(params, highRandom, clock);

    expect(() => service.synthesize(92.5, 0)).toThrow(RangeError);
    expect(() => service.synthesize(92.5, 2.5)).toThrow(RangeError);
    expect(() => service.synthesize(0, 30)).toThrow(RangeError);
  });

  it('refuses a band narrower than one cent', () => {
    expect(() => new HistoryService({ ...params, band: 0.004 }, highRandom, clock)).toThrow(
      'band must be at least 0.01, got 0.004'
    );
  });
});

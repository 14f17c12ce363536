import type { Dashboard, DashboardStats, HistoryPoint, RateQuote } from '../types/index.js';
import { roundTo2 } from '../utils/number.utils.js';

export function computeStats(quote: RateQuote, history: HistoryPoint[]): DashboardStats {
  if (history.length === 0) {
    throw new RangeError('Cannot compute statistics over an empty history');
  }

  // earliest occurrence wins on ties
  let minPoint = history[0];
  let maxPoint = history[0];
  let sum = 0;
  for (const point of history) {
    if (point.price < minPoint.price) minPoint = point;
    if (point.price > maxPoint.price) maxPoint = point;
    sum += point.price;
  }

  const first = history[0];
  const last = history[history.length - 1];
  const change30d = roundTo2(last.price - first.price);

  return {
    current: quote.rate,
    min: minPoint.price,
    minDate: minPoint.displayDate,
    max: maxPoint.price,
    maxDate: maxPoint.displayDate,
    average: roundTo2(sum / history.length),
    change30d,
    change30dPercent: roundTo2((change30d / first.price) * 100),
    firstDate: first.displayDate,
    lastDate: last.displayDate
  };
}

export function buildDashboard(quote: RateQuote, history: HistoryPoint[], generatedAt: Date): Dashboard {
  return {
    quote,
    history,
    stats: computeStats(quote, history),
    generatedAt: generatedAt.toISOString()
  };
}

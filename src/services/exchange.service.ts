import type { Clock, Dashboard, HistoryPoint, Logger, RateQuote } from '../types/index.js';
import { buildDashboard } from './dashboard.service.js';
import HistoryService from './history.service.js';
import RateResolverService from './rateResolver.service.js';

export interface QuoteHistory {
  quote: RateQuote;
  history: HistoryPoint[];
}

/**
 * Per-request composition: resolve the quote, then fabricate its history.
 * Nothing is kept between calls.
 */
class ExchangeService {
  private logger: Logger;
  private resolver: RateResolverService;
  private historyService: HistoryService;
  private clock: Clock;
  private defaultDays: number;

  constructor(
    logger: Logger,
    resolver: RateResolverService,
    historyService: HistoryService,
    clock: Clock,
    defaultDays: number
  ) {
    this.logger = logger;
    this.resolver = resolver;
    this.historyService = historyService;
    this.clock = clock;
    this.defaultDays = defaultDays;
  }

  getDefaultDays(): number {
    return this.defaultDays;
  }

  async getCurrentQuote(): Promise<RateQuote> {
    return this.resolver.resolve();
  }

  async getQuoteWithHistory(days: number = this.defaultDays): Promise<QuoteHistory> {
    const quote = await this.resolver.resolve();
    const history = this.historyService.synthesize(quote.rawRate, days);
    this.logger.info(`Synthesized ${history.length} history points around ${quote.rate} (${quote.source})`);
    return { quote, history };
  }

  async getDashboard(days: number = this.defaultDays): Promise<Dashboard> {
    const { quote, history } = await this.getQuoteWithHistory(days);
    return buildDashboard(quote, history, this.clock.now());
  }
}

export default ExchangeService;

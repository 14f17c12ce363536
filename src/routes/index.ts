import type { FastifyInstance } from 'fastify';
import type { HistoryQuerystring } from '../types/index.js';
import { MAX_HISTORY_DAYS } from '../config/constants.js';
import { openApiSpec } from '../config/openapi.js';
import ExchangeService from '../services/exchange.service.js';
import RateResolverService from '../services/rateResolver.service.js';

export const DEGRADED_NOTICE =
  'Данные ЦБ РФ временно недоступны: показан резервный курс, а не реальные данные.';

/**
 * Parses the `days` query value. Returns undefined when it is not an
 * integer in 1..MAX_HISTORY_DAYS.
 */
export function parseDays(raw: string | undefined, fallback: number): number | undefined {
  if (raw === undefined || raw.trim() === '') return fallback;
  if (!/^\d+$/.test(raw.trim())) return undefined;
  const days = parseInt(raw, 10);
  return days >= 1 && days <= MAX_HISTORY_DAYS ? days : undefined;
}

export interface RouteOptions {
  serveStatic: boolean;
}

export function setupRoutes(
  fastify: FastifyInstance,
  exchangeService: ExchangeService,
  rateResolver: RateResolverService,
  options: RouteOptions
) {
  const startedAt = Date.now();

  // Plain liveness probe
  fastify.get('/health', async (request, reply) => {
    reply.type('text/plain');
    return 'OK';
  });

  // API info endpoint
  fastify.get('/api', async () => ({
    service: 'USD/RUB Rate Dashboard API',
    version: '1.0.0',
    endpoints: {
      health: 'GET /api/health',
      current: 'GET /api/current',
      history: 'GET /api/history?days=30',
      dashboard: 'GET /api/dashboard?days=30',
      openapi: 'GET /api/openapi.json'
    }
  }));

  fastify.get('/api/openapi.json', async () => openApiSpec);

  fastify.get('/api/health', async () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
    uptimeSeconds: Math.round((Date.now() - startedAt) / 1000),
    strategies: rateResolver.getStrategyIds()
  }));

  // Flat record of the current quote
  fastify.get('/api/current', async () => {
    const quote = await exchangeService.getCurrentQuote();
    return {
      currency: quote.currency,
      rate: quote.rate,
      change: quote.change,
      changePercent: quote.changePercent,
      asOfDate: quote.asOfDate,
      timestamp: new Date().toISOString(),
      source: quote.source,
      isRealData: quote.isRealData
    };
  });

  fastify.get<{ Querystring: HistoryQuerystring }>('/api/history', async (request, reply) => {
    const days = parseDays(request.query.days, exchangeService.getDefaultDays());
    if (days === undefined) {
      return reply.code(400).send({ status: 'error', message: `days must be an integer between 1 and ${MAX_HISTORY_DAYS}` });
    }

    const { quote, history } = await exchangeService.getQuoteWithHistory(days);
    return {
      status: 'success',
      days,
      anchor: quote.rate,
      source: quote.source,
      isRealData: quote.isRealData,
      data: history
    };
  });

  fastify.get<{ Querystring: HistoryQuerystring }>('/api/dashboard', async (request, reply) => {
    const days = parseDays(request.query.days, exchangeService.getDefaultDays());
    if (days === undefined) {
      return reply.code(400).send({ status: 'error', message: `days must be an integer between 1 and ${MAX_HISTORY_DAYS}` });
    }

    const dashboard = await exchangeService.getDashboard(days);
    const degraded = !dashboard.quote.isRealData;
    return {
      ...dashboard,
      degraded,
      ...(degraded ? { notice: DEGRADED_NOTICE } : {})
    };
  });

  // Anything a handler did not expect
  fastify.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode && error.statusCode < 500 ? error.statusCode : 500;
    fastify.log.error({ err: error }, `Error in ${request.method} ${request.url}`);
    return reply.code(statusCode).send({ status: 'error', message: error.message || 'Internal error' });
  });

  // 404 handler
  fastify.setNotFoundHandler((request, reply) => {
    if (options.serveStatic && request.method === 'GET' && request.headers.accept?.includes('text/html')) {
      return reply.sendFile('index.html');
    }
    return reply.code(404).send({ status: 'error', message: 'Not found' });
  });
}

import { existsSync } from 'fs';
import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import fastifyStatic from '@fastify/static';
import type { AppConfig } from './config/constants.js';
import { setupRoutes } from './routes/index.js';
import ExchangeService from './services/exchange.service.js';
import HistoryService from './services/history.service.js';
import HttpService from './services/http.service.js';
import RateResolverService from './services/rateResolver.service.js';
import { buildStrategies } from './services/strategies.js';
import type { AttemptEvent, Clock, HttpTransport, RandomSource } from './types/index.js';
import { mathRandom, systemClock } from './utils/random.utils.js';

export interface BuildAppOptions {
  config: AppConfig;
  logger?: boolean | { level: string };
  transport?: HttpTransport;
  random?: RandomSource;
  clock?: Clock;
  onAttempt?: (event: AttemptEvent) => void;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { config } = options;
  const random = options.random ?? mathRandom;
  const clock = options.clock ?? systemClock;

  const fastify = Fastify({
    logger: options.logger ?? { level: config.logLevel }
  });

  for (const warning of config.warnings) {
    fastify.log.warn(warning);
  }

  await fastify.register(cors, {
    origin: true,
    methods: ['GET', 'OPTIONS']
  });

  // Static page (only if public directory exists)
  const serveStatic = existsSync(config.publicDir);
  if (serveStatic) {
    await fastify.register(fastifyStatic, {
      root: config.publicDir,
      prefix: '/',
      index: ['index.html']
    });
    fastify.log.info(`Serving static files from: ${config.publicDir}`);
  } else {
    fastify.log.info('No static files directory - API only mode');
  }

  // Initialize services
  const transport = options.transport ?? new HttpService(fastify.log);
  const strategies = buildStrategies(config, transport);
  const rateResolver = new RateResolverService(fastify.log, strategies, {
    targetCurrency: config.targetCurrency,
    fallbackRate: config.fallbackRate,
    fallbackJitter: config.fallbackJitter,
    changeRange: config.changeRange,
    random,
    clock,
    onAttempt: options.onAttempt
  });
  const historyService = new HistoryService(config.history, random, clock);
  const exchangeService = new ExchangeService(fastify.log, rateResolver, historyService, clock, config.history.days);

  setupRoutes(fastify, exchangeService, rateResolver, { serveStatic });

  return fastify;
}

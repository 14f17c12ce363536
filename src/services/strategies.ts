import { err, ok, type Result } from 'neverthrow';
import {
  JSON_HEADERS,
  PRIMARY_HEADERS,
  type AlternateSource,
  type AppConfig,
  type JsonExtractionRule
} from '../config/constants.js';
import { AcquisitionError, TransportError, describeError } from '../errors.js';
import type { HttpRequestOptions, HttpTransport, RateReading, Relay, StrategyTier } from '../types/index.js';
import { extractJsonRate, parseCbrXml } from './parsers.js';

export interface RateStrategy {
  id: string;
  tier: StrategyTier;
  run(): Promise<Result<RateReading, AcquisitionError>>;
}

export type StrategyConfig = Pick<
  AppConfig,
  'targetCurrency' | 'cbrDailyUrl' | 'primaryTimeoutMs' | 'relayTimeoutMs' | 'alternateTimeoutMs' | 'relays' | 'alternates'
>;

async function fetchBody(
  transport: HttpTransport,
  url: string,
  options: HttpRequestOptions
): Promise<Result<string, TransportError>> {
  try {
    const response = await transport.get(url, options);
    if (response.status !== 200) {
      return err(new TransportError(`HTTP ${response.status} from ${url}`));
    }
    return ok(response.body);
  } catch (error) {
    return err(error instanceof TransportError ? error : new TransportError(describeError(error), { cause: error }));
  }
}

function withCode(value: string, code: string): string {
  return value.split('{CODE}').join(code);
}

function bindRule(rule: JsonExtractionRule, code: string): JsonExtractionRule {
  const bind = (path?: string[]) => path?.map(segment => withCode(segment, code));
  return {
    ratePath: rule.ratePath.map(segment => withCode(segment, code)),
    nominalPath: bind(rule.nominalPath),
    previousPath: bind(rule.previousPath),
    datePath: bind(rule.datePath),
    dateFormat: rule.dateFormat
  };
}

function cbrStrategy(config: StrategyConfig, transport: HttpTransport, relay?: Relay): RateStrategy {
  const options: HttpRequestOptions = relay
    ? { headers: PRIMARY_HEADERS, timeoutMs: config.relayTimeoutMs, relay }
    : { headers: PRIMARY_HEADERS, timeoutMs: config.primaryTimeoutMs };

  return {
    id: relay ? `relay:${relay.id}` : 'cbr-direct',
    tier: relay ? 'relay' : 'primary',
    run: async () => {
      const body = await fetchBody(transport, config.cbrDailyUrl, options);
      return body.andThen(xml => parseCbrXml(xml, config.targetCurrency));
    }
  };
}

function alternateStrategy(source: AlternateSource, config: StrategyConfig, transport: HttpTransport): RateStrategy {
  const url = withCode(source.url, config.targetCurrency);
  const rule = bindRule(source.rule, config.targetCurrency);

  return {
    id: source.id,
    tier: 'alternate',
    run: async () => {
      const body = await fetchBody(transport, url, { headers: JSON_HEADERS, timeoutMs: config.alternateTimeoutMs });
      return body.andThen(text => extractJsonRate(text, rule));
    }
  };
}

/**
 * The acquisition chain in priority order: CBR direct, CBR through each
 * relay, then every alternate provider.
 */
export function buildStrategies(config: StrategyConfig, transport: HttpTransport): RateStrategy[] {
  return [
    cbrStrategy(config, transport),
    ...config.relays.map(relay => cbrStrategy(config, transport, relay)),
    ...config.alternates.map(source => alternateStrategy(source, config, transport))
  ];
}

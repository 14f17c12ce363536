import { err, ok, type Result } from 'neverthrow';
import type { DateFormat, JsonExtractionRule } from '../config/constants.js';
import { FieldNotFoundError, ParseError } from '../errors.js';
import type { RateReading } from '../types/index.js';
import { fromUnixSeconds, parseCbrDate } from '../utils/date.utils.js';
import { parseLocaleNumber } from '../utils/number.utils.js';

export type ExtractionError = ParseError | FieldNotFoundError;

function readTag(block: string, tag: string): string | undefined {
  const match = new RegExp(`<${tag}>\\s*([^<]*?)\\s*</${tag}>`).exec(block);
  return match?.[1];
}

/**
 * Reads one currency out of the CBR daily feed:
 *
 *   <ValCurs Date="18.10.2026" name="Foreign Currency Market">
 *     <Valute ID="R01235">
 *       <CharCode>USD</CharCode><Nominal>1</Nominal><Value>92,5000</Value>
 *     </Valute>
 *   </ValCurs>
 *
 * `Previous` is optional; `VunitRate` stands in when `Value` is absent.
 */
export function parseCbrXml(xml: string, code: string): Result<RateReading, ExtractionError> {
  const root = /<ValCurs\b([^>]*)>/.exec(xml);
  if (!root) {
    return err(new ParseError('CBR payload has no <ValCurs> root'));
  }

  const dateAttr = /\bDate="([^"]*)"/.exec(root[1]);
  const asOfDate = dateAttr ? parseCbrDate(dateAttr[1]) : undefined;

  const valuteRe = /<Valute\b[^>]*>([\s\S]*?)<\/Valute>/g;
  let match: RegExpExecArray | null;
  while ((match = valuteRe.exec(xml))) {
    const block = match[1];
    if (readTag(block, 'CharCode') !== code) continue;

    const rawValue = readTag(block, 'Value');
    if (rawValue === undefined) {
      const rawUnitRate = readTag(block, 'VunitRate');
      const unitRate = rawUnitRate !== undefined ? parseLocaleNumber(rawUnitRate) : NaN;
      if (!(unitRate > 0)) {
        return err(new ParseError(`Record for ${code} has neither Value nor VunitRate`));
      }
      return ok({ rate: unitRate, nominal: 1, asOfDate });
    }

    const rawNominal = readTag(block, 'Nominal') ?? '1';
    const nominal = parseLocaleNumber(rawNominal);
    if (!Number.isInteger(nominal) || nominal <= 0) {
      return err(new ParseError(`Invalid nominal "${rawNominal}" for ${code}`));
    }

    const value = parseLocaleNumber(rawValue);
    if (!(value > 0)) {
      return err(new ParseError(`Invalid value "${rawValue}" for ${code}`));
    }

    const reading: RateReading = { rate: value / nominal, nominal, asOfDate };

    const rawPrevious = readTag(block, 'Previous');
    if (rawPrevious !== undefined) {
      const previous = parseLocaleNumber(rawPrevious);
      if (Number.isFinite(previous) && previous > 0) {
        reading.previousRate = previous / nominal;
      }
    }
    return ok(reading);
  }

  return err(new FieldNotFoundError(`Currency ${code} not found in CBR payload`));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readPath(data: unknown, path: string[]): unknown {
  let current: unknown = data;
  for (const key of path) {
    if (!isRecord(current) || !(key in current)) return undefined;
    current = current[key];
  }
  return current;
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') return parseLocaleNumber(value);
  return NaN;
}

function toDate(value: unknown, format: DateFormat = 'iso'): string | undefined {
  if (format === 'unix-seconds') {
    return typeof value === 'number' ? fromUnixSeconds(value) : undefined;
  }
  if (typeof value !== 'string') return undefined;
  const match = /^(\d{4}-\d{2}-\d{2})/.exec(value);
  return match?.[1];
}

/**
 * Applies one provider's extraction rule to its JSON body.
 */
export function extractJsonRate(body: string, rule: JsonExtractionRule): Result<RateReading, ExtractionError> {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    return err(new ParseError('Response is not valid JSON', { cause: error }));
  }
  if (!isRecord(data)) {
    return err(new ParseError('Response is not a JSON object'));
  }

  const rawRate = readPath(data, rule.ratePath);
  if (rawRate === undefined || rawRate === null) {
    return err(new FieldNotFoundError(`No value at ${rule.ratePath.join('.')}`));
  }

  const value = toNumber(rawRate);
  if (!Number.isFinite(value) || value <= 0) {
    return err(new ParseError(`Invalid value at ${rule.ratePath.join('.')}: ${JSON.stringify(rawRate)}`));
  }

  let nominal = 1;
  if (rule.nominalPath) {
    const rawNominal = readPath(data, rule.nominalPath);
    if (rawNominal !== undefined) {
      nominal = toNumber(rawNominal);
      if (!Number.isFinite(nominal) || nominal <= 0) {
        return err(new ParseError(`Invalid nominal at ${rule.nominalPath.join('.')}`));
      }
    }
  }

  const reading: RateReading = { rate: value / nominal, nominal };

  if (rule.previousPath) {
    const previous = toNumber(readPath(data, rule.previousPath));
    if (Number.isFinite(previous) && previous > 0) {
      reading.previousRate = previous / nominal;
    }
  }
  if (rule.datePath) {
    reading.asOfDate = toDate(readPath(data, rule.datePath), rule.dateFormat);
  }

  return ok(reading);
}

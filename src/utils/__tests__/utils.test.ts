import { describe, it, expect } from 'vitest';
import { addDays, fromUnixSeconds, isWeekend, parseCbrDate, toDisplayDate, toIsoDate } from '../date.utils.js';
import { decodeBody } from '../encoding.utils.js';
import { parseLocaleNumber, roundTo2 } from '../number.utils.js';
import { createSeededRandom, fixedClock, mulberry32 } from '../random.utils.js';

describe('number utils', () => {
  it('rounds to two decimals', () => {
    expect(roundTo2(92.5031)).toBe(92.5);
    expect(roundTo2(78.2349)).toBe(78.23);
    expect(roundTo2(-0.256)).toBe(-0.26);
  });

  it('parses comma and dot decimals', () => {
    expect(parseLocaleNumber('92,50')).toBe(92.5);
    expect(parseLocaleNumber(' 78.23 ')).toBe(78.23);
    expect(parseLocaleNumber('1')).toBe(1);
  });

  it('returns NaN for non-numeric text', () => {
    expect(parseLocaleNumber('n/a')).toBeNaN();
    expect(parseLocaleNumber('')).toBeNaN();
    expect(parseLocaleNumber('1,2,3')).toBeNaN();
  });
});

describe('date utils', () => {
  const date = new Date('2026-10-18T09:30:00Z');

  it('formats ISO and display dates in UTC', () => {
    expect(toIsoDate(date)).toBe('2026-10-18');
    expect(toDisplayDate(date)).toBe('18.10');
  });

  it('adds calendar days', () => {
    expect(toIsoDate(addDays(date, -29))).toBe('2026-09-19');
    expect(toIsoDate(addDays(date, 14))).toBe('2026-11-01');
  });

  it('detects weekends', () => {
    expect(isWeekend(new Date('2026-10-17T12:00:00Z'))).toBe(true); // Saturday
    expect(isWeekend(new Date('2026-10-18T12:00:00Z'))).toBe(true); // Sunday
    expect(isWeekend(new Date('2026-10-19T12:00:00Z'))).toBe(false);
  });

  it('converts CBR and unix dates', () => {
    expect(parseCbrDate('18.10.2026')).toBe('2026-10-18');
    expect(parseCbrDate('2026-10-18')).toBeUndefined();
    expect(fromUnixSeconds(1_792_281_600)).toBe('2026-10-18');
    expect(fromUnixSeconds(0)).toBeUndefined();
  });
});

describe('random utils', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = mulberry32(42);
    const b = mulberry32(42);
    const seqA = [a(), a(), a()];
    const seqB = [b(), b(), b()];
    expect(seqA).toEqual(seqB);
    for (const value of seqA) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('keeps uniform samples inside the requested range', () => {
    const random = createSeededRandom(7);
    for (let i = 0; i < 200; i++) {
      const value = random.uniform(-0.3, 0.3);
      expect(value).toBeGreaterThanOrEqual(-0.3);
      expect(value).toBeLessThan(0.3);
    }
  });

  it('returns a fresh Date from a fixed clock', () => {
    const clock = fixedClock('2026-10-18T09:30:00Z');
    const first = clock.now();
    first.setUTCFullYear(2000);
    expect(clock.now().toISOString()).toBe('2026-10-18T09:30:00.000Z');
  });
});

describe('decodeBody', () => {
  // "Доллар" in windows-1251
  const cp1251 = [0xc4, 0xee, 0xeb, 0xeb, 0xe0, 0xf0];

  it('uses the XML prolog encoding when no header charset is given', () => {
    const bytes = Buffer.concat([
      Buffer.from('<?xml version="1.0" encoding="windows-1251"?><Name>'),
      Buffer.from(cp1251),
      Buffer.from('</Name>')
    ]);
    expect(decodeBody(bytes)).toBe('<?xml version="1.0" encoding="windows-1251"?><Name>Доллар</Name>');
  });

  it('prefers the Content-Type charset', () => {
    expect(decodeBody(Buffer.from(cp1251), 'text/xml; charset=windows-1251')).toBe('Доллар');
  });

  it('defaults to UTF-8', () => {
    expect(decodeBody(Buffer.from('{"rate":"Доллар"}', 'utf-8'), 'application/json')).toBe('{"rate":"Доллар"}');
  });

  it('falls back to UTF-8 on an unknown charset label', () => {
    expect(decodeBody(Buffer.from('OK'), 'text/plain; charset=x-made-up')).toBe('OK');
  });
});

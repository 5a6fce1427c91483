import { describe, expect, it } from 'vitest';

import {
  detectDominantEra,
  parseFiscalYearToken,
  resolveBareYear,
} from '@/modules/review-sheets/core/fiscal-year.js';

describe('parseFiscalYearToken', () => {
  it('reads a Gregorian year and the field text after it', () => {
    expect(parseFiscalYearToken('予算額・執行額-2022年度-当初予算', 'heisei')).toEqual({
      fiscalYear: 2022,
      tail: '当初予算',
    });
  });

  it('reads full-width digits', () => {
    expect(parseFiscalYearToken('２０２３年度当初予算', 'heisei')?.fiscalYear).toBe(2023);
  });

  it('reads era-prefixed years', () => {
    expect(parseFiscalYearToken('令和元年度当初予算', 'heisei')).toEqual({
      fiscalYear: 2019,
      tail: '当初予算',
    });
    expect(parseFiscalYearToken('平成30年度補正予算', 'reiwa')?.fiscalYear).toBe(2018);
  });

  it('resolves bare years against the dominant era', () => {
    expect(parseFiscalYearToken('-05年度-当初予算', 'reiwa')).toEqual({
      fiscalYear: 2023,
      tail: '当初予算',
    });
    expect(parseFiscalYearToken('-05年度-当初予算', 'heisei')?.fiscalYear).toBe(1993);
  });

  it('treats bare years from 20 up as Heisei', () => {
    expect(parseFiscalYearToken('-25年度-執行額', 'reiwa')?.fiscalYear).toBe(2013);
  });

  it('returns null without a year token', () => {
    expect(parseFiscalYearToken('事業名', 'heisei')).toBeNull();
  });
});

describe('resolveBareYear', () => {
  it.each([
    [5, 'reiwa', 2023],
    [5, 'heisei', 1993],
    [20, 'reiwa', 2008],
  ] as const)('resolves %i under %s to %i', (value, era, expected) => {
    expect(resolveBareYear(value, era)).toBe(expected);
  });
});

describe('detectDominantEra', () => {
  it('prefers Reiwa on a tie', () => {
    expect(detectDominantEra(['令和5年度', '平成30年度'])).toBe('reiwa');
  });

  it('picks Heisei when it is more frequent', () => {
    expect(detectDominantEra(['平成29年度', '平成30年度', '令和元年度'])).toBe('heisei');
  });

  it('defaults to Heisei', () => {
    expect(detectDominantEra([])).toBe('heisei');
    expect(detectDominantEra(['事業名'])).toBe('heisei');
  });
});

import { describe, expect, it } from 'vitest';

import { buildHeaderIndex } from '@/modules/review-sheets/core/header-index.js';
import {
  createRowReader,
  meaningfulText,
  parseAmount,
  parseYear,
} from '@/modules/review-sheets/core/values.js';

describe('meaningfulText', () => {
  it('trims text', () => {
    expect(meaningfulText('  x ')).toBe('x');
  });

  it.each(['', '   ', '-', '―', 'N/A', '#N/A', 'n/a'])('treats %j as empty', (value) => {
    expect(meaningfulText(value)).toBeNull();
  });

  it('treats a missing cell as empty', () => {
    expect(meaningfulText(undefined)).toBeNull();
  });
});

describe('parseAmount', () => {
  it.each([
    ['1,234', '1234'],
    ['▲500', '-500'],
    ['△1,000円', '-1000'],
    ['12.5%', '12.5'],
    ['¥3,000', '3000'],
    ['0', '0'],
  ])('parses %s', (input, expected) => {
    expect(parseAmount(input)?.toString()).toBe(expected);
  });

  it.each(['-', 'N/A', 'abc', '', '1.2.3'])('rejects %j', (input) => {
    expect(parseAmount(input)).toBeNull();
  });
});

describe('parseYear', () => {
  it('takes the first four-digit run', () => {
    expect(parseYear('2013年度')).toBe(2013);
    expect(parseYear('不明')).toBeNull();
  });
});

describe('createRowReader', () => {
  it('reads cells through the header index', () => {
    const index = buildHeaderIndex(['事業名', '予算額・執行額-2022年度-当初予算']);
    const reader = createRowReader(index, {
      事業名: 'X事業',
      '予算額・執行額-2022年度-当初予算': '1,200',
    });

    expect(reader.text('common.projectName')).toBe('X事業');
    expect(
      reader.amount('budget.initial', { fiscalYear: 2022, block: null, sequence: null })?.toNumber()
    ).toBe(1200);
    expect(reader.text('common.ministry')).toBeNull();
  });
});

import { describe, expect, it } from 'vitest';

import { inferDataType, profileTable } from '@/modules/table-profiles/index.js';

describe('inferDataType', () => {
  it.each([
    [[], 'string'],
    [['1', '-2'], 'integer'],
    [['1', '2.5'], 'number'],
    [['1', 'x'], 'string'],
  ] as const)('infers %j as %s', (values, expected) => {
    expect(inferDataType(values)).toBe(expected);
  });
});

describe('profileTable', () => {
  const profile = profileTable(
    'sample.csv',
    ['id', 'amount', 'name'],
    [
      ['1', '10.5', '東京'],
      ['2', null, '大阪府'],
      ['3', '4.5', '東京'],
    ]
  );

  it('records table dimensions', () => {
    expect(profile).toMatchObject({ fileName: 'sample.csv', rowCount: 3, columnCount: 3 });
  });

  it('profiles an integer column', () => {
    expect(profile.columns[0]).toEqual({
      index: 0,
      name: 'id',
      dataType: 'integer',
      nullable: false,
      statistics: {
        totalCount: 3,
        nonNullCount: 3,
        nullCount: 0,
        uniqueCount: 3,
        numeric: { min: '1', max: '3', mean: '2', median: '2' },
      },
      sampleValues: ['1', '2', '3'],
    });
  });

  it('profiles a decimal column with gaps', () => {
    expect(profile.columns[1]).toMatchObject({
      dataType: 'number',
      nullable: true,
      statistics: {
        nullCount: 1,
        numeric: { min: '4.5', max: '10.5', mean: '7.5', median: '7.5' },
      },
    });
  });

  it('profiles a text column by character length', () => {
    expect(profile.columns[2]).toMatchObject({
      dataType: 'string',
      statistics: {
        uniqueCount: 2,
        text: { minLength: 2, maxLength: 3, averageLength: '2.33' },
      },
      sampleValues: ['東京', '大阪府'],
    });
  });
});

describe('profileTable on a large table', () => {
  const ROW_COUNT = 250_000;

  it('summarizes columns longer than the engine argument limit', { timeout: 60_000 }, () => {
    const rows = Array.from({ length: ROW_COUNT }, (_, position) => [
      String(position),
      position % 2 === 0 ? 'ab' : 'abcd',
    ]);

    const profile = profileTable('large.csv', ['id', 'label'], rows);

    expect(profile.rowCount).toBe(ROW_COUNT);
    expect(profile.columns[0]?.statistics).toEqual({
      totalCount: ROW_COUNT,
      nonNullCount: ROW_COUNT,
      nullCount: 0,
      uniqueCount: ROW_COUNT,
      numeric: { min: '0', max: '249999', mean: '124999.5', median: '124999.5' },
    });
    expect(profile.columns[1]?.statistics).toEqual({
      totalCount: ROW_COUNT,
      nonNullCount: ROW_COUNT,
      nullCount: 0,
      uniqueCount: 2,
      text: { minLength: 2, maxLength: 4, averageLength: '3' },
    });
  });
});

import { describe, expect, it } from 'vitest';

import { detectSheetType } from '@/modules/review-sheets/core/sheet-type.js';

import { makeSourceTable } from '../../fixtures/builders.js';

describe('detectSheetType', () => {
  it('trusts a file name that names the sheet', () => {
    expect(detectSheetType(makeSourceTable('レビューシート_2023.csv', ['x']))).toBe('review');
    expect(detectSheetType(makeSourceTable('Review.csv', ['x']))).toBe('review');
    expect(detectSheetType(makeSourceTable('segment_2023.csv', ['事業名', '府省庁', '予算']))).toBe(
      'segment'
    );
  });

  it('recognizes review sheets by header vocabulary', () => {
    expect(detectSheetType(makeSourceTable('sheet1.csv', ['事業名', '府省庁', '予算額']))).toBe(
      'review'
    );
  });

  it('recognizes segment sheets by header vocabulary', () => {
    expect(detectSheetType(makeSourceTable('sheet2.csv', ['セグメント名', '達成目標']))).toBe(
      'segment'
    );
  });

  it('returns unknown below both thresholds', () => {
    expect(detectSheetType(makeSourceTable('sheet3.csv', ['事業名', '予算額']))).toBe('unknown');
  });
});

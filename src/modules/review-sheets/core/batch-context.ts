/**
 * Year-scoped entity id counter.
 *
 * Ids start at 1 for every fiscal year and follow file order, then row order.
 * A caller that abandons a file after reserving ids rewinds to the mark it
 * took before reserving, so the year's ids stay gapless.
 */
export interface BatchContext {
  readonly fiscalYear: number | null;
  nextId(): number;
  assignEntityIds(rowCount: number): number[];
  resetForYear(fiscalYear: number): void;
  mark(): BatchMark;
  rewind(mark: BatchMark): void;
}

export interface BatchMark {
  readonly fiscalYear: number | null;
  readonly nextId: number;
}

export const createBatchContext = (): BatchContext => {
  let fiscalYear: number | null = null;
  let next = 1;

  const nextId = (): number => {
    const id = next;
    next += 1;
    return id;
  };

  return {
    get fiscalYear() {
      return fiscalYear;
    },
    nextId,
    assignEntityIds: (rowCount) => Array.from({ length: rowCount }, () => nextId()),
    resetForYear: (year) => {
      fiscalYear = year;
      next = 1;
    },
    mark: () => ({ fiscalYear, nextId: next }),
    rewind: (mark) => {
      if (mark.fiscalYear !== fiscalYear) {
        throw new Error(
          `Cannot rewind entity ids across years (mark ${String(mark.fiscalYear)}, current ${String(fiscalYear)})`
        );
      }
      next = mark.nextId;
    },
  };
};

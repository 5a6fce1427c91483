// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type EraName = '明治' | '大正' | '昭和' | '平成' | '令和';

/** Gregorian year of era year 1 */
export const ERA_FIRST_YEARS: Readonly<Record<EraName, number>> = {
  明治: 1868,
  大正: 1912,
  昭和: 1926,
  平成: 1989,
  令和: 2019,
};

const ERA_LETTERS: Readonly<Record<string, EraName>> = {
  M: '明治',
  T: '大正',
  S: '昭和',
  H: '平成',
  R: '令和',
};

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

// Letter forms only count when they do not continue a Latin word ("PS4年" stays)
const ERA = '(?:(明治|大正|昭和|平成|令和)|(?<![A-Za-z])([MTSHR]))';
const ERA_YEAR = '(\\d{1,2}|元)';

const ERA_RANGE_RE = new RegExp(`${ERA}${ERA_YEAR}[-~〜～]${ERA_YEAR}年`, 'g');
const ERA_SINGLE_RE = new RegExp(`${ERA}${ERA_YEAR}年`, 'g');

const isEraName = (value: string): value is EraName => Object.hasOwn(ERA_FIRST_YEARS, value);

const resolveEra = (kanji: string | undefined, letter: string | undefined): EraName | undefined => {
  if (kanji !== undefined && isEraName(kanji)) {
    return kanji;
  }
  return letter !== undefined ? ERA_LETTERS[letter] : undefined;
};

/**
 * Converts an era year number (`元` = 1) to the Gregorian year.
 */
export const toGregorianYear = (era: EraName, eraYear: string): number => {
  const offset = eraYear === '元' ? 1 : Number.parseInt(eraYear, 10);
  return ERA_FIRST_YEARS[era] + offset - 1;
};

/**
 * Rewrites `<Era><N>年` and `<Era><N>〜<M>年` to Gregorian years.
 *
 * @example convertEraYears('平成25〜28年') // '2013〜2016年'
 */
export const convertEraYears = (text: string): string =>
  text
    .replace(
      ERA_RANGE_RE,
      (whole, kanji: string | undefined, letter: string | undefined, from: string, to: string) => {
        const era = resolveEra(kanji, letter);
        if (era === undefined) return whole;
        return `${String(toGregorianYear(era, from))}〜${String(toGregorianYear(era, to))}年`;
      }
    )
    .replace(
      ERA_SINGLE_RE,
      (whole, kanji: string | undefined, letter: string | undefined, eraYear: string) => {
        const era = resolveEra(kanji, letter);
        if (era === undefined) return whole;
        return `${String(toGregorianYear(era, eraYear))}年`;
      }
    );

const DATABASE_YEAR_RE = /database(\d{4})/;
const PREFIXED_YEAR_RE = /year_(\d{4})/;
const DATABASE_CODE_RE = /database_(\d{2})\d{4}/;

/**
 * Infers the fiscal year from a source archive or directory name.
 *
 * `database_220427` carries a two-digit code: 19 and above is read as a
 * Reiwa-era export date (2000 + code), anything lower as Heisei (1988 + code).
 */
export const extractYearFromName = (name: string): number | null => {
  const direct = DATABASE_YEAR_RE.exec(name) ?? PREFIXED_YEAR_RE.exec(name);
  if (direct?.[1] !== undefined) {
    return Number.parseInt(direct[1], 10);
  }

  const coded = DATABASE_CODE_RE.exec(name);
  if (coded?.[1] !== undefined) {
    const code = Number.parseInt(coded[1], 10);
    return code >= 19 ? 2000 + code : 1988 + code;
  }

  return null;
};

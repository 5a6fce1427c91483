/**
 * Best-effort parsers for the structured free-text cells of a review sheet.
 * Whatever does not fit the expected shape stays in the primary field.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Law citations
// ─────────────────────────────────────────────────────────────────────────────

export interface LawCitation {
  readonly name: string;
  readonly lawNumber: string | null;
  readonly article: string | null;
  readonly paragraph: string | null;
  readonly item: string | null;
}

const NUMERAL = '[0-9〇一二三四五六七八九十百千]+';
const PARENTHETICAL_RE = /[（(]([^（）()]+)[）)]/;
const ARTICLE_ONLY_RE = new RegExp(`第(${NUMERAL})条(?:の(${NUMERAL}))?`);
const PARAGRAPH_RE = new RegExp(`第(${NUMERAL})項`);
const ITEM_RE = new RegExp(`第(${NUMERAL}(?:の${NUMERAL})?)号`);

/**
 * `地方自治法(1947年法律第67号)第2条第1項` →
 * name 地方自治法, law number 1947年法律第67号, article 2, paragraph 1.
 */
export const parseLawCitation = (text: string): LawCitation => {
  const parenthetical = PARENTHETICAL_RE.exec(text);
  // Article references outside the law number only
  const outside = parenthetical === null ? text : text.replace(parenthetical[0], ' ');
  const article = ARTICLE_ONLY_RE.exec(outside);

  let name = text;
  if (parenthetical !== null) {
    name = text.slice(0, parenthetical.index);
  } else if (article !== null) {
    name = outside.slice(0, article.index);
  }
  name = name.trim();

  const articleNumber =
    article === null
      ? null
      : article[2] !== undefined
        ? `${article[1] ?? ''}の${article[2]}`
        : (article[1] ?? null);

  return {
    name: name === '' ? text.trim() : name,
    lawNumber: parenthetical?.[1]?.trim() ?? null,
    article: articleNumber,
    paragraph: PARAGRAPH_RE.exec(outside)?.[1] ?? null,
    item: ITEM_RE.exec(outside)?.[1] ?? null,
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Plans and notices
// ─────────────────────────────────────────────────────────────────────────────

export interface PlanReference {
  readonly name: string;
  readonly url: string | null;
}

const PLAN_URL_RE = /https?:\/\/[^\s、。]+/;

export const parsePlanReference = (text: string): PlanReference => {
  const url = PLAN_URL_RE.exec(text)?.[0] ?? null;
  const name = (url === null ? text : text.replace(url, ' ')).replace(/\s+/g, ' ').trim();
  return { name: name === '' ? text.trim() : name, url };
};

// ─────────────────────────────────────────────────────────────────────────────
// Subsidy terms
// ─────────────────────────────────────────────────────────────────────────────

export interface SubsidyTerms {
  readonly target: string | null;
  readonly rate: string | null;
  readonly ceiling: string | null;
  readonly url: string | null;
}

const SUBSIDY_URL_RE = /https?:\/\/[^\s,、。]+/;
const SUBSIDY_TARGET_RE = /補助対象[:：]\s*([\s\S]+?)\s*(?=補助率|補助上限|$)/;
const SUBSIDY_RATE_RES: readonly RegExp[] = [
  /補助率[:：]\s*([^\s、。,]+)/,
  /(\d+\/\d+)/,
  /(定額)/,
  /(\d+(?:\.\d+)?%)/,
];
const SUBSIDY_CEILING_RE = /(?:補助上限|上限額?)[:：]\s*([^\s、。,]+)/;
/** Unstructured text shorter than this is taken to be the rate itself */
const SHORT_TEXT_LIMIT = 100;

const firstCapture = (text: string, patterns: readonly RegExp[]): string | null => {
  for (const pattern of patterns) {
    const value = pattern.exec(text)?.[1];
    if (value !== undefined) return value;
  }
  return null;
};

export const parseSubsidyTerms = (text: string): SubsidyTerms => {
  const url = SUBSIDY_URL_RE.exec(text)?.[0] ?? null;
  const body = (url === null ? text : text.replace(url, ' ')).replace(/\s+/g, ' ').trim();

  const target = SUBSIDY_TARGET_RE.exec(body)?.[1]?.trim() ?? null;
  const rate = firstCapture(body, SUBSIDY_RATE_RES);
  const ceiling = SUBSIDY_CEILING_RE.exec(body)?.[1] ?? null;

  if (target === null && rate === null && ceiling === null && body !== '') {
    return body.length < SHORT_TEXT_LIMIT
      ? { target: null, rate: body, ceiling: null, url }
      : { target: body, rate: null, ceiling: null, url };
  }

  return { target: target === '' ? null : target, rate, ceiling, url };
};

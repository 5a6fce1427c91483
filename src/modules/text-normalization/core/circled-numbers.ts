const CIRCLED_NUMBER_RE = /[①-⑳]/g;

/** ① … ⑳ → 1 … 20 */
export const replaceCircledNumbers = (text: string): string =>
  text.replace(CIRCLED_NUMBER_RE, (glyph) => String(glyph.charCodeAt(0) - 0x2460 + 1));

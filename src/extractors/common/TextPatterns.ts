/**
 * Free-text patterns for Brazilian panel pages
 */

export const TEXT_PATTERNS = {
  CPF: /\d{3}\.\d{3}\.\d{3}-\d{2}/,
  PHONE: /\+?\d{2}[\s.-]?\d{4,5}[\s.-]?\d{4}/,
  EMAIL: /[\w.-]+@[\w.-]+\.\w+/,
  DATE: /\d{2}\/\d{2}\/\d{4}/,
  DATETIME: /\d{2}\/\d{2}\/\d{4}\s+\d{2}:\d{2}:\d{2}/,
  MONEY: /R\$\s*[\d.,]+/,
} as const;

export type TextPatternName = keyof typeof TEXT_PATTERNS;

/**
 * First match of a named pattern ("" when absent)
 */
export function matchPattern(name: TextPatternName, text: string): string {
  return TEXT_PATTERNS[name].exec(text)?.[0] ?? "";
}

/**
 * Order id from texts like "#1313" or "1313"
 */
export function parseOrderId(text: string | undefined): number | null {
  if (!text) {
    return null;
  }
  const match = /#?(\d+)/.exec(text);
  if (!match) {
    return null;
  }
  const id = Number.parseInt(match[1], 10);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

import { z } from "zod";

import rawCurrencies from "../data/currencies.json";

const CurrencyDataSchema = z.object({ prefixes: z.array(z.string().trim().min(1)) });

/**
 * Currency markers that may precede an amount, in a cell or in a question.
 * Letter codes (`RM`, `USD`) match case-insensitively.
 */
export const DEFAULT_CURRENCY_PREFIXES: readonly string[] = CurrencyDataSchema.parse(rawCurrencies).prefixes;

export interface NumberParseOptions {
  currencyPrefixes?: readonly string[];
}

// Decimal and exponent forms only; `Number()` alone would also take "0x1F" or "0b11".
const PLAIN_NUMBER_RE = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:e[-+]?\d+)?$/i;
const GROUPED_NUMBER_RE = /^(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?$|^\.\d+$/;

const prefixPatterns = new WeakMap<readonly string[], RegExp>();

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function currencyPattern(prefixes: readonly string[]): RegExp {
  let pattern = prefixPatterns.get(prefixes);
  if (!pattern) {
    const alternatives = [...new Set(prefixes.map((prefix) => prefix.trim()).filter((prefix) => prefix !== ""))]
      .sort((a, b) => b.length - a.length)
      .map(escapeRegExp);
    // "RMX" is a word, not ringgit followed by X.
    pattern = alternatives.length > 0 ? new RegExp(`^(?:${alternatives.join("|")})(?!\\p{L})`, "iu") : /(?!)/;
    prefixPatterns.set(prefixes, pattern);
  }
  return pattern;
}

type Sign = 1 | -1;

function takeSign(text: string): { sign: Sign | null; rest: string } {
  const first = text.charAt(0);
  if (first !== "+" && first !== "-") return { sign: null, rest: text };
  return { sign: first === "-" ? -1 : 1, rest: text.slice(1).trimStart() };
}

/**
 * Numeric value of a cell or query amount as a finance workbook renders it, or
 * `null` when the text is not a number.
 *
 * Besides decimal and exponent numerals this takes grouped thousands
 * (`750,000,000`), a currency marker after an optional sign (`RM 1,200`,
 * `-$5`, `$-5`), a trailing percent (`12.5%` -> 0.125) and accounting
 * negatives (`(RM 1,200)` -> -1200). Dates and codes such as `2024-01-01` or
 * `0x1F` stay text.
 */
export function parseSpreadsheetNumber(value: unknown, options: NumberParseOptions = {}): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;

  let text = value.trim();
  if (text === "") return null;
  if (PLAIN_NUMBER_RE.test(text)) {
    const plain = Number(text);
    return Number.isFinite(plain) ? plain : null;
  }

  const accounting = text.startsWith("(") && text.endsWith(")");
  if (accounting) text = text.slice(1, -1).trim();

  const percent = text.endsWith("%");
  if (percent) text = text.slice(0, -1).trimEnd();

  let { sign, rest } = takeSign(text);
  const currency = currencyPattern(options.currencyPrefixes ?? DEFAULT_CURRENCY_PREFIXES).exec(rest);
  if (currency) {
    rest = rest.slice(currency[0].length).trimStart();
    if (sign === null) ({ sign, rest } = takeSign(rest));
  }

  if (!GROUPED_NUMBER_RE.test(rest)) return null;
  let result = Number(rest.replaceAll(",", "")) * (sign ?? 1);
  if (!Number.isFinite(result)) return null;

  if (percent) result /= 100;
  // "(-5)" is already negative.
  if (accounting && result > 0) result = -result;
  return result;
}

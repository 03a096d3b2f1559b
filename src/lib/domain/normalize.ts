/**
 * Free-text parsing for scraped listing fields: prices, areas and floors.
 * Every parser returns null for text it cannot read rather than guessing.
 */
import type { Currency, Floor } from "./types";
import { CURRENCY_MARKERS, normalizeKey } from "./aliases";

/** Default BGN per EUR rate (the fixed currency-board peg). */
export const BGN_PER_EUR = 1.95583;

export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Parse a number written with Bulgarian or English separators.
 * Spaces and `.`/`,` before exactly three digits are thousands separators;
 * a trailing `,d` or `,dd` (or `.d`/`.dd`) is the decimal part.
 */
export function parseLocaleNumber(raw: string): number | null {
  let digits = raw.replace(/\s/g, "");
  let fraction = "";

  const decimal = digits.match(/[.,](\d{1,2})$/);
  if (decimal) {
    fraction = decimal[1];
    digits = digits.slice(0, -decimal[0].length);
  }

  if (!/^\d+$/.test(digits) && !/^\d{1,3}([.,]\d{3})+$/.test(digits)) {
    return null;
  }

  const value = Number(
    fraction ? `${digits.replace(/[.,]/g, "")}.${fraction}` : digits.replace(/[.,]/g, "")
  );
  return Number.isFinite(value) ? value : null;
}

// ==================== PRICE ====================

export type ParsedPrice =
  | { kind: "amount"; amount: number; currency: Currency }
  | { kind: "on-request" };

const ON_REQUEST_PATTERN =
  /при\s+запитване|по\s+договаряне|цена\s+при\s+запитване|price\s+on\s+request|on\s+request/i;

function escapeRegExp(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

const MARKER_SOURCE = [...CURRENCY_MARKERS.keys()]
  .sort((a, b) => b.length - a.length)
  .map(escapeRegExp)
  .join("|");

/**
 * An amount, optionally preceded or followed by a currency marker.
 * Groups: 1 = leading marker, 2 = number, 3 = trailing marker.
 */
const AMOUNT_PATTERN = new RegExp(
  `(${MARKER_SOURCE})?\\s*(\\d{1,3}(?:[\\s.,]\\d{3})+(?:[.,]\\d{1,2})?|\\d+(?:[.,]\\d{1,2})?)\\s*(${MARKER_SOURCE})?`,
  "gi"
);

interface AmountToken {
  amount: number;
  currency: Currency | null;
}

function scanAmounts(text: string): AmountToken[] {
  const tokens: AmountToken[] = [];
  for (const match of text.toLowerCase().matchAll(AMOUNT_PATTERN)) {
    const amount = parseLocaleNumber(match[2]);
    if (amount === null) continue;
    const marker = match[3] ?? match[1];
    tokens.push({
      amount,
      currency: marker ? CURRENCY_MARKERS.get(marker) ?? null : null,
    });
  }
  return tokens;
}

/**
 * Parse a price text into an amount and its currency.
 * When both currencies are present the EUR amount wins; an amount without a
 * marker takes `defaultCurrency`. Returns null when nothing is readable.
 */
export function parsePrice(
  text: string | null | undefined,
  defaultCurrency: Currency = "EUR"
): ParsedPrice | null {
  if (!text) return null;
  const cleaned = normalizeKey(text);
  if (cleaned.length === 0) return null;

  const tokens = scanAmounts(cleaned);
  if (tokens.length === 0) {
    return ON_REQUEST_PATTERN.test(cleaned) ? { kind: "on-request" } : null;
  }

  const chosen =
    tokens.find((t) => t.currency === "EUR") ??
    tokens.find((t) => t.currency === "BGN") ??
    tokens[0];

  return {
    kind: "amount",
    amount: chosen.amount,
    currency: chosen.currency ?? defaultCurrency,
  };
}

/** Convert an amount to EUR, rounded to cents. */
export function toEur(
  amount: number,
  currency: Currency,
  bgnPerEur: number = BGN_PER_EUR
): number {
  return currency === "BGN" ? roundTo(amount / bgnPerEur, 2) : roundTo(amount, 2);
}

// ==================== AREA ====================

/**
 * Parse an area like "65 m2", "65,5 кв.м" or "1 200 кв.м" into square metres.
 * Only spaces group thousands; a single `.` or `,` is the decimal point, so
 * "65.125" is 65.125. Non-numeric or negative input yields null.
 */
export function parseArea(text: string | null | undefined): number | null {
  if (!text) return null;
  const match = text.match(/-?\d{1,3}(?:\s\d{3})+(?:[.,]\d+)?|-?\d+(?:[.,]\d+)?/);
  if (!match) return null;
  if (match[0].startsWith("-")) return null;
  const value = Number(match[0].replace(/\s/g, "").replace(",", "."));
  return Number.isFinite(value) ? value : null;
}

// ==================== FLOOR ====================

const EXPLICIT_FLOOR_PATTERNS = [
  /(?:етаж|ет\.)\s*:?\s*(-?\d+)/,
  /(-?\d+)\s*-?\s*(?:ви|ри|ти|ми)?\s*(?:етаж|ет\.)/,
];

function parseNamedFloor(text: string): Floor | null {
  if (/партер/.test(text)) return "ground";
  if (/сутерен/.test(text)) return -1;
  if (/мансард|таван/.test(text)) return "attic";
  return null;
}

function parseExplicitFloor(text: string): number | null {
  for (const pattern of EXPLICIT_FLOOR_PATTERNS) {
    const match = text.match(pattern);
    if (match) return parseInt(match[1], 10);
  }
  return null;
}

/**
 * Read the floor from `floorText`, falling back to the description.
 * The description only counts when it names the floor explicitly.
 */
export function parseFloor(
  floorText: string | null | undefined,
  description?: string | null
): Floor | null {
  if (floorText) {
    const text = normalizeKey(floorText);
    const explicit = parseExplicitFloor(text);
    if (explicit !== null) return explicit;
    const named = parseNamedFloor(text);
    if (named !== null) return named;
    const plain = text.match(/-?\d+/);
    if (plain) return parseInt(plain[0], 10);
  }

  if (description) {
    const text = normalizeKey(description);
    const explicit = parseExplicitFloor(text);
    if (explicit !== null) return explicit;
    const named = parseNamedFloor(text);
    if (named !== null) return named;
  }

  return null;
}

const TOTAL_FLOORS_PATTERN = /от\s*(\d{1,2})(?!\d)/;

/**
 * Building height from `totalFloorsText`, or from "от N" in the floor text
 * or the description.
 */
export function parseTotalFloors(
  totalFloorsText: string | null | undefined,
  floorText?: string | null,
  description?: string | null
): number | null {
  if (totalFloorsText) {
    const match = totalFloorsText.match(/\d+/);
    if (match) return parseInt(match[0], 10);
  }
  for (const text of [floorText, description]) {
    if (!text) continue;
    const match = normalizeKey(text).match(TOTAL_FLOORS_PATTERN);
    if (match) return parseInt(match[1], 10);
  }
  return null;
}

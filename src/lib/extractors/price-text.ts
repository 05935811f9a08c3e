// Helpers for turning scraped price strings into numbers

// Taka sign, "Tk", "BDT" and the common western symbols
export const CURRENCY_MARKER = String.raw`(?:৳|\btk\b\.?|\bbdt\b|\$|€|£|₹|\brs\b\.?)`;

const NUMBER_PATTERN = /\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?/;

const CURRENCY_AMOUNT = new RegExp(
  String.raw`${CURRENCY_MARKER}\s*(\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?)` +
    '|' +
    String.raw`(\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?)\s*${CURRENCY_MARKER}`,
  'i'
);

/**
 * Accept only finite, positive prices; everything else means "no price".
 */
export function toPrice(value: unknown): number | null {
  let num: number;
  if (typeof value === 'number') {
    num = value;
  } else if (typeof value === 'string') {
    const cleaned = value.replace(/,/g, '').trim();
    if (!/^\d+(?:\.\d+)?$/.test(cleaned)) return null;
    num = parseFloat(cleaned);
  } else {
    return null;
  }

  if (!Number.isFinite(num) || num <= 0) return null;
  return Math.round(num * 100) / 100;
}

/**
 * First number in a price label such as "৳ 1,250", "Tk. 980.50" or "$1,299.99".
 */
export function parsePriceText(text: string | undefined | null): number | null {
  if (!text) return null;
  const match = text.replace(/\s+/g, ' ').match(NUMBER_PATTERN);
  if (!match) return null;
  return toPrice(match[0]);
}

/**
 * First number that carries a currency marker on either side.
 */
export function findCurrencyAmount(text: string): number | null {
  const match = text.replace(/\s+/g, ' ').match(CURRENCY_AMOUNT);
  if (!match) return null;
  return toPrice(match[1] ?? match[2]);
}

/**
 * Fixed-point money helpers. Amounts are carried as integer cents so that
 * `unit_price × quantity` is exact; they leave the API as "1234.50" strings.
 */

export type Cents = number;

/** Largest amount a money column holds (9999.99). */
export const MAX_AMOUNT_CENTS: Cents = 999_999;

/** Largest cart/order quantity (16-bit signed column). */
export const MAX_QUANTITY = 32_767;

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d{1,2}))?$/;

/**
 * Parses "12", "12.5", "12.50" or 12.5 into cents. Returns null for anything
 * that is not a non-negative decimal with at most two places.
 */
export function parseAmount(value: unknown): Cents | null {
  let text: string;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    text = String(value);
  } else if (typeof value === 'string') {
    text = value.trim();
  } else {
    return null;
  }
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) return null;
  const whole = Number(match[1]);
  const fraction = (match[2] ?? '').padEnd(2, '0');
  return whole * 100 + Number(fraction);
}

export function formatAmount(cents: Cents): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  const whole = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}

export function lineTotal(unitPrice: Cents, quantity: number): Cents {
  return unitPrice * quantity;
}

export function sumAmounts(amounts: readonly Cents[]): Cents {
  return amounts.reduce((total, amount) => total + amount, 0);
}

// Fixed-point currency helpers. Amounts are strings with at most two
// decimals ("19.99"); arithmetic happens on integer cents.

/** Largest value a numeric(10,2) column holds, in cents (99999999.99). */
export const MAX_AMOUNT_CENTS = 9_999_999_999;

const AMOUNT_PATTERN = /^(-)?(\d+)(?:\.(\d{1,2}))?$/;

export function isAmount(value: string) {
  return AMOUNT_PATTERN.test(value);
}

export function toCents(amount: string): number {
  const match = AMOUNT_PATTERN.exec(amount.trim());
  if (!match) {
    throw new Error(`Invalid currency amount: "${amount}"`);
  }
  const [, sign, whole, fraction = ""] = match;
  const cents = Number(whole) * 100 + Number(fraction.padEnd(2, "0"));
  return sign ? -cents : cents;
}

export function formatCents(cents: number): string {
  if (!Number.isSafeInteger(cents)) {
    throw new Error(`Cents value out of range: ${cents}`);
  }
  const sign = cents < 0 ? "-" : "";
  const abs = Math.abs(cents);
  const fraction = String(abs % 100).padStart(2, "0");
  return `${sign}${Math.floor(abs / 100)}.${fraction}`;
}

/** Re-renders an amount at exactly two decimals: "5" -> "5.00". */
export function normalizeAmount(amount: string) {
  return formatCents(toCents(amount));
}

export function multiplyAmount(unitPrice: string, quantity: number) {
  return formatCents(toCents(unitPrice) * quantity);
}

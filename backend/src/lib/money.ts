/**
 * Credit amounts.
 * All internal amounts are integer CENTS (1 credit = 100 cents) so no value ever
 * passes through floating point. Display conversion: cents / 100 = credits.
 */

import { ValidationError } from '../errors.js';

export type Cents = number;

const DECIMAL_RE = /^(\d+)(?:\.(\d{1,2}))?$/;

/**
 * Parse a decimal credit string ("5", "5.5", "5.00") into cents exactly.
 * Numbers are accepted only when they are already whole cents once scaled.
 */
export function parseCredits(value: string | number): Cents {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      throw new ValidationError(`Invalid credit amount: ${value}`);
    }
    const scaled = value * 100;
    const cents = Math.round(scaled);
    if (Math.abs(scaled - cents) > 1e-6 || !Number.isSafeInteger(cents)) {
      throw new ValidationError(`Credit amount is not a whole number of cents: ${value}`);
    }
    return cents;
  }
  const match = DECIMAL_RE.exec(value.trim());
  if (!match) throw new ValidationError(`Invalid credit amount: "${value}"`);
  const whole = Number(match[1]);
  const fraction = Number((match[2] ?? '').padEnd(2, '0'));
  const cents = whole * 100 + fraction;
  if (!Number.isSafeInteger(cents)) throw new ValidationError(`Credit amount out of range: "${value}"`);
  return cents;
}

/** Format cents as a two-decimal credit string, e.g. 500 → "5.00". */
export function formatCredits(cents: Cents): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  const whole = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}

export function assertPositiveCents(amount: Cents, label = 'amount'): void {
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw new ValidationError(`${label} must be a positive integer number of cents, got ${amount}`);
  }
}

/**
 * Cost of one billing tick: ratePerMinute × tickSeconds / 60.
 * Throws when the result is not a whole number of cents.
 */
export function tickCost(ratePerMinute: Cents, tickSeconds: number): Cents {
  const scaled = ratePerMinute * tickSeconds;
  if (scaled % 60 !== 0) {
    throw new ValidationError(
      `Tick cost is fractional: rate ${formatCredits(ratePerMinute)}/min over ${tickSeconds}s`,
    );
  }
  return scaled / 60;
}

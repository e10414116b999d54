/**
 * Money helpers
 *
 * Amounts travel as integer cents. The Guru API reports decimal BRL values,
 * and Bling expects a decimal comma with two places ("12,34").
 */

/**
 * Round half away from zero, tolerating binary float noise
 * (2.675 * 100 is 267.49999999999997 in IEEE 754)
 */
export function roundHalfUp(value: number): number {
  const scaled = Number(Math.abs(value).toFixed(6));
  return Math.sign(value) * Math.round(scaled);
}

/**
 * Decimal BRL amount to integer cents
 */
export function toCents(amount: number): number {
  if (!Number.isFinite(amount)) {
    return 0;
  }
  return roundHalfUp(amount * 100) || 0;
}

/**
 * Divide an amount in cents, rounding to the nearest cent
 */
export function divideCents(cents: number, divisor: number): number {
  if (divisor <= 0) {
    return cents;
  }
  return roundHalfUp(cents / divisor) || 0;
}

/**
 * Apply a percentage discount (0-100) to an amount in cents
 */
export function applyPercentDiscount(cents: number, percent: number): number {
  if (!Number.isFinite(percent) || percent <= 0) {
    return cents;
  }
  const bounded = Math.min(percent, 100);
  return roundHalfUp((cents * (100 - bounded)) / 100) || 0;
}

/**
 * Format cents for a Bling column: 1234 -> "12,34"
 */
export function formatCents(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(Math.trunc(cents));
  const units = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, '0');
  return `${sign}${units},${fraction}`;
}

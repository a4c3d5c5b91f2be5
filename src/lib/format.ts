// Enough extra places to see the exact binary value past any halfway digit
const EXACT_EXTRA_DIGITS = 30;

/**
 * `toFixed` that rounds exact halfway values to even: 156.25 -> "156.2", 0.375 -> "0.38".
 * Values that only look halfway in decimal (0.35 is stored below it) round as stored.
 */
export function formatFixed(value: number, digits: number): string {
  const rounded = value.toFixed(digits);
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return rounded;

  const exact = value.toFixed(digits + EXACT_EXTRA_DIGITS);
  const tail = exact.slice(-EXACT_EXTRA_DIGITS);
  if (!/^50*$/.test(tail)) return rounded;

  // toFixed rounds halfway away from zero; keep the truncated value when its last digit is already even
  const truncated = exact.slice(0, -EXACT_EXTRA_DIGITS).replace(/\.$/, '');
  const lastDigit = Number(truncated.charAt(truncated.length - 1));
  return lastDigit % 2 === 0 ? truncated : rounded;
}

/**
 * Always carries a sign for non-negative values: 15 -> "+15.00", -3.2 -> "-3.20"
 */
export function formatSigned(value: number, digits: number): string {
  const sign = value >= 0 ? '+' : '';
  return `${sign}${formatFixed(value, digits)}`;
}

export function formatNeutered(neutered: boolean): string {
  return neutered ? '是' : '否';
}

/** Split total months back into the years + months the form collected */
export function splitAgeMonths(ageMonths: number): { years: number; months: number } {
  return {
    years: Math.floor(ageMonths / 12),
    months: ageMonths % 12,
  };
}

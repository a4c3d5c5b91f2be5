import { InvalidInputError } from './errors';
import { missingDerError } from './intakeAnalyzer';
import type { FeedingPlan } from './types';

export function assertValidWetPercentage(wetPercentage: number): void {
  if (!Number.isInteger(wetPercentage) || wetPercentage < 0 || wetPercentage > 100) {
    throw new InvalidInputError(
      `wetPercentage must be an integer in 0-100, got ${wetPercentage}`,
      '濕食熱量佔比必須是 0 到 100 之間的整數。'
    );
  }
}

function isValidDensity(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

/** The plan is only meaningful once at least one food's caloric density is known */
export function hasAnyFoodDensity(dryKcalPer1000g: number, wetKcalPer100g: number): boolean {
  return dryKcalPer1000g > 0 || wetKcalPer100g > 0;
}

/**
 * Split DER into dry and wet calories by `wetPercentage`, then convert each
 * share into grams using the food's caloric density.
 *
 * A density of 0 yields 0 grams for that food type rather than an error.
 *
 * @throws PreconditionError when DER has not been computed yet
 */
export function planFeeding(
  der: number | null | undefined,
  wetPercentage: number,
  dryKcalPer1000g: number,
  wetKcalPer100g: number
): FeedingPlan {
  if (der === undefined || der === null) {
    throw missingDerError('planFeeding');
  }
  assertValidWetPercentage(wetPercentage);
  if (!isValidDensity(dryKcalPer1000g) || !isValidDensity(wetKcalPer100g)) {
    throw new InvalidInputError(
      `food densities must be finite numbers >= 0, got dry=${dryKcalPer1000g} wet=${wetKcalPer100g}`,
      '食物熱量必須是大於或等於 0 的數字。'
    );
  }

  const targetWetKcal = der * (wetPercentage / 100);
  const targetDryKcal = der * ((100 - wetPercentage) / 100);

  const requiredDryGrams = dryKcalPer1000g > 0 ? (targetDryKcal / dryKcalPer1000g) * 1000 : 0;
  const requiredWetGrams = wetKcalPer100g > 0 ? (targetWetKcal / wetKcalPer100g) * 100 : 0;

  return { wetPercentage, requiredDryGrams, requiredWetGrams };
}

import { InvalidInputError, PreconditionError } from './errors';
import {
  CAT_ENERGY_CONSTANTS,
  type FoodInput,
  type IntakeResult,
  type IntakeStatus,
} from './types';

const { INTAKE_TOLERANCE_KCAL } = CAT_ENERGY_CONSTANTS;

const FOOD_FIELDS: readonly (keyof FoodInput)[] = ['dryGrams', 'dryKcalPer1000g', 'wetGrams', 'wetKcalPer100g'];

const FOOD_FIELD_LABELS: Record<keyof FoodInput, string> = {
  dryGrams: '乾食餵食量',
  dryKcalPer1000g: '乾食熱量',
  wetGrams: '濕食餵食量',
  wetKcalPer100g: '濕食熱量',
};

export const INTAKE_STATUS_LABELS: Readonly<Record<IntakeStatus, string>> = {
  over: '攝取超標',
  under: '攝取不足',
  on: '完美',
};

export function missingDerError(action: string): PreconditionError {
  return new PreconditionError(
    `${action} requires a computed DER`,
    '請先在第一步完成每日建議熱量的計算！'
  );
}

export function assertValidFood(food: FoodInput): void {
  for (const key of FOOD_FIELDS) {
    const value = food[key];
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidInputError(
        `${key} must be a number >= 0, got ${value}`,
        `${FOOD_FIELD_LABELS[key]}必須是大於或等於 0 的數字。`
      );
    }
  }
}

/** Calories per day from a dry food amount, density given per 1000 g */
export function dryFoodKcal(grams: number, kcalPer1000g: number): number {
  return (grams / 1000) * kcalPer1000g;
}

/** Calories per day from a wet food amount, density given per 100 g */
export function wetFoodKcal(grams: number, kcalPer100g: number): number {
  return (grams / 100) * kcalPer100g;
}

/**
 * Compare what the cat currently eats against its DER.
 *
 * @throws PreconditionError when DER has not been computed yet
 */
export function analyzeIntake(der: number | null | undefined, food: FoodInput): IntakeResult {
  if (der === undefined || der === null) {
    throw missingDerError('analyzeIntake');
  }
  assertValidFood(food);

  const dryKcal = dryFoodKcal(food.dryGrams, food.dryKcalPer1000g);
  const wetKcal = wetFoodKcal(food.wetGrams, food.wetKcalPer100g);
  const totalKcal = dryKcal + wetKcal;

  return {
    dryGrams: food.dryGrams,
    wetGrams: food.wetGrams,
    dryKcal,
    wetKcal,
    totalKcal,
    calorieDifference: totalKcal - der,
  };
}

/**
 * Within +/-5 kcal (inclusive) of DER counts as on target.
 */
export function classifyIntake(calorieDifference: number): IntakeStatus {
  if (calorieDifference > INTAKE_TOLERANCE_KCAL) return 'over';
  if (calorieDifference < -INTAKE_TOLERANCE_KCAL) return 'under';
  return 'on';
}

/**
 * Energy Model
 *
 * Daily energy requirement for a cat:
 *   RER = 70 * weightKg^0.75          (resting, kcal/day)
 *   DER = RER * activity multiplier   (daily, kcal/day)
 *
 * Water recommendation reuses DER as ml/day.
 */

import { InvalidInputError } from './errors';
import { classifyBodyCondition, classifyLifeStage, stageMultiplier } from './lifeStage';
import {
  CAT_ENERGY_CONSTANTS,
  type CatProfile,
  type CatProfileFormInput,
  type EnergyResult,
} from './types';

const { RER_COEFFICIENT, RER_EXPONENT, BCS_MIN, BCS_MAX, WATER_ML_PER_KCAL } = CAT_ENERGY_CONSTANTS;

/**
 * Resting energy requirement in kcal/day.
 *
 * @throws InvalidInputError when weight is not a positive number
 */
export function computeRER(weightKg: number): number {
  if (!Number.isFinite(weightKg) || weightKg <= 0) {
    throw new InvalidInputError(`weightKg must be > 0, got ${weightKg}`, '體重必須大於零。');
  }
  return RER_COEFFICIENT * Math.pow(weightKg, RER_EXPONENT);
}

export function activityMultiplier(
  ageMonths: number,
  neutered: boolean,
  bcs: number,
  pregnant = false,
  lactating = false
): number {
  const stage = classifyLifeStage({ ageMonths, neutered, pregnant, lactating });
  return stageMultiplier(stage, classifyBodyCondition(bcs));
}

export function computeDER(rer: number, multiplier: number): number {
  return rer * multiplier;
}

/** Combine the form's years + months fields into total months */
export function toCatProfile(input: CatProfileFormInput): CatProfile {
  return {
    weightKg: input.weightKg,
    ageMonths: input.ageYears * 12 + input.ageMonthsPart,
    neutered: input.neutered,
    bcs: input.bcs,
    pregnant: input.pregnant,
    lactating: input.lactating,
  };
}

export function validateCatProfile(profile: CatProfile): void {
  if (!Number.isFinite(profile.weightKg) || profile.weightKg <= 0) {
    throw new InvalidInputError(`weightKg must be > 0, got ${profile.weightKg}`, '體重必須大於零。');
  }
  if (!Number.isFinite(profile.ageMonths) || profile.ageMonths <= 0) {
    throw new InvalidInputError(
      `ageMonths must be > 0, got ${profile.ageMonths}`,
      '貓咪總年齡必須大於 0 個月，請重新輸入。'
    );
  }
  if (!Number.isInteger(profile.bcs) || profile.bcs < BCS_MIN || profile.bcs > BCS_MAX) {
    throw new InvalidInputError(
      `bcs must be an integer in ${BCS_MIN}-${BCS_MAX}, got ${profile.bcs}`,
      '身體狀況評分 (BCS) 必須是 1 到 9 之間的整數。'
    );
  }
}

/**
 * Full pass from profile to EnergyResult. Pure: the same profile always
 * yields an equal result.
 */
export function computeEnergy(profile: CatProfile): EnergyResult {
  validateCatProfile(profile);

  const rer = computeRER(profile.weightKg);
  const multiplier = activityMultiplier(
    profile.ageMonths,
    profile.neutered,
    profile.bcs,
    profile.pregnant,
    profile.lactating
  );
  const der = computeDER(rer, multiplier);

  return {
    rer,
    multiplier,
    der,
    waterIntakeMl: der * WATER_ML_PER_KCAL,
  };
}

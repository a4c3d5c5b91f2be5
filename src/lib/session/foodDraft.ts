import type { FoodInput } from '../types';
import type { FoodDensities } from './dietSession';

/** Raw text of the intake form's four number fields */
export type FoodDraft = Record<keyof FoodInput, string>;

export const EMPTY_FOOD_DRAFT: FoodDraft = {
  dryGrams: '0',
  dryKcalPer1000g: '0',
  wetGrams: '0',
  wetKcalPer100g: '0',
};

/** Blank means 0; anything unparseable becomes NaN and is rejected downstream */
export function parseNumberField(raw: string): number {
  const trimmed = raw.trim();
  return trimmed === '' ? 0 : Number(trimmed);
}

export function parseFoodDraft(draft: FoodDraft): FoodInput {
  return {
    dryGrams: parseNumberField(draft.dryGrams),
    dryKcalPer1000g: parseNumberField(draft.dryKcalPer1000g),
    wetGrams: parseNumberField(draft.wetGrams),
    wetKcalPer100g: parseNumberField(draft.wetKcalPer100g),
  };
}

export function parseFoodDensities(draft: FoodDraft): FoodDensities {
  const { dryKcalPer1000g, wetKcalPer100g } = parseFoodDraft(draft);
  return { dryKcalPer1000g, wetKcalPer100g };
}

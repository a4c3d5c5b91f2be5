/**
 * Life Stage Decision Table
 *
 * The activity multiplier is picked in two steps:
 * 1. classify the cat into exactly one life stage (first matching rule wins)
 * 2. look up that stage's multiplier, adjusted by body condition
 *
 * Rule order is the precedence: pregnancy beats lactation, both beat age.
 */

import { CAT_ENERGY_CONSTANTS, type BodyCondition, type LifeStage } from './types';

const {
  KITTEN_MAX_AGE_EXCLUSIVE,
  ADOLESCENT_MAX_AGE,
  SENIOR_MIN_AGE,
  BCS_UNDERWEIGHT_BELOW,
  BCS_OVERWEIGHT_ABOVE,
} = CAT_ENERGY_CONSTANTS;

export interface LifeStageSignals {
  ageMonths: number;
  neutered: boolean;
  pregnant: boolean;
  lactating: boolean;
}

interface LifeStageRule {
  stage: LifeStage;
  matches: (signals: LifeStageSignals) => boolean;
}

const LIFE_STAGE_RULES: readonly LifeStageRule[] = [
  { stage: 'pregnant', matches: (s) => s.pregnant },
  { stage: 'lactating', matches: (s) => s.lactating },
  { stage: 'kitten', matches: (s) => s.ageMonths < KITTEN_MAX_AGE_EXCLUSIVE },
  { stage: 'adolescent', matches: (s) => s.ageMonths <= ADOLESCENT_MAX_AGE },
  { stage: 'adultNeutered', matches: (s) => s.ageMonths < SENIOR_MIN_AGE && s.neutered },
  { stage: 'adultIntact', matches: (s) => s.ageMonths < SENIOR_MIN_AGE },
];

export interface StageMultipliers {
  base: number;
  /** Replaces base when BCS is above the ideal band */
  overweight?: number;
  /** Replaces base when BCS is below the ideal band */
  underweight?: number;
}

export const STAGE_MULTIPLIERS: Readonly<Record<LifeStage, StageMultipliers>> = {
  pregnant: { base: 2.0 },
  lactating: { base: 3.0 },
  kitten: { base: 3.0 },
  adolescent: { base: 2.0 },
  adultNeutered: { base: 1.2, overweight: 0.8, underweight: 1.6 },
  adultIntact: { base: 1.4, overweight: 1.0, underweight: 1.8 },
  senior: { base: 1.0, overweight: 0.8, underweight: 1.2 },
};

export const LIFE_STAGE_LABELS: Readonly<Record<LifeStage, string>> = {
  pregnant: '懷孕母貓',
  lactating: '哺乳母貓',
  kitten: '幼貓 (未滿 4 個月)',
  adolescent: '幼貓 (4-12 個月)',
  adultNeutered: '絕育成貓',
  adultIntact: '未絕育成貓',
  senior: '老年貓 (7 歲以上)',
};

export function classifyLifeStage(signals: LifeStageSignals): LifeStage {
  const rule = LIFE_STAGE_RULES.find((candidate) => candidate.matches(signals));
  return rule ? rule.stage : 'senior';
}

/**
 * 9-point BCS: 1-3 underweight, 4-5 ideal, 6-9 overweight
 */
export function classifyBodyCondition(bcs: number): BodyCondition {
  if (bcs > BCS_OVERWEIGHT_ABOVE) return 'overweight';
  if (bcs < BCS_UNDERWEIGHT_BELOW) return 'underweight';
  return 'ideal';
}

export function stageMultiplier(stage: LifeStage, condition: BodyCondition): number {
  const multipliers = STAGE_MULTIPLIERS[stage];
  if (condition === 'overweight') return multipliers.overweight ?? multipliers.base;
  if (condition === 'underweight') return multipliers.underweight ?? multipliers.base;
  return multipliers.base;
}

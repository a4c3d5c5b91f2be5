/**
 * Diet Session
 *
 * The explicit record the page threads through the four steps
 * (profile -> intake -> plan -> report). Every step takes the current session
 * and returns a new one; on failure the input session comes back untouched,
 * so a rejected step never leaves a partial or stale result behind.
 *
 * Intake and plan are computed against a specific DER, so a successful
 * profile submission clears both.
 */

import { computeEnergy, toCatProfile } from '../energyModel';
import { PreconditionError, toActionError } from '../errors';
import { hasAnyFoodDensity, planFeeding } from '../feedingPlanner';
import { analyzeIntake, missingDerError } from '../intakeAnalyzer';
import type { ReportRequest } from '../report/reportRequest';
import type {
  ActionResult,
  CatProfile,
  CatProfileFormInput,
  EnergyResult,
  FeedingPlan,
  FoodInput,
  IntakeResult,
} from '../types';

export interface DietSession {
  profile: CatProfile | null;
  energy: EnergyResult | null;
  /** Food input the current intake was computed from */
  food: FoodInput | null;
  intake: IntakeResult | null;
  plan: FeedingPlan | null;
}

export type FoodDensities = Pick<FoodInput, 'dryKcalPer1000g' | 'wetKcalPer100g'>;

export function createDietSession(): DietSession {
  return { profile: null, energy: null, food: null, intake: null, plan: null };
}

function failed(session: DietSession, error: unknown): ActionResult<DietSession> {
  return { success: false, data: session, error: toActionError(error) };
}

/**
 * Step 1: compute DER from the profile form. Replaces profile and energy and
 * drops intake and plan, which belonged to the previous DER.
 */
export function submitProfile(session: DietSession, input: CatProfileFormInput): ActionResult<DietSession> {
  try {
    const profile = toCatProfile(input);
    const energy = computeEnergy(profile);
    return {
      success: true,
      data: { ...session, profile, energy, intake: null, plan: null },
    };
  } catch (error) {
    return failed(session, error);
  }
}

/** Step 2: compare current feeding against DER */
export function submitIntake(session: DietSession, food: FoodInput): ActionResult<DietSession> {
  try {
    const intake = analyzeIntake(session.energy?.der, food);
    return { success: true, data: { ...session, food, intake } };
  } catch (error) {
    return failed(session, error);
  }
}

/** Step 3: split DER into dry/wet grams */
export function submitFeedingPlan(
  session: DietSession,
  wetPercentage: number,
  densities: FoodDensities
): ActionResult<DietSession> {
  try {
    if (!session.energy) {
      throw missingDerError('submitFeedingPlan');
    }
    if (!hasAnyFoodDensity(densities.dryKcalPer1000g, densities.wetKcalPer100g)) {
      throw new PreconditionError(
        'submitFeedingPlan requires at least one food density > 0',
        '請在第二步輸入至少一種食物的熱量資訊，才能進行餵食量建議。'
      );
    }
    const plan = planFeeding(
      session.energy.der,
      wetPercentage,
      densities.dryKcalPer1000g,
      densities.wetKcalPer100g
    );
    return { success: true, data: { ...session, plan } };
  } catch (error) {
    return failed(session, error);
  }
}

/**
 * Step 4 input. Null until the profile step has succeeded.
 */
export function toReportRequest(
  session: DietSession,
  generatedAt: Date,
  timeZone?: string
): ReportRequest | null {
  if (!session.profile || !session.energy) return null;
  return {
    profile: session.profile,
    energy: session.energy,
    intake: session.intake,
    plan: session.plan,
    generatedAt: generatedAt.toISOString(),
    timeZone,
  };
}

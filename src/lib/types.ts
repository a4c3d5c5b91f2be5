// ============================================
// Shared Action Result Types
// ============================================

export type ActionErrorCode =
  | 'invalid_input'
  | 'precondition_failed'
  | 'asset_missing'
  | 'render_failed'
  | 'unknown_error';

/**
 * Standard error structure for step and server action failures.
 */
export interface ActionError {
  code: ActionErrorCode;
  message: string;  // User-friendly message for display
  details?: string; // Technical details for logging
}

/**
 * Generic result wrapper handed back to the UI.
 * On failure `data` still carries something safe to keep rendering
 * (for session steps: the unchanged session).
 */
export interface ActionResult<T> {
  success: boolean;
  data: T;
  error?: ActionError;
}

// ============================================
// Cat Profile & Energy
// ============================================

export interface CatProfile {
  weightKg: number;
  /** Total age in months */
  ageMonths: number;
  neutered: boolean;
  /** Body condition score, 1 (emaciated) to 9 (obese) */
  bcs: number;
  pregnant: boolean;
  lactating: boolean;
}

/** What the profile form collects; age is split into years + months */
export interface CatProfileFormInput {
  weightKg: number;
  ageYears: number;
  ageMonthsPart: number;
  neutered: boolean;
  bcs: number;
  pregnant: boolean;
  lactating: boolean;
}

export interface EnergyResult {
  /** Resting energy requirement, kcal/day */
  rer: number;
  multiplier: number;
  /** Daily energy requirement, kcal/day */
  der: number;
  /** Recommended total water, ml/day (same number as der) */
  waterIntakeMl: number;
}

export type LifeStage =
  | 'pregnant'
  | 'lactating'
  | 'kitten'
  | 'adolescent'
  | 'adultNeutered'
  | 'adultIntact'
  | 'senior';

export type BodyCondition = 'underweight' | 'ideal' | 'overweight';

// ============================================
// Food, Intake & Feeding Plan
// ============================================

export interface FoodInput {
  dryGrams: number;
  dryKcalPer1000g: number;
  wetGrams: number;
  wetKcalPer100g: number;
}

export interface IntakeResult {
  dryGrams: number;
  wetGrams: number;
  dryKcal: number;
  wetKcal: number;
  totalKcal: number;
  /** totalKcal - der; positive means over target */
  calorieDifference: number;
}

export type IntakeStatus = 'over' | 'under' | 'on';

export interface FeedingPlan {
  /** Share of daily calories from wet food, 0-100 */
  wetPercentage: number;
  requiredDryGrams: number;
  requiredWetGrams: number;
}

// ============================================
// Report
// ============================================

export interface ReportData {
  profile: CatProfile;
  energy: EnergyResult;
  intake: IntakeResult | null;
  plan: FeedingPlan | null;
  generatedAt: Date;
  /** IANA zone used for the printed timestamp and file name; host zone when omitted */
  timeZone?: string;
}

export interface ReportFile {
  fileName: string;
  mimeType: string;
  dataBase64: string;
}

// ============================================
// Constants
// ============================================

export const CAT_ENERGY_CONSTANTS = {
  // RER = RER_COEFFICIENT * weightKg ^ RER_EXPONENT
  RER_COEFFICIENT: 70,
  RER_EXPONENT: 0.75,

  // Age brackets (months)
  KITTEN_MAX_AGE_EXCLUSIVE: 4,
  ADOLESCENT_MAX_AGE: 12,
  SENIOR_MIN_AGE: 84,

  // BCS bands on the 9-point scale
  BCS_MIN: 1,
  BCS_MAX: 9,
  BCS_UNDERWEIGHT_BELOW: 4,
  BCS_OVERWEIGHT_ABOVE: 5,

  // Water recommendation is 1 ml per kcal of DER
  WATER_ML_PER_KCAL: 1,

  // Intake within +/- this many kcal of DER counts as on target
  INTAKE_TOLERANCE_KCAL: 5,
} as const;

import { isValidTimeZone } from '../date';
import type { CatProfile, EnergyResult, FeedingPlan, IntakeResult, ReportData } from '../types';

/**
 * Serializable form of ReportData that crosses the server action boundary.
 */
export interface ReportRequest {
  profile: CatProfile;
  energy: EnergyResult;
  intake: IntakeResult | null;
  plan: FeedingPlan | null;
  /** ISO 8601 */
  generatedAt: string;
  timeZone?: string;
}

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(record: UnknownRecord, key: string): number | null {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function readBoolean(record: UnknownRecord, key: string): boolean | null {
  const value = record[key];
  return typeof value === 'boolean' ? value : null;
}

function parseProfile(value: unknown): CatProfile | null {
  if (!isRecord(value)) return null;
  const weightKg = readNumber(value, 'weightKg');
  const ageMonths = readNumber(value, 'ageMonths');
  const bcs = readNumber(value, 'bcs');
  const neutered = readBoolean(value, 'neutered');
  const pregnant = readBoolean(value, 'pregnant');
  const lactating = readBoolean(value, 'lactating');
  if (
    weightKg === null ||
    ageMonths === null ||
    bcs === null ||
    neutered === null ||
    pregnant === null ||
    lactating === null
  ) {
    return null;
  }
  return { weightKg, ageMonths, neutered, bcs, pregnant, lactating };
}

function parseEnergy(value: unknown): EnergyResult | null {
  if (!isRecord(value)) return null;
  const rer = readNumber(value, 'rer');
  const multiplier = readNumber(value, 'multiplier');
  const der = readNumber(value, 'der');
  const waterIntakeMl = readNumber(value, 'waterIntakeMl');
  if (rer === null || multiplier === null || der === null || waterIntakeMl === null) {
    return null;
  }
  return { rer, multiplier, der, waterIntakeMl };
}

function parseIntake(value: unknown): IntakeResult | null {
  if (!isRecord(value)) return null;
  const dryGrams = readNumber(value, 'dryGrams');
  const wetGrams = readNumber(value, 'wetGrams');
  const dryKcal = readNumber(value, 'dryKcal');
  const wetKcal = readNumber(value, 'wetKcal');
  const totalKcal = readNumber(value, 'totalKcal');
  const calorieDifference = readNumber(value, 'calorieDifference');
  if (
    dryGrams === null ||
    wetGrams === null ||
    dryKcal === null ||
    wetKcal === null ||
    totalKcal === null ||
    calorieDifference === null
  ) {
    return null;
  }
  return { dryGrams, wetGrams, dryKcal, wetKcal, totalKcal, calorieDifference };
}

function parsePlan(value: unknown): FeedingPlan | null {
  if (!isRecord(value)) return null;
  const wetPercentage = readNumber(value, 'wetPercentage');
  const requiredDryGrams = readNumber(value, 'requiredDryGrams');
  const requiredWetGrams = readNumber(value, 'requiredWetGrams');
  if (wetPercentage === null || requiredDryGrams === null || requiredWetGrams === null) {
    return null;
  }
  return { wetPercentage, requiredDryGrams, requiredWetGrams };
}

/**
 * Validate an untrusted request. Returns null when any required part is
 * malformed; optional sections that are present must also be well formed.
 */
export function parseReportRequest(raw: unknown): ReportData | null {
  if (!isRecord(raw)) return null;

  const profile = parseProfile(raw.profile);
  const energy = parseEnergy(raw.energy);
  if (!profile || !energy) return null;

  const intake = raw.intake === null || raw.intake === undefined ? null : parseIntake(raw.intake);
  if (raw.intake !== null && raw.intake !== undefined && !intake) return null;

  const plan = raw.plan === null || raw.plan === undefined ? null : parsePlan(raw.plan);
  if (raw.plan !== null && raw.plan !== undefined && !plan) return null;

  if (typeof raw.generatedAt !== 'string') return null;
  const generatedAt = new Date(raw.generatedAt);
  if (Number.isNaN(generatedAt.getTime())) return null;

  let timeZone: string | undefined;
  if (raw.timeZone !== undefined) {
    if (typeof raw.timeZone !== 'string' || !isValidTimeZone(raw.timeZone)) return null;
    timeZone = raw.timeZone;
  }

  return { profile, energy, intake, plan, generatedAt, timeZone };
}

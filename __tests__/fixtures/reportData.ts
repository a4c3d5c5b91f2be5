import type { ReportData } from '@/lib/types';

export function makeReportData(overrides: Partial<ReportData> = {}): ReportData {
  return {
    profile: { weightKg: 4.5, ageMonths: 27, neutered: false, bcs: 6, pregnant: false, lactating: false },
    energy: { rer: 200, multiplier: 1.4, der: 280, waterIntakeMl: 280 },
    intake: { dryGrams: 50, wetGrams: 100, dryKcal: 175, wetKcal: 90, totalKcal: 265, calorieDifference: 15 },
    plan: { wetPercentage: 40, requiredDryGrams: 44.2105, requiredWetGrams: 123.456 },
    generatedAt: new Date('2026-03-05T01:02:03Z'),
    timeZone: 'UTC',
    ...overrides,
  };
}

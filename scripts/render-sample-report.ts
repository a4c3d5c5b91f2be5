#!/usr/bin/env npx tsx
/**
 * Sample Report Renderer
 *
 * Renders the diet report for a fixed example cat so the PNG layout can be
 * checked by eye without going through the web form.
 *
 * Usage: REPORT_FONT_PATH=./font.ttf npm run report:sample [-- out.png]
 */

import * as fs from 'fs';
import * as path from 'path';

import { computeEnergy } from '../src/lib/energyModel';
import { analyzeIntake } from '../src/lib/intakeAnalyzer';
import { planFeeding } from '../src/lib/feedingPlanner';
import { toActionError } from '../src/lib/errors';
import { createLogger } from '../src/lib/logger';
import { assertReportFontAvailable, buildReportFileName, getReportFontPath } from '../src/lib/report/reportAssets';
import { renderReportPng } from '../src/lib/report/renderReport';
import type { CatProfile, FoodInput, ReportData } from '../src/lib/types';

const log = createLogger('report:sample');

const SAMPLE_PROFILE: CatProfile = {
  weightKg: 4.5,
  ageMonths: 38,
  neutered: true,
  bcs: 6,
  pregnant: false,
  lactating: false,
};

const SAMPLE_FOOD: FoodInput = {
  dryGrams: 40,
  dryKcalPer1000g: 3800,
  wetGrams: 85,
  wetKcalPer100g: 95,
};

const SAMPLE_WET_PERCENTAGE = 60;

function main(): number {
  const fontPath = getReportFontPath();

  try {
    assertReportFontAvailable(fontPath);

    const energy = computeEnergy(SAMPLE_PROFILE);
    const data: ReportData = {
      profile: SAMPLE_PROFILE,
      energy,
      intake: analyzeIntake(energy.der, SAMPLE_FOOD),
      plan: planFeeding(energy.der, SAMPLE_WET_PERCENTAGE, SAMPLE_FOOD.dryKcalPer1000g, SAMPLE_FOOD.wetKcalPer100g),
      generatedAt: new Date(),
    };

    const outPath = path.resolve(process.argv[2] ?? buildReportFileName(data.generatedAt));
    fs.writeFileSync(outPath, renderReportPng(data, { fontPath }));
    log.info('Wrote sample report', { outPath, der: Number(energy.der.toFixed(2)) });
    return 0;
  } catch (error) {
    const actionError = toActionError(error);
    log.error(actionError.message, { code: actionError.code, details: actionError.details });
    return 1;
  }
}

process.exitCode = main();

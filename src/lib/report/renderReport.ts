import { createCanvas, GlobalFonts } from '@napi-rs/canvas';
import type { ReportData } from '../types';
import { missingFontError } from './reportAssets';
import {
  REPORT_CANVAS,
  REPORT_COLORS,
  REPORT_FONT_SIZES,
  layoutReport,
  type DrawCommand,
} from './reportLayout';
import { buildReportPage } from './reportSections';

export const REPORT_FONT_FAMILY = 'CatReport';

export interface RenderReportOptions {
  fontPath: string;
}

// Skia keeps every registered face for the life of the process
const registeredFonts = new Set<string>();

function ensureFontRegistered(fontPath: string): void {
  if (registeredFonts.has(fontPath)) return;
  if (!GlobalFonts.registerFromPath(fontPath, REPORT_FONT_FAMILY)) {
    throw missingFontError(fontPath);
  }
  registeredFonts.add(fontPath);
}

function fontFor(command: DrawCommand): string {
  return `${REPORT_FONT_SIZES[command.font]}px ${REPORT_FONT_FAMILY}`;
}

/**
 * Draw the report and encode it as PNG bytes.
 *
 * @throws AssetMissingError if the font cannot be loaded; nothing is drawn
 */
export function renderReportPng(data: ReportData, options: RenderReportOptions): Buffer {
  ensureFontRegistered(options.fontPath);

  const canvas = createCanvas(REPORT_CANVAS.width, REPORT_CANVAS.height);
  const ctx = canvas.getContext('2d');

  ctx.fillStyle = REPORT_COLORS.background;
  ctx.fillRect(0, 0, REPORT_CANVAS.width, REPORT_CANVAS.height);

  for (const command of layoutReport(buildReportPage(data))) {
    ctx.font = fontFor(command);
    ctx.fillStyle = REPORT_COLORS[command.color];
    ctx.textAlign = command.align;
    ctx.textBaseline = command.baseline;
    ctx.fillText(command.text, command.x, command.y);
  }

  return canvas.toBuffer('image/png');
}

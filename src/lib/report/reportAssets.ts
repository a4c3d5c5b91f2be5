import * as fs from 'fs';
import * as path from 'path';
import { AssetMissingError } from '../errors';
import { getDateStamp } from '../date';
import { createLogger } from '../logger';

const log = createLogger('reportAssets');

export const DEFAULT_REPORT_FONT_FILE = 'font.ttf';
export const REPORT_MIME_TYPE = 'image/png';

/**
 * Font used to draw the report. It must carry CJK glyphs.
 * REPORT_FONT_PATH wins; relative paths resolve against the working directory.
 */
export function getReportFontPath(env: { REPORT_FONT_PATH?: string; [key: string]: string | undefined } = process.env, cwd: string = process.cwd()): string {
  const configured = env.REPORT_FONT_PATH?.trim();
  return path.resolve(cwd, configured ? configured : DEFAULT_REPORT_FONT_FILE);
}

export function missingFontError(fontPath: string): AssetMissingError {
  return new AssetMissingError(
    fontPath,
    `找不到字體檔案 ${path.basename(fontPath)}！請將中文字體檔案放到 ${fontPath}，才能產生報告圖檔。`
  );
}

/**
 * Run before rendering so a missing font is reported instead of producing an image.
 *
 * @throws AssetMissingError
 */
export function assertReportFontAvailable(fontPath: string): void {
  if (!isReadableFile(fontPath)) {
    throw missingFontError(fontPath);
  }
}

// Any stat failure (ENOTDIR, EACCES, ...) means the font cannot be used
function isReadableFile(fontPath: string): boolean {
  try {
    return fs.statSync(fontPath, { throwIfNoEntry: false })?.isFile() ?? false;
  } catch (error) {
    log.warn('Font path could not be inspected', { fontPath }, error);
    return false;
  }
}

/** cat_diet_report_YYYYMMDD.png */
export function buildReportFileName(date: Date, timeZone?: string): string {
  return `cat_diet_report_${getDateStamp(date, timeZone)}.png`;
}

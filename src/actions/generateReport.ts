'use server';

import type { ActionResult, ReportFile } from '@/lib/types';
import { toActionError } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import {
  REPORT_MIME_TYPE,
  assertReportFontAvailable,
  buildReportFileName,
  getReportFontPath,
} from '@/lib/report/reportAssets';
import { renderReportPng } from '@/lib/report/renderReport';
import { parseReportRequest } from '@/lib/report/reportRequest';

const log = createLogger('generateReport');

const EMPTY_REPORT_FILE: ReportFile = { fileName: '', mimeType: REPORT_MIME_TYPE, dataBase64: '' };

/**
 * Render the diet report PNG for download.
 * The font is checked before anything is drawn; on any failure no image is returned.
 */
export async function generateReport(request: unknown): Promise<ActionResult<ReportFile>> {
  const data = parseReportRequest(request);
  if (!data) {
    log.warn('Rejected malformed report request');
    return {
      success: false,
      data: EMPTY_REPORT_FILE,
      error: { code: 'invalid_input', message: '報告資料不完整，請重新完成第一步的計算。' },
    };
  }

  const fontPath = getReportFontPath();

  try {
    assertReportFontAvailable(fontPath);
  } catch (error) {
    const actionError = toActionError(error);
    log.error('Report font unavailable', { fontPath, code: actionError.code });
    return { success: false, data: EMPTY_REPORT_FILE, error: actionError };
  }

  try {
    const png = renderReportPng(data, { fontPath });
    const fileName = buildReportFileName(data.generatedAt, data.timeZone);
    log.info('Report rendered', {
      fileName,
      bytes: png.length,
      hasIntake: data.intake !== null,
      hasPlan: data.plan !== null,
    });
    return {
      success: true,
      data: { fileName, mimeType: REPORT_MIME_TYPE, dataBase64: png.toString('base64') },
    };
  } catch (error) {
    log.error('Report rendering failed', error);
    const actionError = toActionError(error);
    return {
      success: false,
      data: EMPTY_REPORT_FILE,
      error:
        actionError.code === 'unknown_error'
          ? { ...actionError, code: 'render_failed', message: '報告圖檔產生失敗，請稍後再試。' }
          : actionError,
    };
  }
}

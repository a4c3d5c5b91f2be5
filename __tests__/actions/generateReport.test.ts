/**
 * @jest-environment node
 */
import * as path from 'path';
import { generateReport } from '@/actions/generateReport';
import { AssetMissingError } from '@/lib/errors';
import { renderReportPng } from '@/lib/report/renderReport';

jest.mock('@/lib/report/renderReport', () => ({
  renderReportPng: jest.fn(() => Buffer.from('png')),
}));

const validRequest = {
  profile: { weightKg: 4.5, ageMonths: 27, neutered: true, bcs: 5, pregnant: false, lactating: false },
  energy: { rer: 200, multiplier: 1.2, der: 240, waterIntakeMl: 240 },
  intake: null,
  plan: null,
  generatedAt: '2026-10-18T08:30:00.000Z',
  timeZone: 'Asia/Taipei',
};

describe('generateReport', () => {
  const previousFontPath = process.env.REPORT_FONT_PATH;

  beforeEach(() => {
    jest.mocked(renderReportPng).mockClear();
    // Any existing file satisfies the font check; rendering itself is mocked
    process.env.REPORT_FONT_PATH = __filename;
  });

  afterEach(() => {
    if (previousFontPath === undefined) {
      delete process.env.REPORT_FONT_PATH;
    } else {
      process.env.REPORT_FONT_PATH = previousFontPath;
    }
  });

  it('should return the PNG as base64 with a dated file name', async () => {
    const result = await generateReport(validRequest);

    expect(result).toEqual({
      success: true,
      data: { fileName: 'cat_diet_report_20261018.png', mimeType: 'image/png', dataBase64: 'cG5n' },
    });
    expect(renderReportPng).toHaveBeenCalledWith(
      expect.objectContaining({ generatedAt: new Date('2026-10-18T08:30:00.000Z'), intake: null }),
      { fontPath: __filename }
    );
  });

  it('should reject a malformed request without rendering', async () => {
    const result = await generateReport({ profile: validRequest.profile });

    expect(result.success).toBe(false);
    expect(result.error?.code).toBe('invalid_input');
    expect(result.data.dataBase64).toBe('');
    expect(renderReportPng).not.toHaveBeenCalled();
  });

  it('should report a missing font and produce no image', async () => {
    const missing = path.join(__dirname, 'missing-font.ttf');
    process.env.REPORT_FONT_PATH = missing;

    const result = await generateReport(validRequest);

    expect(result.success).toBe(false);
    expect(result.error).toEqual({
      code: 'asset_missing',
      message: `找不到字體檔案 missing-font.ttf！請將中文字體檔案放到 ${missing}，才能產生報告圖檔。`,
      details: `Report asset not found: ${missing}`,
    });
    expect(result.data.dataBase64).toBe('');
    expect(renderReportPng).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalled();
  });

  it('should pass through a font that fails to register', async () => {
    jest.mocked(renderReportPng).mockImplementationOnce(() => {
      throw new AssetMissingError(__filename, '字體無法載入');
    });

    const result = await generateReport(validRequest);

    expect(result.error?.code).toBe('asset_missing');
    expect(result.error?.message).toBe('字體無法載入');
  });

  it('should map unexpected render errors to render_failed', async () => {
    jest.mocked(renderReportPng).mockImplementationOnce(() => {
      throw new Error('skia exploded');
    });

    const result = await generateReport(validRequest);

    expect(result.success).toBe(false);
    expect(result.error).toEqual({
      code: 'render_failed',
      message: '報告圖檔產生失敗，請稍後再試。',
      details: 'skia exploded',
    });
  });
});

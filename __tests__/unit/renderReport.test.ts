/**
 * @jest-environment node
 */
import { GlobalFonts, createCanvas } from '@napi-rs/canvas';
import { AssetMissingError } from '@/lib/errors';
import { REPORT_FONT_FAMILY, renderReportPng } from '@/lib/report/renderReport';
import { layoutReport } from '@/lib/report/reportLayout';
import { buildReportPage } from '@/lib/report/reportSections';
import { makeReportData } from '../fixtures/reportData';

interface DrawnText {
  text: string;
  x: number;
  y: number;
  font: string;
  fillStyle: string;
  textAlign: string;
  textBaseline: string;
}

interface FakeContext {
  font: string;
  fillStyle: string;
  textAlign: string;
  textBaseline: string;
  fillRect: jest.Mock;
  fillText: jest.Mock;
}

jest.mock('@napi-rs/canvas', () => {
  const drawn: DrawnText[] = [];
  const context: FakeContext = {
    font: '',
    fillStyle: '',
    textAlign: 'start',
    textBaseline: 'alphabetic',
    fillRect: jest.fn(),
    fillText: jest.fn((text: string, x: number, y: number) => {
      drawn.push({
        text,
        x,
        y,
        font: context.font,
        fillStyle: context.fillStyle,
        textAlign: context.textAlign,
        textBaseline: context.textBaseline,
      });
    }),
  };
  const canvas = {
    getContext: jest.fn(() => context),
    toBuffer: jest.fn(() => Buffer.from('fake-png')),
  };
  return {
    __drawn: drawn,
    __context: context,
    __canvas: canvas,
    createCanvas: jest.fn(() => canvas),
    GlobalFonts: { registerFromPath: jest.fn(() => true) },
  };
});

const fake = jest.requireMock<{
  __drawn: DrawnText[];
  __context: FakeContext;
  __canvas: { toBuffer: jest.Mock };
}>('@napi-rs/canvas');

describe('renderReportPng', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    fake.__drawn.length = 0;
  });

  it('should draw every layout command on an 800x800 canvas', () => {
    const data = makeReportData();
    const png = renderReportPng(data, { fontPath: '/fonts/draw.ttf' });

    expect(createCanvas).toHaveBeenCalledWith(800, 800);
    expect(fake.__context.fillRect).toHaveBeenCalledWith(0, 0, 800, 800);
    expect(fake.__drawn.map(({ text, x, y }) => ({ text, x, y }))).toEqual(
      layoutReport(buildReportPage(data)).map(({ text, x, y }) => ({ text, x, y }))
    );
    expect(fake.__canvas.toBuffer).toHaveBeenCalledWith('image/png');
    expect(png.toString()).toBe('fake-png');
  });

  it('should style each text with its role', () => {
    renderReportPng(makeReportData(), { fontPath: '/fonts/style.ttf' });

    expect(fake.__drawn[0]).toEqual({
      text: '貓咪飲食報告',
      x: 400,
      y: 50,
      font: `48px ${REPORT_FONT_FAMILY}`,
      fillStyle: '#000000',
      textAlign: 'center',
      textBaseline: 'alphabetic',
    });
    expect(fake.__drawn[1]).toMatchObject({ font: '32px CatReport', fillStyle: '#4682B4', textBaseline: 'top' });
    expect(fake.__drawn[2]).toMatchObject({ font: '24px CatReport', fillStyle: '#282828', textAlign: 'left' });
    expect(fake.__drawn[fake.__drawn.length - 1]).toMatchObject({
      font: '16px CatReport',
      textAlign: 'right',
    });
  });

  it('should register a font path only once', () => {
    renderReportPng(makeReportData(), { fontPath: '/fonts/once.ttf' });
    renderReportPng(makeReportData(), { fontPath: '/fonts/once.ttf' });

    expect(GlobalFonts.registerFromPath).toHaveBeenCalledTimes(1);
    expect(GlobalFonts.registerFromPath).toHaveBeenCalledWith('/fonts/once.ttf', REPORT_FONT_FAMILY);
  });

  it('should not draw anything when the font cannot be loaded', () => {
    jest.mocked(GlobalFonts.registerFromPath).mockReturnValueOnce(false);

    expect(() => renderReportPng(makeReportData(), { fontPath: '/fonts/broken.ttf' })).toThrow(AssetMissingError);
    expect(createCanvas).not.toHaveBeenCalled();
    expect(fake.__drawn).toEqual([]);
  });
});

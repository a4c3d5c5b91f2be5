import { render, screen } from '@testing-library/react';
import userEvent from '@testing-library/user-event';
import { ReportStep } from '@/components/steps/ReportStep';
import { createDietSession, type DietSession } from '@/lib/session/dietSession';
import type { ActionResult, ReportFile } from '@/lib/types';

const computedSession: DietSession = {
  profile: { weightKg: 4.5, ageMonths: 27, neutered: true, bcs: 6, pregnant: false, lactating: false },
  energy: { rer: 200, multiplier: 1.2, der: 250, waterIntakeMl: 250 },
  food: { dryGrams: 50, dryKcalPer1000g: 3500, wetGrams: 100, wetKcalPer100g: 90 },
  intake: { dryGrams: 50, wetGrams: 100, dryKcal: 175, wetKcal: 90, totalKcal: 265, calorieDifference: 15 },
  plan: null,
};

const reportFile: ReportFile = {
  fileName: 'cat_diet_report_20261018.png',
  mimeType: 'image/png',
  dataBase64: 'cG5n',
};

function resolved(result: ActionResult<ReportFile>): () => Promise<ActionResult<ReportFile>> {
  return jest.fn(() => Promise.resolve(result));
}

describe('ReportStep', () => {
  it('asks for the energy step first', () => {
    render(<ReportStep session={createDietSession()} onGenerateReport={jest.fn()} />);

    expect(screen.getByRole('status')).toHaveTextContent('請先從「第一步」開始，完成貓咪的熱量計算，才能產生報告。');
    expect(screen.queryByRole('button')).not.toBeInTheDocument();
  });

  it('renders only the sections that were computed', () => {
    render(<ReportStep session={computedSession} onGenerateReport={jest.fn()} />);

    expect(screen.getByText('4.50 公斤')).toBeInTheDocument();
    expect(screen.getByText('2 歲 3 個月')).toBeInTheDocument();
    expect(screen.getByText('6 / 9')).toBeInTheDocument();
    expect(screen.getByText('+15.00 大卡')).toBeInTheDocument();
    expect(screen.queryByText('🥗 建議餵食計畫')).not.toBeInTheDocument();
  });

  it('offers the generated file for download', async () => {
    const onGenerateReport = resolved({ success: true, data: reportFile });
    render(<ReportStep session={computedSession} onGenerateReport={onGenerateReport} />);

    await userEvent.setup().click(screen.getByRole('button', { name: /產生報告圖檔/ }));
    const link = await screen.findByRole('link', { name: /下載貓咪飲食報告圖檔/ });

    expect(onGenerateReport).toHaveBeenCalledTimes(1);
    expect(link).toHaveAttribute('href', 'data:image/png;base64,cG5n');
    expect(link).toHaveAttribute('download', 'cat_diet_report_20261018.png');
  });

  it('drops the download link once the session changes', async () => {
    const onGenerateReport = resolved({ success: true, data: reportFile });
    const { rerender } = render(<ReportStep session={computedSession} onGenerateReport={onGenerateReport} />);

    await userEvent.setup().click(screen.getByRole('button', { name: /產生報告圖檔/ }));
    await screen.findByRole('link');
    rerender(<ReportStep session={{ ...computedSession, intake: null }} onGenerateReport={onGenerateReport} />);

    expect(screen.queryByRole('link')).not.toBeInTheDocument();
  });

  it('shows the action error instead of a download', async () => {
    const message = '找不到字體檔案 font.ttf！請將中文字體檔案放到 /srv/font.ttf，才能產生報告圖檔。';
    const onGenerateReport = resolved({
      success: false,
      data: { fileName: '', mimeType: 'image/png', dataBase64: '' },
      error: { code: 'asset_missing', message },
    });
    render(<ReportStep session={computedSession} onGenerateReport={onGenerateReport} />);

    await userEvent.setup().click(screen.getByRole('button', { name: /產生報告圖檔/ }));
    const alert = await screen.findByRole('alert');

    expect(alert).toHaveTextContent('⚠️ 無法產生報告');
    expect(alert).toHaveTextContent(message);
    expect(screen.queryByRole('link')).not.toBeInTheDocument();
  });

  it('logs a rejected request and shows a generic error', async () => {
    const onGenerateReport = jest.fn(() => Promise.reject(new Error('network down')));
    render(<ReportStep session={computedSession} onGenerateReport={onGenerateReport} />);

    await userEvent.setup().click(screen.getByRole('button', { name: /產生報告圖檔/ }));

    expect(await screen.findByRole('alert')).toHaveTextContent('報告圖檔產生失敗，請稍後再試。');
    expect(console.error).toHaveBeenCalledWith('[ReportStep] Report generation failed', expect.stringContaining('network down'));
  });
});

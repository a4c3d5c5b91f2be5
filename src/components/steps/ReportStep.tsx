'use client';

import { useCallback, useState } from 'react';
import type { ActionError, ActionResult, ReportFile } from '@/lib/types';
import { formatFixed, formatNeutered, formatSigned, splitAgeMonths } from '@/lib/format';
import { logError } from '@/lib/logger';
import type { DietSession } from '@/lib/session/dietSession';
import { MetricTile } from '@/components/ui/MetricTile';
import { NoticeBanner } from '@/components/ui/NoticeBanner';

interface ReportStepProps {
  session: DietSession;
  onGenerateReport: () => Promise<ActionResult<ReportFile>>;
}

interface GeneratedReport {
  /** Session the file was rendered from; a newer session makes it stale */
  source: DietSession;
  file: ReportFile;
}

export function ReportStep({ session, onGenerateReport }: ReportStepProps) {
  const [generated, setGenerated] = useState<GeneratedReport | null>(null);
  const [error, setError] = useState<ActionError | null>(null);
  const [isGenerating, setIsGenerating] = useState(false);

  const handleGenerate = useCallback(async () => {
    setIsGenerating(true);
    setError(null);
    try {
      const result = await onGenerateReport();
      if (result.success) {
        setGenerated({ source: session, file: result.data });
      } else {
        setGenerated(null);
        setError(result.error ?? { code: 'unknown_error', message: '報告圖檔產生失敗，請稍後再試。' });
      }
    } catch (caught) {
      logError('[ReportStep] Report generation failed', caught);
      setGenerated(null);
      setError({ code: 'unknown_error', message: '報告圖檔產生失敗，請稍後再試。' });
    } finally {
      setIsGenerating(false);
    }
  }, [onGenerateReport, session]);

  const { profile, energy, intake, plan } = session;

  if (!profile || !energy) {
    return (
      <section className="flex flex-col gap-6">
        <h2 className="text-section-title">📄 貓咪飲食報告總覽</h2>
        <NoticeBanner message="請先從「第一步」開始，完成貓咪的熱量計算，才能產生報告。" />
      </section>
    );
  }

  const age = splitAgeMonths(profile.ageMonths);
  const file = generated && generated.source === session ? generated.file : null;

  return (
    <section className="flex flex-col gap-6">
      <h2 className="text-section-title">📄 貓咪飲食報告總覽</h2>

      <div className="flex flex-col gap-3">
        <h3 className="text-section-title">🐾 貓咪基本資料</h3>
        <div className="grid grid-cols-2 gap-3">
          <MetricTile label="體重" value={`${formatFixed(profile.weightKg, 2)} 公斤`} />
          <MetricTile label="年齡" value={`${age.years} 歲 ${age.months} 個月`} />
          <MetricTile label="BCS" value={`${profile.bcs} / 9`} />
          <MetricTile label="絕育狀態" value={formatNeutered(profile.neutered)} />
        </div>
      </div>

      <div className="flex flex-col gap-3">
        <h3 className="text-section-title">📈 每日建議攝取</h3>
        <div className="grid grid-cols-2 gap-3">
          <MetricTile label="建議熱量 (DER)" value={`${formatFixed(energy.der, 2)} 大卡/天`} />
          <MetricTile label="建議飲水" value={`${formatFixed(energy.waterIntakeMl, 0)} 毫升/天`} />
        </div>
      </div>

      {intake && (
        <div className="flex flex-col gap-3">
          <h3 className="text-section-title">📊 目前飲食分析</h3>
          <div className="grid grid-cols-2 gap-3">
            <MetricTile label="每日總攝取熱量" value={`${formatFixed(intake.totalKcal, 2)} 大卡`} />
            <MetricTile label="與建議量差異" value={`${formatSigned(intake.calorieDifference, 2)} 大卡`} />
          </div>
        </div>
      )}

      {plan && (
        <div className="flex flex-col gap-3">
          <h3 className="text-section-title">🥗 建議餵食計畫</h3>
          <p className="text-body">
            基於 {100 - plan.wetPercentage}% 乾食 與 {plan.wetPercentage}% 濕食 的熱量佔比
          </p>
          <div className="grid grid-cols-2 gap-3">
            <MetricTile label="建議乾食餵食量" value={`${formatFixed(plan.requiredDryGrams, 1)} 公克/天`} />
            <MetricTile label="建議濕食餵食量" value={`${formatFixed(plan.requiredWetGrams, 1)} 公克/天`} />
          </div>
        </div>
      )}

      <div className="flex flex-col gap-3">
        <h3 className="text-section-title">📥 下載報告</h3>
        <button type="button" className="btn-secondary" onClick={() => void handleGenerate()} disabled={isGenerating}>
          {isGenerating ? '報告產生中…' : '🖼️ 產生報告圖檔'}
        </button>
        {error && <NoticeBanner tone="error" title="⚠️ 無法產生報告" message={error.message} />}
        {file && (
          <a
            className="btn-primary text-center"
            href={`data:${file.mimeType};base64,${file.dataBase64}`}
            download={file.fileName}
          >
            📥 下載貓咪飲食報告圖檔
          </a>
        )}
      </div>
    </section>
  );
}

'use client';

import type { FormEvent } from 'react';
import type { ActionError, IntakeResult } from '@/lib/types';
import { INTAKE_STATUS_LABELS, classifyIntake } from '@/lib/intakeAnalyzer';
import { formatFixed } from '@/lib/format';
import type { FoodDraft } from '@/lib/session/foodDraft';
import { MetricTile } from '@/components/ui/MetricTile';
import { NoticeBanner } from '@/components/ui/NoticeBanner';
import { NumberField } from '@/components/ui/NumberField';

interface IntakeStepProps {
  draft: FoodDraft;
  onDraftChange: (draft: FoodDraft) => void;
  der: number | null;
  intake: IntakeResult | null;
  error?: ActionError;
  onAnalyze: () => void;
}

function IntakeVerdict({ difference }: { difference: number }) {
  const status = classifyIntake(difference);

  if (status === 'over') {
    return (
      <NoticeBanner
        tone="warning"
        title={INTAKE_STATUS_LABELS.over}
        message={`比建議值多了 ${formatFixed(difference, 2)} 大卡。長期熱量超標可能導致肥胖及相關健康問題，請考慮與獸醫師討論並調整餵食量。`}
      />
    );
  }
  if (status === 'under') {
    return (
      <NoticeBanner
        tone="warning"
        title={INTAKE_STATUS_LABELS.under}
        message={`比建議值少了 ${formatFixed(-difference, 2)} 大卡。長期熱量不足可能影響貓咪健康與活力，請確認是否需要增加餵食量或更換更高熱量的食物。`}
      />
    );
  }
  return (
    <NoticeBanner
      tone="success"
      title={`🎉 ${INTAKE_STATUS_LABELS.on}！`}
      message="貓咪的熱量攝取與建議值非常接近！"
    />
  );
}

export function IntakeStep({ draft, onDraftChange, der, intake, error, onAnalyze }: IntakeStepProps) {
  const update = (field: keyof FoodDraft) => (value: string) => onDraftChange({ ...draft, [field]: value });

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    onAnalyze();
  };

  return (
    <section className="flex flex-col gap-6">
      <div>
        <h2 className="text-section-title">輸入目前每日餵食資訊</h2>
        <p className="text-caption text-text-muted mt-1">
          請輸入貓咪目前正在吃的食物資訊，以計算每日總攝取熱量。
        </p>
      </div>

      <form onSubmit={handleSubmit} className="flex flex-col gap-6">
        <fieldset className="grid grid-cols-2 gap-3">
          <legend className="field-label mb-2">乾食 (乾乾)</legend>
          <NumberField label="乾食每日總餵食量 (公克)" value={draft.dryGrams} onChange={update('dryGrams')} min={0} step={1} />
          <NumberField
            label="乾食每 1000 公克的熱量 (大卡)"
            value={draft.dryKcalPer1000g}
            onChange={update('dryKcalPer1000g')}
            min={0}
            step={10}
          />
        </fieldset>
        <fieldset className="grid grid-cols-2 gap-3">
          <legend className="field-label mb-2">濕食 (主食罐/副食罐)</legend>
          <NumberField label="濕食每日總餵食量 (公克)" value={draft.wetGrams} onChange={update('wetGrams')} min={0} step={1} />
          <NumberField
            label="濕食每 100 公克的熱量 (大卡)"
            value={draft.wetKcalPer100g}
            onChange={update('wetKcalPer100g')}
            min={0}
            step={1}
          />
        </fieldset>
        <button type="submit" className="btn-primary">
          ✅ 計算實際攝取並比較
        </button>
      </form>

      {error && <NoticeBanner tone="error" title="無法分析" message={error.message} />}

      {intake && der !== null && (
        <div className="flex flex-col gap-4">
          <h3 className="text-section-title">📊 熱量攝取分析</h3>
          <div className="grid grid-cols-2 gap-3">
            <MetricTile label="從乾乾攝取的熱量" value={`${formatFixed(intake.dryKcal, 2)} 大卡`} />
            <MetricTile label="從濕食攝取的熱量" value={`${formatFixed(intake.wetKcal, 2)} 大卡`} />
            <MetricTile label="每日建議攝取 (DER)" value={`${formatFixed(der, 2)} 大卡`} />
            <MetricTile label="每日實際攝取" value={`${formatFixed(intake.totalKcal, 2)} 大卡`} />
          </div>
          <IntakeVerdict difference={intake.calorieDifference} />
        </div>
      )}
    </section>
  );
}

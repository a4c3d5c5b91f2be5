'use client';

import { useState } from 'react';
import type { ActionError, FeedingPlan } from '@/lib/types';
import { hasAnyFoodDensity } from '@/lib/feedingPlanner';
import { formatFixed } from '@/lib/format';
import type { FoodDensities } from '@/lib/session/dietSession';
import { MetricTile } from '@/components/ui/MetricTile';
import { NoticeBanner } from '@/components/ui/NoticeBanner';

interface FeedingPlanStepProps {
  der: number | null;
  densities: FoodDensities;
  plan: FeedingPlan | null;
  error?: ActionError;
  onGenerate: (wetPercentage: number) => void;
}

const DEFAULT_WET_PERCENTAGE = 50;

export function FeedingPlanStep({ der, densities, plan, error, onGenerate }: FeedingPlanStepProps) {
  const [wetPercentage, setWetPercentage] = useState(DEFAULT_WET_PERCENTAGE);

  return (
    <section className="flex flex-col gap-6">
      <h2 className="text-section-title">規劃理想的乾濕食餵食量</h2>
      <NoticeBanner message="此功能會根據第一步計算出的「每日建議熱量 (DER)」來產生新的飲食計畫。" />

      {der === null ? (
        <NoticeBanner tone="warning" message="請先在第一步計算貓咪的每日建議熱量 (DER)。" />
      ) : !hasAnyFoodDensity(densities.dryKcalPer1000g, densities.wetKcalPer100g) ? (
        <NoticeBanner tone="warning" message="請在第二步輸入至少一種食物的熱量資訊，才能進行餵食量建議。" />
      ) : (
        <div className="flex flex-col gap-4">
          <label className="flex flex-col gap-1">
            <span className="field-label">
              希望「濕食」提供的熱量佔每日總熱量的百分比 (%)：{wetPercentage}
            </span>
            <input
              type="range"
              min={0}
              max={100}
              step={5}
              value={wetPercentage}
              onChange={(event) => setWetPercentage(Number(event.target.value))}
            />
          </label>
          <button type="button" className="btn-primary" onClick={() => onGenerate(wetPercentage)}>
            ⚖️ 產生建議餵食量
          </button>
        </div>
      )}

      {error && <NoticeBanner tone="error" title="無法產生計畫" message={error.message} />}

      {plan && der !== null && (
        <div className="flex flex-col gap-4">
          <h3 className="text-section-title">🍽️ 每日建議餵食量</h3>
          <p className="text-body">為了達到每日 {formatFixed(der, 2)} 大卡 的目標：</p>
          <div className="grid grid-cols-2 gap-3">
            <MetricTile label="乾食 (乾乾)" value={`${formatFixed(plan.requiredDryGrams, 1)} 公克`} />
            <MetricTile label="濕食 (主食罐)" value={`${formatFixed(plan.requiredWetGrams, 1)} 公克`} />
          </div>
          <p className="text-caption text-text-muted">
            此建議是基於 {100 - plan.wetPercentage}% 乾食與 {plan.wetPercentage}% 濕食的熱量佔比所計算。請在 1-2
            週內密切觀察貓咪的體重和身體狀況，並與您的獸醫師討論，視情況微調餵食量。
          </p>
        </div>
      )}
    </section>
  );
}

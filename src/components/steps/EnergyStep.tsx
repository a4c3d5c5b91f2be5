'use client';

import { useState, type FormEvent } from 'react';
import type { ActionError, CatProfile, CatProfileFormInput, EnergyResult } from '@/lib/types';
import { LIFE_STAGE_LABELS, classifyLifeStage } from '@/lib/lifeStage';
import { formatFixed } from '@/lib/format';
import { parseNumberField } from '@/lib/session/foodDraft';
import { MetricTile } from '@/components/ui/MetricTile';
import { NoticeBanner } from '@/components/ui/NoticeBanner';
import { NumberField } from '@/components/ui/NumberField';

interface EnergyStepProps {
  profile: CatProfile | null;
  energy: EnergyResult | null;
  error?: ActionError;
  onSubmit: (input: CatProfileFormInput) => void;
}

const BCS_GUIDE = [
  '1-3 分 (過瘦)：肋骨、脊椎易見且突出。',
  '4-5 分 (理想)：肋骨可觸及，腰身明顯。',
  '6-7 分 (過重)：肋骨不易觸及，腰身不明顯。',
  '8-9 分 (肥胖)：肋骨難以觸及，腹部明顯下垂。',
];

export function EnergyStep({ profile, energy, error, onSubmit }: EnergyStepProps) {
  const [weight, setWeight] = useState('4.0');
  const [ageYears, setAgeYears] = useState('2');
  const [ageMonthsPart, setAgeMonthsPart] = useState('0');
  const [neutered, setNeutered] = useState(true);
  const [bcs, setBcs] = useState(5);
  const [pregnant, setPregnant] = useState(false);
  const [lactating, setLactating] = useState(false);

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    onSubmit({
      weightKg: parseNumberField(weight),
      ageYears: parseNumberField(ageYears),
      ageMonthsPart: parseNumberField(ageMonthsPart),
      neutered,
      bcs,
      pregnant,
      lactating,
    });
  };

  return (
    <section className="flex flex-col gap-6">
      <h2 className="text-section-title">輸入貓咪基本資料</h2>

      <form onSubmit={handleSubmit} className="grid gap-6 sm:grid-cols-2">
        <div className="flex flex-col gap-4">
          <NumberField label="體重 (公斤)" value={weight} onChange={setWeight} min={0.1} max={20} step={0.1} />
          <div className="grid grid-cols-2 gap-3">
            <NumberField label="年齡 (歲)" value={ageYears} onChange={setAgeYears} min={0} max={25} step={1} />
            <NumberField label="年齡 (個月)" value={ageMonthsPart} onChange={setAgeMonthsPart} min={0} max={11} step={1} />
          </div>
          <fieldset className="flex flex-col gap-1">
            <legend className="field-label">是否已絕育？</legend>
            <label className="inline-flex items-center gap-2">
              <input type="radio" name="neutered" checked={neutered} onChange={() => setNeutered(true)} />
              是
            </label>
            <label className="inline-flex items-center gap-2">
              <input type="radio" name="neutered" checked={!neutered} onChange={() => setNeutered(false)} />
              否
            </label>
          </fieldset>
        </div>

        <div className="flex flex-col gap-4">
          <label className="flex flex-col gap-1">
            <span className="field-label">身體狀況評分 BCS (1:過瘦, 5:理想, 9:過胖)：{bcs}</span>
            <input
              type="range"
              min={1}
              max={9}
              step={1}
              value={bcs}
              onChange={(event) => setBcs(Number(event.target.value))}
            />
          </label>
          <ul className="text-caption text-text-muted list-disc pl-5">
            {BCS_GUIDE.map((line) => (
              <li key={line}>{line}</li>
            ))}
          </ul>
          <label className="inline-flex items-center gap-2">
            <input type="checkbox" checked={pregnant} onChange={(event) => setPregnant(event.target.checked)} />
            母貓是否懷孕？
          </label>
          <label className="inline-flex items-center gap-2">
            <input type="checkbox" checked={lactating} onChange={(event) => setLactating(event.target.checked)} />
            母貓是否哺乳中？
          </label>
        </div>

        <button type="submit" className="btn-primary sm:col-span-2">
          ✅ 計算貓咪每日所需熱量
        </button>
      </form>

      {error && <NoticeBanner tone="error" title="無法計算" message={error.message} />}

      {profile && energy && (
        <div className="flex flex-col gap-4">
          <h3 className="text-section-title">📈 計算結果</h3>
          <div className="grid grid-cols-2 gap-3">
            <MetricTile label="靜息能量需求 (RER)" value={`${formatFixed(energy.rer, 2)} 大卡/天`} />
            <MetricTile
              label="活動係數"
              value={formatFixed(energy.multiplier, 1)}
              hint={LIFE_STAGE_LABELS[classifyLifeStage(profile)]}
            />
            <MetricTile label="每日建議熱量 (DER)" value={`${formatFixed(energy.der, 2)} 大卡/天`} />
            <MetricTile
              label="💧 建議總飲水量"
              value={`${formatFixed(energy.waterIntakeMl, 0)} 毫升/天`}
              hint="包含從食物 (尤其是濕食) 和直接飲水中獲得的所有水分。"
            />
          </div>
          <NoticeBanner message="DER 是根據貓咪的詳細身體狀況估算的每日建議攝取熱量。" />
        </div>
      )}
    </section>
  );
}

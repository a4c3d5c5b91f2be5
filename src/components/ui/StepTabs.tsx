'use client';

import { memo } from 'react';

export type StepId = 'energy' | 'intake' | 'plan' | 'report';

export interface StepTab {
  id: StepId;
  icon: string;
  label: string;
}

export const STEP_TABS: readonly StepTab[] = [
  { id: 'energy', icon: '🐾', label: '第一步：計算建議熱量' },
  { id: 'intake', icon: '📊', label: '第二步：分析目前飲食' },
  { id: 'plan', icon: '🥗', label: '第三步：規劃飲食建議' },
  { id: 'report', icon: '📄', label: '第四步：飲食報告總覽' },
];

interface StepTabsProps {
  activeStep: StepId;
  onSelect: (step: StepId) => void;
}

export const StepTabs = memo(function StepTabs({ activeStep, onSelect }: StepTabsProps) {
  return (
    <nav className="step-tabs" role="tablist" aria-label="計算步驟">
      {STEP_TABS.map((tab) => {
        const isActive = tab.id === activeStep;
        return (
          <button
            key={tab.id}
            type="button"
            role="tab"
            id={`step-tab-${tab.id}`}
            aria-selected={isActive}
            aria-controls={`step-panel-${tab.id}`}
            className={`step-tab ${isActive ? 'active' : ''}`}
            onClick={() => onSelect(tab.id)}
          >
            <span aria-hidden="true">{tab.icon}</span>
            <span>{tab.label}</span>
          </button>
        );
      })}
    </nav>
  );
});

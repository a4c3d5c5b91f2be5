'use client';

import { useCallback, useState } from 'react';
import type { ActionError, ActionResult, CatProfileFormInput, ReportFile } from '@/lib/types';
import { generateReport } from '@/actions/generateReport';
import { createLogger } from '@/lib/logger';
import {
  createDietSession,
  submitFeedingPlan,
  submitIntake,
  submitProfile,
  toReportRequest,
  type DietSession,
} from '@/lib/session/dietSession';
import {
  EMPTY_FOOD_DRAFT,
  parseFoodDensities,
  parseFoodDraft,
  type FoodDraft,
} from '@/lib/session/foodDraft';
import { StepTabs, type StepId } from '@/components/ui/StepTabs';
import { EnergyStep } from '@/components/steps/EnergyStep';
import { IntakeStep } from '@/components/steps/IntakeStep';
import { FeedingPlanStep } from '@/components/steps/FeedingPlanStep';
import { ReportStep } from '@/components/steps/ReportStep';

const log = createLogger('HomePage');

type StepErrors = Partial<Record<Exclude<StepId, 'report'>, ActionError>>;

export default function HomePage() {
  const [session, setSession] = useState<DietSession>(createDietSession);
  const [activeStep, setActiveStep] = useState<StepId>('energy');
  const [foodDraft, setFoodDraft] = useState<FoodDraft>(EMPTY_FOOD_DRAFT);
  const [errors, setErrors] = useState<StepErrors>({});

  const applyStep = useCallback(
    (step: keyof StepErrors, result: ActionResult<DietSession>) => {
      if (result.success) {
        setSession(result.data);
        setErrors((prev) => ({ ...prev, [step]: undefined }));
        return;
      }
      log.warn('Step rejected', { step, code: result.error?.code, details: result.error?.details });
      setErrors((prev) => ({ ...prev, [step]: result.error }));
    },
    []
  );

  const handleProfileSubmit = useCallback(
    (input: CatProfileFormInput) => {
      const result = submitProfile(session, input);
      applyStep('energy', result);
      // Results from the previous DER are gone; clear their stale errors too
      if (result.success) {
        setErrors({});
      }
    },
    [session, applyStep]
  );

  const handleAnalyze = useCallback(() => {
    applyStep('intake', submitIntake(session, parseFoodDraft(foodDraft)));
  }, [session, foodDraft, applyStep]);

  const handleGeneratePlan = useCallback(
    (wetPercentage: number) => {
      applyStep('plan', submitFeedingPlan(session, wetPercentage, parseFoodDensities(foodDraft)));
    },
    [session, foodDraft, applyStep]
  );

  const handleGenerateReport = useCallback(async (): Promise<ActionResult<ReportFile>> => {
    const request = toReportRequest(session, new Date(), Intl.DateTimeFormat().resolvedOptions().timeZone);
    if (!request) {
      return {
        success: false,
        data: { fileName: '', mimeType: 'image/png', dataBase64: '' },
        error: { code: 'precondition_failed', message: '請先從「第一步」開始，完成貓咪的熱量計算，才能產生報告。' },
      };
    }
    return generateReport(request);
  }, [session]);

  return (
    <div className="page-container">
      <header className="content-wrapper pt-8">
        <h1 className="text-page-title">🐈 貓咪熱量計算機</h1>
      </header>

      <main className="content-wrapper flex flex-col gap-6 pb-12">
        <StepTabs activeStep={activeStep} onSelect={setActiveStep} />

        <div className="card" role="tabpanel" id={`step-panel-${activeStep}`} aria-labelledby={`step-tab-${activeStep}`}>
          {activeStep === 'energy' && (
            <EnergyStep
              profile={session.profile}
              energy={session.energy}
              error={errors.energy}
              onSubmit={handleProfileSubmit}
            />
          )}
          {activeStep === 'intake' && (
            <IntakeStep
              draft={foodDraft}
              onDraftChange={setFoodDraft}
              der={session.energy?.der ?? null}
              intake={session.intake}
              error={errors.intake}
              onAnalyze={handleAnalyze}
            />
          )}
          {activeStep === 'plan' && (
            <FeedingPlanStep
              der={session.energy?.der ?? null}
              densities={parseFoodDensities(foodDraft)}
              plan={session.plan}
              error={errors.plan}
              onGenerate={handleGeneratePlan}
            />
          )}
          {activeStep === 'report' && (
            <ReportStep session={session} onGenerateReport={handleGenerateReport} />
          )}
        </div>
      </main>
    </div>
  );
}

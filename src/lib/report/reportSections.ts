import { formatReportTimestamp } from '../date';
import { formatFixed, formatNeutered, formatSigned, splitAgeMonths } from '../format';
import type { ReportData } from '../types';
import type { ReportPage, ReportSection } from './reportLayout';

export const REPORT_TITLE = '貓咪飲食報告';
export const REPORT_FOOTER_CAPTION = '貓咪熱量計算機 (僅供參考)';

const LEFT_COLUMN_X = 80;
const RIGHT_COLUMN_X = 400;

// Vertical advances, in px
const FIRST_LINE_ADVANCE = 50;
const LINE_ADVANCE = 40;
const CAPTION_ADVANCE = 40;
const AFTER_CAPTION_ADVANCE = 30;

export function buildReportSections(data: ReportData): ReportSection[] {
  const { profile, energy, intake, plan } = data;
  const age = splitAgeMonths(profile.ageMonths);

  return [
    {
      id: 'profile',
      title: '貓咪基本資料',
      visible: true,
      lines: [
        {
          advance: FIRST_LINE_ADVANCE,
          cells: [
            { x: LEFT_COLUMN_X, text: `體重: ${formatFixed(profile.weightKg, 2)} 公斤` },
            { x: RIGHT_COLUMN_X, text: `年齡: ${age.years} 歲 ${age.months} 個月` },
          ],
        },
        {
          advance: LINE_ADVANCE,
          cells: [
            { x: LEFT_COLUMN_X, text: `BCS: ${profile.bcs} / 9` },
            { x: RIGHT_COLUMN_X, text: `絕育狀態: ${formatNeutered(profile.neutered)}` },
          ],
        },
      ],
    },
    {
      id: 'energy',
      title: '每日建議攝取',
      visible: true,
      lines: [
        {
          advance: FIRST_LINE_ADVANCE,
          cells: [{ x: LEFT_COLUMN_X, text: `建議熱量 (DER): ${formatFixed(energy.der, 2)} 大卡/天` }],
        },
        {
          advance: LINE_ADVANCE,
          cells: [{ x: LEFT_COLUMN_X, text: `建議飲水: ${formatFixed(energy.waterIntakeMl, 0)} 毫升/天` }],
        },
      ],
    },
    {
      id: 'intake',
      title: '目前飲食分析',
      visible: intake !== null,
      lines: intake
        ? [
            {
              advance: FIRST_LINE_ADVANCE,
              cells: [{ x: LEFT_COLUMN_X, text: `每日總攝取熱量: ${formatFixed(intake.totalKcal, 2)} 大卡` }],
            },
            {
              advance: LINE_ADVANCE,
              cells: [
                { x: LEFT_COLUMN_X, text: `與建議量差異: ${formatSigned(intake.calorieDifference, 2)} 大卡` },
              ],
            },
          ]
        : [],
    },
    {
      id: 'plan',
      title: '建議餵食計畫',
      visible: plan !== null,
      lines: plan
        ? [
            {
              advance: CAPTION_ADVANCE,
              cells: [
                {
                  x: LEFT_COLUMN_X,
                  text: `(${100 - plan.wetPercentage}% 乾食 / ${plan.wetPercentage}% 濕食 熱量佔比)`,
                  font: 'caption',
                },
              ],
            },
            {
              advance: AFTER_CAPTION_ADVANCE,
              cells: [{ x: LEFT_COLUMN_X, text: `乾食: ${formatFixed(plan.requiredDryGrams, 1)} 公克/天` }],
            },
            {
              advance: LINE_ADVANCE,
              cells: [{ x: LEFT_COLUMN_X, text: `濕食: ${formatFixed(plan.requiredWetGrams, 1)} 公克/天` }],
            },
          ]
        : [],
    },
  ];
}

export function buildReportPage(data: ReportData): ReportPage {
  return {
    title: REPORT_TITLE,
    sections: buildReportSections(data),
    footer: {
      left: `報告生成時間: ${formatReportTimestamp(data.generatedAt, data.timeZone)}`,
      right: REPORT_FOOTER_CAPTION,
    },
  };
}

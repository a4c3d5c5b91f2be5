import { REPORT_FOOTER_CAPTION, REPORT_TITLE, buildReportPage, buildReportSections } from '@/lib/report/reportSections';
import { makeReportData } from '../fixtures/reportData';

function texts(sectionId: string, data = makeReportData()): string[] {
  const section = buildReportSections(data).find((candidate) => candidate.id === sectionId);
  return section ? section.lines.flatMap((line) => line.cells.map((cell) => cell.text)) : [];
}

describe('buildReportSections', () => {
  it('should order sections profile, energy, intake, plan', () => {
    expect(buildReportSections(makeReportData()).map((section) => section.title)).toEqual([
      '貓咪基本資料',
      '每日建議攝取',
      '目前飲食分析',
      '建議餵食計畫',
    ]);
  });

  it('should describe the cat profile in two columns', () => {
    expect(texts('profile')).toEqual(['體重: 4.50 公斤', '年齡: 2 歲 3 個月', 'BCS: 6 / 9', '絕育狀態: 否']);
    const [first] = buildReportSections(makeReportData());
    expect(first.lines[0].cells.map((cell) => cell.x)).toEqual([80, 400]);
  });

  it('should round DER to two decimals and water to whole millilitres', () => {
    expect(texts('energy')).toEqual(['建議熱量 (DER): 280.00 大卡/天', '建議飲水: 280 毫升/天']);
  });

  it('should sign the calorie difference', () => {
    expect(texts('intake')).toEqual(['每日總攝取熱量: 265.00 大卡', '與建議量差異: +15.00 大卡']);

    const under = makeReportData({
      intake: { dryGrams: 0, wetGrams: 0, dryKcal: 0, wetKcal: 0, totalKcal: 276.8, calorieDifference: -3.2 },
    });
    expect(texts('intake', under)[1]).toBe('與建議量差異: -3.20 大卡');
  });

  it('should caption the plan split and round grams to one decimal', () => {
    expect(texts('plan')).toEqual(['(60% 乾食 / 40% 濕食 熱量佔比)', '乾食: 44.2 公克/天', '濕食: 123.5 公克/天']);
    const plan = buildReportSections(makeReportData())[3];
    expect(plan.lines.map((line) => line.advance)).toEqual([40, 30, 40]);
    expect(plan.lines[0].cells[0].font).toBe('caption');
  });

  it('should round a halfway gram amount to even', () => {
    // 140 kcal at 50% dry over 448 kcal/kg is exactly 156.25 g
    const data = makeReportData({ plan: { wetPercentage: 50, requiredDryGrams: 156.25, requiredWetGrams: 70 } });
    expect(texts('plan', data)[1]).toBe('乾食: 156.2 公克/天');
  });

  it('should hide intake and plan when they were never computed', () => {
    const sections = buildReportSections(makeReportData({ intake: null, plan: null }));
    expect(sections.map((section) => section.visible)).toEqual([true, true, false, false]);
    expect(sections[2].lines).toEqual([]);
    expect(sections[3].lines).toEqual([]);
  });
});

describe('buildReportPage', () => {
  it('should stamp the footer in the requested time zone', () => {
    const page = buildReportPage(makeReportData({ timeZone: 'Asia/Taipei' }));
    expect(page.title).toBe(REPORT_TITLE);
    expect(page.footer).toEqual({ left: '報告生成時間: 2026-03-05 09:02:03', right: REPORT_FOOTER_CAPTION });
  });
});

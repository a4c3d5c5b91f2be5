/**
 * Report Layout
 *
 * A tiny layout engine for the fixed 800x800 report. Content is described as
 * sections (title + lines, each line with a vertical advance), and a cursor is
 * folded down the page to turn them into positioned draw commands.
 * Hidden sections are skipped without reserving space.
 *
 * Nothing here touches a canvas, so the positions can be checked directly.
 */

export type ReportFontRole = 'title' | 'header' | 'body' | 'caption';
export type ReportColorRole = 'title' | 'accent' | 'text';
export type ReportTextAlign = 'left' | 'center' | 'right';
/** `top` puts the glyphs' top edge at y; `alphabetic` puts the baseline there */
export type ReportTextBaseline = 'top' | 'alphabetic';

export const REPORT_CANVAS = { width: 800, height: 800 } as const;

export const REPORT_COLORS = {
  background: '#FFFFF8',
  title: '#000000',
  accent: '#4682B4',
  text: '#282828',
} as const;

export const REPORT_FONT_SIZES: Readonly<Record<ReportFontRole, number>> = {
  title: 48,
  header: 32,
  body: 24,
  caption: 16,
};

export const REPORT_LAYOUT = {
  TITLE_Y: 50,
  SECTIONS_TOP: 120,
  SECTION_GAP: 80,
  SECTION_HEADER_X: 50,
  FOOTER_MARGIN_X: 50,
  FOOTER_BOTTOM_OFFSET: 40,
} as const;

export interface ReportCell {
  x: number;
  text: string;
  /** Defaults to body */
  font?: ReportFontRole;
}

export interface ReportLine {
  /** Distance from the previous line (or the section header) */
  advance: number;
  cells: ReportCell[];
}

export interface ReportSection {
  id: string;
  title: string;
  visible: boolean;
  lines: ReportLine[];
}

export interface ReportPage {
  title: string;
  sections: ReportSection[];
  footer: { left: string; right: string };
}

export interface DrawCommand {
  text: string;
  x: number;
  y: number;
  font: ReportFontRole;
  color: ReportColorRole;
  align: ReportTextAlign;
  baseline: ReportTextBaseline;
}

export function foldSections(
  sections: readonly ReportSection[],
  startY: number = REPORT_LAYOUT.SECTIONS_TOP
): { commands: DrawCommand[]; endY: number } {
  const commands: DrawCommand[] = [];
  // Each visible section first moves the cursor down by the gap, so start one gap above
  let cursor = startY - REPORT_LAYOUT.SECTION_GAP;

  for (const section of sections) {
    if (!section.visible) continue;

    cursor += REPORT_LAYOUT.SECTION_GAP;
    commands.push({
      text: section.title,
      x: REPORT_LAYOUT.SECTION_HEADER_X,
      y: cursor,
      font: 'header',
      color: 'accent',
      align: 'left',
      baseline: 'top',
    });

    for (const line of section.lines) {
      cursor += line.advance;
      for (const cell of line.cells) {
        commands.push({
          text: cell.text,
          x: cell.x,
          y: cursor,
          font: cell.font ?? 'body',
          color: 'text',
          align: 'left',
          baseline: 'top',
        });
      }
    }
  }

  return { commands, endY: commands.length > 0 ? cursor : startY };
}

/**
 * Title, folded sections, then the two footer captions pinned to the bottom edge.
 */
export function layoutReport(page: ReportPage): DrawCommand[] {
  const { width, height } = REPORT_CANVAS;
  const footerY = height - REPORT_LAYOUT.FOOTER_BOTTOM_OFFSET;

  const title: DrawCommand = {
    text: page.title,
    x: width / 2,
    y: REPORT_LAYOUT.TITLE_Y,
    font: 'title',
    color: 'title',
    align: 'center',
    baseline: 'alphabetic',
  };

  const footer: DrawCommand[] = [
    {
      text: page.footer.left,
      x: REPORT_LAYOUT.FOOTER_MARGIN_X,
      y: footerY,
      font: 'caption',
      color: 'text',
      align: 'left',
      baseline: 'top',
    },
    {
      text: page.footer.right,
      x: width - REPORT_LAYOUT.FOOTER_MARGIN_X,
      y: footerY,
      font: 'caption',
      color: 'text',
      align: 'right',
      baseline: 'alphabetic',
    },
  ];

  return [title, ...foldSections(page.sections).commands, ...footer];
}

import type { ProjectInfo } from '../impact/schema';
import { safeLogger } from '../../security/safeLogger';
import { Block, gap, heading, paragraph, plain, TextRun, title } from './layout';
import { classifyLine, parseMarkup, toMarkup } from './markup';
import { renderPdf } from './pdf';
import { projectBlocks } from './summaryDocument';

export const ADVISORY_TITLE = 'AI-Generated Change Plan';
export const NO_PLAN_TEXT = 'No plan text generated.';

type MarkupParser = (markup: string) => TextRun[];

/**
 * Body text with `**bold**` emphasis. A line whose markup cannot be parsed is kept as plain text.
 */
export function bodyRuns(text: string, parse: MarkupParser = parseMarkup): TextRun[] {
  try {
    return parse(toMarkup(text));
  } catch (err) {
    safeLogger.info('reports.advisory.line_fallback', {
      message: err instanceof Error ? err.message : 'markup error',
      length: text.length,
    });
    return plain(text);
  }
}

export function advisoryTextBlocks(advisoryText: string | null, parse: MarkupParser = parseMarkup): Block[] {
  if (!advisoryText) return [paragraph(NO_PLAN_TEXT)];

  return advisoryText.split('\n').map((raw): Block => {
    const line = classifyLine(raw);
    switch (line.kind) {
      case 'blank':
        return gap(6);
      case 'heading':
        return paragraph([{ text: line.text, bold: true }], { x: 50, size: 11, leading: 16 });
      case 'body':
        return paragraph(bodyRuns(line.text, parse));
    }
  });
}

export function advisoryBlocks(project: ProjectInfo, advisoryText: string | null): Block[] {
  return [
    title(ADVISORY_TITLE),
    ...projectBlocks(project),
    gap(10),
    heading('Recommended Change Plan'),
    ...advisoryTextBlocks(advisoryText),
  ];
}

export function renderAdvisoryPdf(project: ProjectInfo, advisoryText: string | null): Promise<Uint8Array> {
  return renderPdf(advisoryBlocks(project, advisoryText), { title: ADVISORY_TITLE });
}

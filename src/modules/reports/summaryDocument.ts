import { CC_QUESTIONNAIRE, OA_QUESTIONNAIRE, QuestionnaireDefinition } from '../impact/catalog';
import type { ProjectInfo } from '../impact/schema';
import type { AggregateScore, AssessmentResult, HighScoringItem } from '../impact/scoring';
import { GROUP_COLUMNS, groupImpactTable, tableToRecords } from '../impact/tables';
import { Block, gap, heading, LIST_WIDTH, paragraph, textLine, title } from './layout';
import { renderPdf } from './pdf';

export const SUMMARY_TITLE = 'Change Impact Assessment - Summary';

const HIGHLIGHT_HEADINGS: Record<QuestionnaireDefinition['code'], string> = {
  CC: 'Areas of higher change impact (CC items scored 3 or above):',
  OA: 'Areas of higher organizational risk (OA items scored 3 or above):',
};

export function formatPercent(percent: number): string {
  return `${percent.toFixed(1)}%`;
}

// 1 -> "1.0", 1.3 -> "1.3", 1.25 -> "1.25"
export function formatDegree(degree: number): string {
  return Number.isInteger(degree) ? degree.toFixed(1) : String(degree);
}

export function scoreLine(questionnaire: QuestionnaireDefinition, score: AggregateScore): string {
  return `Total ${questionnaire.code} score: ${score.total} / ${score.maxScore} (${formatPercent(score.percent)})`;
}

/**
 * Project metadata lines; empty fields are left out.
 */
export function projectBlocks(project: ProjectInfo): Block[] {
  const fields: Array<[string, string]> = [
    ['Project', project.projectName],
    ['Organization / Dept', project.organizationName],
    ['Sponsor', project.sponsorName],
    ['Assessment completed by', project.assessmentOwner],
  ];

  const blocks: Block[] = [heading('Project information')];
  for (const [label, value] of fields) {
    if (value) blocks.push(paragraph(`${label}: ${value}`, { width: LIST_WIDTH }));
  }

  if (project.description) {
    blocks.push(gap(6), heading('Change description', { size: 11, advance: 14 }), paragraph(project.description));
  }
  return blocks;
}

function questionnaireBlocks(
  questionnaire: QuestionnaireDefinition,
  score: AggregateScore,
  highlights: readonly HighScoringItem[]
): Block[] {
  const blocks: Block[] = [
    heading(`${questionnaire.title} (${questionnaire.code})`, { advance: 16 }),
    textLine(scoreLine(questionnaire, score), { advance: 18 }),
  ];

  if (!highlights.length) {
    blocks.push(textLine(`No ${questionnaire.code} items scored 3 or above.`));
    return blocks;
  }

  blocks.push(heading(HIGHLIGHT_HEADINGS[questionnaire.code], { x: 60, size: 11, advance: 14 }));
  for (const item of highlights) {
    blocks.push(paragraph(`- [${item.score}] ${item.number}) ${item.question}`, { x: 70, width: LIST_WIDTH }));
  }
  return blocks;
}

function groupBlocks(result: AssessmentResult): Block[] {
  const records = tableToRecords(groupImpactTable(result.groups));
  const blocks: Block[] = [heading('Group Impact Summary', { advance: 16 })];

  if (!records.length) {
    blocks.push(textLine('No group impact data entered.'));
    return blocks;
  }

  blocks.push(textLine('Impacted groups and their degree of impact:', { advance: 14 }));
  for (const record of records) {
    const degree = record[GROUP_COLUMNS.degree];
    blocks.push(
      paragraph(
        `- ${record[GROUP_COLUMNS.name]} ` +
          `(Employees: ${record[GROUP_COLUMNS.employees]}, ` +
          `Aspects impacted: ${record[GROUP_COLUMNS.aspectsImpacted]}, ` +
          `Degree of impact: ${typeof degree === 'number' ? formatDegree(degree) : degree})`,
        { x: 70, width: LIST_WIDTH }
      )
    );
  }
  return blocks;
}

export function summaryBlocks(project: ProjectInfo, result: AssessmentResult): Block[] {
  return [
    title(SUMMARY_TITLE),
    ...projectBlocks(project),
    gap(10),
    ...questionnaireBlocks(CC_QUESTIONNAIRE, result.cc, result.ccHighlights),
    gap(6),
    ...questionnaireBlocks(OA_QUESTIONNAIRE, result.oa, result.oaHighlights),
    gap(6),
    ...groupBlocks(result),
  ];
}

export function renderSummaryPdf(project: ProjectInfo, result: AssessmentResult): Promise<Uint8Array> {
  return renderPdf(summaryBlocks(project, result), { title: SUMMARY_TITLE });
}

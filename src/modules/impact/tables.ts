import { GROUP_ASPECTS, QuestionnaireDefinition } from './catalog';
import type { AggregateScore, AnswerSet, GroupImpactRow } from './scoring';

export type TableCell = string | number;

export type Table = {
  columns: string[];
  rows: TableCell[][];
};

export const TOP_GROUP_LIMIT = 5;

export const GROUP_COLUMNS = {
  index: '#',
  name: 'Group name',
  employees: 'Employees',
  aspectsImpacted: `Aspects impacted (out of ${GROUP_ASPECTS.length})`,
  degree: 'Degree of impact (0-5)',
} as const;

export function groupImpactTable(rows: readonly GroupImpactRow[]): Table {
  return {
    columns: [GROUP_COLUMNS.index, GROUP_COLUMNS.name, GROUP_COLUMNS.employees, GROUP_COLUMNS.aspectsImpacted, GROUP_COLUMNS.degree],
    rows: rows.map((row) => [row.index, row.name, row.employees, row.aspectsImpacted, row.degree]),
  };
}

/**
 * Groups sorted by degree of impact, highest first. Equal degrees keep their input order.
 */
export function topGroups(rows: readonly GroupImpactRow[], limit: number = TOP_GROUP_LIMIT): GroupImpactRow[] {
  return [...rows].sort((a, b) => b.degree - a.degree).slice(0, limit);
}

export function topGroupsTable(rows: readonly GroupImpactRow[], limit: number = TOP_GROUP_LIMIT): Table {
  return {
    columns: [GROUP_COLUMNS.index, GROUP_COLUMNS.name, GROUP_COLUMNS.employees, GROUP_COLUMNS.degree],
    rows: topGroups(rows, limit).map((row) => [row.index, row.name, row.employees, row.degree]),
  };
}

export function questionnaireSummaryTable(questionnaire: QuestionnaireDefinition, score: AggregateScore): Table {
  return {
    columns: ['Metric', 'Value'],
    rows: [
      [`Total ${questionnaire.code} score`, score.total],
      [`Max ${questionnaire.code} score`, score.maxScore],
      ['Percent of max', score.percent],
    ],
  };
}

export function questionDetailTable(questionnaire: QuestionnaireDefinition, answers: AnswerSet): Table {
  return {
    columns: ['Question', 'Score'],
    rows: questionnaire.questions.map((q) => [q.text, answers[q.id] ?? 0]),
  };
}

export function tableToRecords(table: Table): Record<string, TableCell>[] {
  return table.rows.map((row) => Object.fromEntries(table.columns.map((column, i) => [column, row[i] ?? ''])));
}

import { CC_QUESTIONNAIRE, GROUP_ASPECTS, OA_QUESTIONNAIRE, QuestionnaireDefinition } from './catalog';
import { topGroups } from './tables';

export type AnswerSet = Record<string, number>;

export type AggregateScore = {
  total: number;
  maxScore: number;
  percent: number;
};

export type GroupRecord = {
  name: string;
  employees: number;
  aspects: AnswerSet;
};

export type GroupImpactRow = {
  index: number;
  name: string;
  employees: number;
  aspectsImpacted: number;
  degree: number;
};

export type HighScoringItem = {
  number: number;
  id: string;
  question: string;
  score: number;
};

export type AssessmentInput = {
  cc: AnswerSet;
  oa: AnswerSet;
  groups: GroupRecord[];
};

export type AssessmentResult = {
  cc: AggregateScore;
  oa: AggregateScore;
  ccHighlights: HighScoringItem[];
  oaHighlights: HighScoringItem[];
  groups: GroupImpactRow[];
  topGroups: GroupImpactRow[];
};

export type DegreeDecimals = 1 | 2;

export const MAX_ITEM_SCORE = 5;
export const HIGH_SCORE_THRESHOLD = 3;
export const DEFAULT_DEGREE_DECIMALS: DegreeDecimals = 1;

// Degree of impact = (sum of aspect scores / 50) * 5, on the 0-5 scale.
const DEGREE_DIVISOR = 50;

export function aggregate(answers: AnswerSet, questionCount: number): AggregateScore {
  const total = Object.values(answers).reduce((sum, value) => sum + value, 0);
  const maxScore = questionCount * MAX_ITEM_SCORE;
  const percent = maxScore > 0 ? (total / maxScore) * 100 : 0;
  return { total, maxScore, percent };
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function groupImpact(
  groups: readonly GroupRecord[],
  aspects: readonly string[] = GROUP_ASPECTS,
  decimals: DegreeDecimals = DEFAULT_DEGREE_DECIMALS
): GroupImpactRow[] {
  return groups.map((group, i) => {
    const scores = aspects.map((aspect) => group.aspects[aspect] ?? 0);
    const total = scores.reduce((sum, value) => sum + value, 0);
    const degree = total > 0 ? (total / DEGREE_DIVISOR) * MAX_ITEM_SCORE : 0;

    return {
      index: i + 1,
      name: group.name,
      employees: group.employees,
      aspectsImpacted: scores.filter((score) => score > 0).length,
      degree: roundTo(degree, decimals),
    };
  });
}

export function highScoringItems(
  questionnaire: QuestionnaireDefinition,
  answers: AnswerSet,
  threshold: number = HIGH_SCORE_THRESHOLD
): HighScoringItem[] {
  return questionnaire.questions
    .map((q) => ({ number: q.number, id: q.id, question: q.text, score: answers[q.id] ?? 0 }))
    .filter((item) => item.score >= threshold);
}

export function assess(input: AssessmentInput, decimals: DegreeDecimals = DEFAULT_DEGREE_DECIMALS): AssessmentResult {
  const groups = groupImpact(input.groups, GROUP_ASPECTS, decimals);
  return {
    cc: aggregate(input.cc, CC_QUESTIONNAIRE.questions.length),
    oa: aggregate(input.oa, OA_QUESTIONNAIRE.questions.length),
    ccHighlights: highScoringItems(CC_QUESTIONNAIRE, input.cc),
    oaHighlights: highScoringItems(OA_QUESTIONNAIRE, input.oa),
    groups,
    topGroups: topGroups(groups),
  };
}

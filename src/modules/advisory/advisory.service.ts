import { getOpenAIConfig } from '../../config';
import { safeLogger } from '../../security/safeLogger';
import { OA_QUESTIONNAIRE } from '../impact/catalog';
import type { ProjectInfo } from '../impact/schema';
import type { AggregateScore, AnswerSet, GroupImpactRow } from '../impact/scoring';
import { groupImpactTable, tableToRecords, TableCell } from '../impact/tables';
import type { LLMClient, LLMMessage } from './llm.types';
import { OpenAIChatClient } from './openai.client';

export type AdvisoryPayload = {
  project_info: {
    project_name: string;
    sponsor_name: string;
    organization_name: string;
    assessment_owner: string;
    description: string;
  };
  group_impacts: Record<string, TableCell>[] | null;
  oa_impacts: {
    summary: { total_oa_score: number; max_oa_score: number; percent_of_max: number };
    details: { id: number; question: string; score: number | null }[];
  };
};

export type AdvisoryErrorCode = 'MISSING_CREDENTIAL' | 'PROVIDER_ERROR';

export type AdvisoryResult =
  | { ok: true; text: string }
  | { ok: false; error: { code: AdvisoryErrorCode; message: string } };

export type AdvisoryRequestOptions = {
  apiKey?: string;
  model?: string;
  temperature?: number;
  createClient?: (apiKey: string) => LLMClient;
};

export const SYSTEM_PROMPT =
  'You are an expert change management consultant. ' +
  'You specialize in translating change impact assessments into practical, ' +
  'role-based change plans for complex organizations.';

export function buildAdvisoryPayload(
  project: ProjectInfo,
  groups: readonly GroupImpactRow[],
  oa: { score: AggregateScore; answers: AnswerSet }
): AdvisoryPayload {
  return {
    project_info: {
      project_name: project.projectName,
      sponsor_name: project.sponsorName,
      organization_name: project.organizationName,
      assessment_owner: project.assessmentOwner,
      description: project.description,
    },
    group_impacts: groups.length ? tableToRecords(groupImpactTable(groups)) : null,
    oa_impacts: {
      summary: {
        total_oa_score: oa.score.total,
        max_oa_score: oa.score.maxScore,
        percent_of_max: oa.score.percent,
      },
      details: OA_QUESTIONNAIRE.questions.map((q) => ({
        id: q.number,
        question: q.text,
        score: oa.answers[q.id] ?? null,
      })),
    },
  };
}

export function buildAdvisoryMessages(payload: AdvisoryPayload): LLMMessage[] {
  const user = [
    'Using the following change impact assessment data, create a concise, high-level change plan. The plan should:',
    '- Summarize the overall change and key drivers.',
    '- Highlight which groups are most impacted and how.',
    '- Recommend tailored change tactics for each group based on their impact level.',
    '- Organize tactics into phases (for example: Awareness, Desire, Knowledge, Ability, Reinforcement).',
    '- Be written so that a project sponsor or change manager could use it to guide planning.',
    '',
    'Formatting rules: do not use tables. Start every section heading with "### ". Use **double asterisks** only for emphasis.',
    '',
    `Here is the structured data (JSON):\n${JSON.stringify(payload, null, 2)}`,
  ].join('\n');

  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: user },
  ];
}

/**
 * One request, no retry. Failures come back as values for the caller to show to the user.
 */
export async function requestAdvisoryText(
  payload: AdvisoryPayload,
  options: AdvisoryRequestOptions = {}
): Promise<AdvisoryResult> {
  const defaults = getOpenAIConfig();
  const apiKey = (options.apiKey ?? defaults.apiKey).trim();
  if (!apiKey) {
    return {
      ok: false,
      error: { code: 'MISSING_CREDENTIAL', message: 'OpenAI API key is not configured. Set OPENAI_API_KEY to enable change plans.' },
    };
  }

  const createClient = options.createClient ?? ((key: string) => new OpenAIChatClient(key));
  const model = options.model ?? defaults.model;

  try {
    const client = createClient(apiKey);
    const response = await client.chat(buildAdvisoryMessages(payload), {
      model,
      temperature: options.temperature ?? defaults.temperature,
    });
    const text = response.content.trim();
    if (!text) {
      return { ok: false, error: { code: 'PROVIDER_ERROR', message: 'The provider returned an empty change plan.' } };
    }
    safeLogger.info('advisory.generated', { model, length: text.length, usage: response.usage });
    return { ok: true, text };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    safeLogger.error('advisory.provider_error', { model, message });
    return { ok: false, error: { code: 'PROVIDER_ERROR', message: `Error calling OpenAI API: ${message}` } };
  }
}

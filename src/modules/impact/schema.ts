import { z } from 'zod';
import {
  ASPECT_SCALE,
  CC_QUESTIONNAIRE,
  GROUP_ASPECTS,
  MAX_GROUPS,
  OA_QUESTIONNAIRE,
  QuestionnaireDefinition,
  Scale,
} from './catalog';

const boundedScore = (scale: Readonly<Scale>) =>
  z.number().int().min(scale.min).max(scale.max).default(scale.default);

// Keys outside the fixed list are stripped; missing keys take the slider default.
function answerSetSchema(keys: readonly string[], scale: Readonly<Scale>) {
  const shape = Object.fromEntries(keys.map((key) => [key, boundedScore(scale)]));
  return z.object(shape).default({});
}

const questionnaireAnswersSchema = (questionnaire: QuestionnaireDefinition) =>
  answerSetSchema(
    questionnaire.questions.map((q) => q.id),
    questionnaire.scale
  );

const freeText = z.string().trim().default('');

export const projectInfoSchema = z
  .object({
    projectName: freeText,
    sponsorName: freeText,
    organizationName: freeText,
    assessmentOwner: freeText,
    description: freeText,
  })
  .default({});

export const groupSchema = z.object({
  name: freeText,
  employees: z.number().int().min(0).default(0),
  aspects: answerSetSchema(GROUP_ASPECTS, ASPECT_SCALE),
});

export const submissionSchema = z.object({
  project: projectInfoSchema,
  cc: questionnaireAnswersSchema(CC_QUESTIONNAIRE),
  oa: questionnaireAnswersSchema(OA_QUESTIONNAIRE),
  groups: z.array(groupSchema).max(MAX_GROUPS).default([]),
});

export const advisoryExportSchema = submissionSchema.extend({
  advisoryText: z.string().nullable().default(null),
});

export type ProjectInfo = z.infer<typeof projectInfoSchema>;
export type Submission = z.infer<typeof submissionSchema>;
export type AdvisoryExportRequest = z.infer<typeof advisoryExportSchema>;

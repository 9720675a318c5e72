import { z } from 'zod';
import rawCatalog from '../../data/impactIndex.json';

const scaleSchema = z.object({
  min: z.number().int(),
  max: z.number().int(),
  default: z.number().int(),
  hint: z.string().min(1),
});

const questionnaireDefinitionSchema = z.object({
  code: z.enum(['CC', 'OA']),
  title: z.string().min(1),
  scale: scaleSchema,
  questions: z.array(z.string().min(1)).min(1),
});

const catalogSchema = z.object({
  cc: questionnaireDefinitionSchema.refine((q) => q.code === 'CC', 'cc must use code CC'),
  oa: questionnaireDefinitionSchema.refine((q) => q.code === 'OA', 'oa must use code OA'),
  aspects: z.object({
    scale: scaleSchema,
    names: z.array(z.string().min(1)).min(1),
  }),
  limits: z.object({
    maxGroups: z.number().int().positive(),
  }),
});

export type QuestionnaireCode = 'CC' | 'OA';
export type Scale = z.infer<typeof scaleSchema>;

export type CatalogQuestion = {
  readonly number: number;
  readonly id: string;
  readonly text: string;
};

export type QuestionnaireDefinition = {
  readonly code: QuestionnaireCode;
  readonly title: string;
  readonly scale: Readonly<Scale>;
  readonly questions: readonly CatalogQuestion[];
};

const catalog = catalogSchema.parse(rawCatalog);

function toDefinition(def: z.infer<typeof questionnaireDefinitionSchema>): QuestionnaireDefinition {
  return Object.freeze({
    code: def.code,
    title: def.title,
    scale: Object.freeze({ ...def.scale }),
    questions: Object.freeze(
      def.questions.map((text, i) => Object.freeze({ number: i + 1, id: `${def.code}_${i + 1}`, text }))
    ),
  });
}

export const CC_QUESTIONNAIRE = toDefinition(catalog.cc);
export const OA_QUESTIONNAIRE = toDefinition(catalog.oa);

export const GROUP_ASPECTS: readonly string[] = Object.freeze([...catalog.aspects.names]);
export const ASPECT_SCALE: Readonly<Scale> = Object.freeze({ ...catalog.aspects.scale });
export const MAX_GROUPS = catalog.limits.maxGroups;

export function questionIds(questionnaire: QuestionnaireDefinition): string[] {
  return questionnaire.questions.map((q) => q.id);
}

/**
 * Everything a form needs to render its sliders, in display order.
 */
export function catalogView() {
  return {
    cc: CC_QUESTIONNAIRE,
    oa: OA_QUESTIONNAIRE,
    aspects: { names: GROUP_ASPECTS, scale: ASPECT_SCALE },
    limits: { maxGroups: MAX_GROUPS },
  };
}

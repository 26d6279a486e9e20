import { z } from 'zod';

export const IDENTIFIER_PATTERN = /^[a-z0-9]+(-[a-z0-9]+)*$/;

export function isCanonicalId(value: string): boolean {
  return IDENTIFIER_PATTERN.test(value);
}

export const RELATIONS = [
  'has-symptom',
  'red-flag-symptom',
  'has-treatment',
  'has-urgency',
  'differential-from',
  'time-sensitive',
  'contraindication',
  'drug-interaction',
  'requires-dose-adjustment',
  'requires-lab-test',
  'requires-imaging',
  'evidence-source',
  'refers-to-specialist',
] as const;

export type Relation = (typeof RELATIONS)[number];

export function isRelation(value: string): value is Relation {
  return (RELATIONS as readonly string[]).includes(value);
}

export const SEVERITY_TIERS = ['critical', 'urgent', 'common'] as const;
export type SeverityTier = (typeof SEVERITY_TIERS)[number];

/** Lower is more severe. */
export const SEVERITY_RANK: Record<SeverityTier, number> = { critical: 0, urgent: 1, common: 2 };

export const CONTRAINDICATION_SEVERITIES = ['absolute', 'caution'] as const;
export type ContraindicationSeverity = (typeof CONTRAINDICATION_SEVERITIES)[number];

export const INTERACTION_SEVERITIES = ['major', 'moderate', 'minor'] as const;
export type InteractionSeverity = (typeof INTERACTION_SEVERITIES)[number];

export type RuleSeverity = ContraindicationSeverity | InteractionSeverity | 'adjust';

export const RULE_SEVERITY_RANK: Record<RuleSeverity, number> = {
  absolute: 0,
  major: 1,
  moderate: 2,
  caution: 3,
  minor: 4,
  adjust: 5,
};

export const TRIGGER_ATTRIBUTES = ['allergy', 'condition', 'age-band', 'pregnancy', 'renal', 'hepatic'] as const;
export type TriggerAttribute = (typeof TRIGGER_ATTRIBUTES)[number];

export const ORGAN_LEVELS = ['impaired', 'severe'] as const;
export type OrganLevel = (typeof ORGAN_LEVELS)[number];

export const ENTITY_KINDS = [
  'condition',
  'symptom',
  'treatment',
  'medication',
  'trigger',
  'lab-test',
  'imaging',
  'evidence',
  'specialist',
] as const;
export type EntityKind = (typeof ENTITY_KINDS)[number];

// ------- source document schema

const identifier = z.string().regex(IDENTIFIER_PATTERN, 'must be a lowercase hyphenated token');

const baseEntity = { id: identifier, name: z.string().min(1).optional() };

const triggerEntity = z.discriminatedUnion('attribute', [
  z.object({ ...baseEntity, kind: z.literal('trigger'), attribute: z.literal('allergy'), allergen: identifier.optional() }),
  z.object({ ...baseEntity, kind: z.literal('trigger'), attribute: z.literal('condition') }),
  z.object({
    ...baseEntity,
    kind: z.literal('trigger'),
    attribute: z.literal('age-band'),
    ageRange: z
      .object({ min: z.number().nonnegative().optional(), max: z.number().positive().optional() })
      .refine(r => r.min !== undefined || r.max !== undefined, 'age range needs min or max'),
  }),
  z.object({
    ...baseEntity,
    kind: z.literal('trigger'),
    attribute: z.literal('pregnancy'),
    trimester: z.number().int().min(1).max(3).optional(),
  }),
  z.object({ ...baseEntity, kind: z.literal('trigger'), attribute: z.literal('renal'), level: z.enum(ORGAN_LEVELS) }),
  z.object({ ...baseEntity, kind: z.literal('trigger'), attribute: z.literal('hepatic'), level: z.enum(ORGAN_LEVELS) }),
]);

export const EntitySchema = z.union([
  z.object({ ...baseEntity, kind: z.literal('symptom'), modifiers: z.array(z.string().min(1)).optional() }),
  z.object({ ...baseEntity, kind: z.literal('evidence'), citation: z.string().min(1).optional() }),
  z.object({ ...baseEntity, kind: z.enum(['condition', 'treatment', 'medication', 'lab-test', 'imaging', 'specialist']) }),
  triggerEntity,
]);

export type Entity = z.infer<typeof EntitySchema>;
export type TriggerEntity = z.infer<typeof triggerEntity>;

export const FactRecordSchema = z.object({
  subject: z.string(),
  relation: z.string(),
  object: z.union([z.string(), z.number()]),
  severity: z.string().optional(),
  guidance: z.string().min(1).optional(),
  rationale: z.string().min(1).optional(),
});

export type FactRecord = z.infer<typeof FactRecordSchema>;

export const FactDocumentSchema = z.object({
  version: z.string().min(1),
  entities: z.array(EntitySchema),
  facts: z.array(FactRecordSchema),
});

export type FactDocument = z.infer<typeof FactDocumentSchema>;

// ------- validated facts

type FactBase<R extends Relation> = {
  /** `relation(subject,object)` */
  readonly id: string;
  readonly subject: string;
  readonly relation: R;
};

type EntityRelation =
  | 'has-symptom'
  | 'red-flag-symptom'
  | 'has-treatment'
  | 'differential-from'
  | 'evidence-source'
  | 'refers-to-specialist';

export type EntityFact = { [R in EntityRelation]: FactBase<R> & { readonly object: string } }[EntityRelation];

export type UrgencyFact = FactBase<'has-urgency'> & { readonly object: SeverityTier };
export type TimeSensitiveFact = FactBase<'time-sensitive'> & { readonly object: number };
export type ContraindicationFact = FactBase<'contraindication'> & {
  readonly object: string;
  readonly severity: ContraindicationSeverity;
};
export type InteractionFact = FactBase<'drug-interaction'> & {
  readonly object: string;
  readonly severity: InteractionSeverity;
  readonly guidance: string;
};
export type DoseAdjustmentFact = FactBase<'requires-dose-adjustment'> & {
  readonly object: string;
  readonly guidance: string;
};
type RequirementRelation = 'requires-lab-test' | 'requires-imaging';

export type RequirementFact = {
  [R in RequirementRelation]: FactBase<R> & { readonly object: string; readonly rationale: string | null };
}[RequirementRelation];

export type Fact =
  | EntityFact
  | UrgencyFact
  | TimeSensitiveFact
  | ContraindicationFact
  | InteractionFact
  | DoseAdjustmentFact
  | RequirementFact;

export type FactOf<R extends Relation> = Extract<Fact, { relation: R }>;

export function factId(relation: Relation, subject: string, object: string | number): string {
  return `${relation}(${subject},${object})`;
}

/** The (subject, relation, object) view cited by reasoning chains. */
export type FactCitation = {
  factId: string;
  subject: string;
  relation: Relation;
  object: string | number;
};

export function cite(fact: Fact): FactCitation {
  return { factId: fact.id, subject: fact.subject, relation: fact.relation, object: fact.object };
}

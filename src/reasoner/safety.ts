import { z } from 'zod';

import { InvalidQueryError, UnknownTreatmentError } from '../errors.js';
import type { OrganStatus, PatientProfile } from '../types.js';
import type { FactStore } from './factStore.js';
import { RULE_SEVERITY_RANK, isCanonicalId, type OrganLevel, type RuleSeverity, type TriggerEntity } from './facts.js';

export type SafetyFindingKind = 'contraindication' | 'drug-interaction' | 'dose-adjustment';

export type SafetyFinding = {
  ruleId: string;
  kind: SafetyFindingKind;
  severity: RuleSeverity;
  treatmentId: string;
  /** Trigger entity for contraindications and dose adjustments. */
  trigger: string | null;
  /** The other drug, for interactions. */
  interactsWith: string | null;
  message: string;
};

export type SafetyResult = {
  treatmentId: string;
  /** True when any absolute contraindication applies; never present as a recommendation then. */
  blocked: boolean;
  contraindications: SafetyFinding[];
  warnings: SafetyFinding[];
  doseAdjustments: SafetyFinding[];
};

const organStatus = z.enum(['normal', 'impaired', 'severe']);
const idList = z.array(z.string().min(1));

/** Known attributes are checked; anything else passes through untouched. */
export const PatientProfileSchema = z
  .object({
    allergies: idList.optional(),
    conditions: idList.optional(),
    medications: idList.optional(),
    age: z.number().nonnegative().max(150).optional(),
    pregnant: z.boolean().optional(),
    trimester: z.union([z.literal(1), z.literal(2), z.literal(3)]).optional(),
    renalStatus: organStatus.optional(),
    hepaticStatus: organStatus.optional(),
  })
  .passthrough();

export function parsePatientProfile(raw: unknown): PatientProfile {
  const parsed = PatientProfileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidQueryError(`Invalid patient profile: ${issue?.message ?? 'malformed'}`, {
      field: issue ? `profile.${issue.path.join('.')}` : 'profile',
    });
  }
  return parsed.data;
}

const ORGAN_ORDER: Record<OrganStatus, number> = { normal: 0, impaired: 1, severe: 2 };

function organMeets(status: OrganStatus | undefined, level: OrganLevel): boolean {
  return status !== undefined && ORGAN_ORDER[status] >= ORGAN_ORDER[level];
}

/** Missing profile attributes never trigger a rule. */
export function triggerApplies(trigger: TriggerEntity, profile: PatientProfile): boolean {
  switch (trigger.attribute) {
    case 'allergy':
      return (profile.allergies ?? []).includes(trigger.allergen ?? trigger.id);
    case 'condition':
      return (profile.conditions ?? []).includes(trigger.id);
    case 'age-band': {
      if (profile.age === undefined) return false;
      const { min, max } = trigger.ageRange;
      return (min === undefined || profile.age >= min) && (max === undefined || profile.age < max);
    }
    case 'pregnancy':
      if (profile.pregnant !== true) return false;
      return trigger.trimester === undefined || profile.trimester === trigger.trimester;
    case 'renal':
      return organMeets(profile.renalStatus, trigger.level);
    case 'hepatic':
      return organMeets(profile.hepaticStatus, trigger.level);
  }
}

function describeTrigger(trigger: TriggerEntity): string {
  return trigger.name ?? trigger.id;
}

export function compareFindings(a: SafetyFinding, b: SafetyFinding): number {
  return (
    RULE_SEVERITY_RANK[a.severity] - RULE_SEVERITY_RANK[b.severity] ||
    (a.ruleId < b.ruleId ? -1 : a.ruleId > b.ruleId ? 1 : 0)
  );
}

/**
 * Checks one treatment against a patient profile. Deterministic: identical
 * inputs against the same snapshot give identical, identically ordered output.
 */
export function validateTreatment(treatmentId: string, rawProfile: unknown, store: FactStore): SafetyResult {
  if (typeof treatmentId !== 'string' || !isCanonicalId(treatmentId)) {
    throw new InvalidQueryError('Treatment identifier must be a lowercase hyphenated token', {
      field: 'treatmentId', treatmentId: String(treatmentId),
    });
  }
  const treatment = store.getTreatment(treatmentId);
  if (!treatment) throw new UnknownTreatmentError(treatmentId);
  const profile = parsePatientProfile(rawProfile);

  const contraindications: SafetyFinding[] = [];
  const warnings: SafetyFinding[] = [];
  const doseAdjustments: SafetyFinding[] = [];

  for (const rule of treatment.contraindications) {
    if (!triggerApplies(rule.trigger, profile)) continue;
    const finding: SafetyFinding = {
      ruleId: rule.ruleId,
      kind: 'contraindication',
      severity: rule.severity,
      treatmentId,
      trigger: rule.trigger.id,
      interactsWith: null,
      message:
        rule.severity === 'absolute'
          ? `${treatment.name} is contraindicated: ${describeTrigger(rule.trigger)}`
          : `Use ${treatment.name} with caution: ${describeTrigger(rule.trigger)}`,
    };
    (rule.severity === 'absolute' ? contraindications : warnings).push(finding);
  }

  const medications = new Set(profile.medications ?? []);
  for (const rule of treatment.interactions) {
    const other = rule.drugs[0] === treatmentId ? rule.drugs[1] : rule.drugs[0];
    if (!medications.has(other)) continue;
    const otherName = store.getEntity(other)?.name ?? other;
    warnings.push({
      ruleId: rule.ruleId,
      kind: 'drug-interaction',
      severity: rule.severity,
      treatmentId,
      trigger: null,
      interactsWith: other,
      message: `${rule.severity} interaction between ${treatment.name} and ${otherName}: ${rule.guidance}`,
    });
  }

  for (const rule of treatment.doseAdjustments) {
    if (!triggerApplies(rule.trigger, profile)) continue;
    doseAdjustments.push({
      ruleId: rule.ruleId,
      kind: 'dose-adjustment',
      severity: 'adjust',
      treatmentId,
      trigger: rule.trigger.id,
      interactsWith: null,
      message: `Adjust ${treatment.name} dose (${describeTrigger(rule.trigger)}): ${rule.guidance}`,
    });
  }

  return {
    treatmentId,
    blocked: contraindications.length > 0,
    contraindications: contraindications.sort(compareFindings),
    warnings: warnings.sort(compareFindings),
    doseAdjustments: doseAdjustments.sort(compareFindings),
  };
}

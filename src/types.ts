import type {
  ContraindicationSeverity,
  InteractionSeverity,
  SeverityTier,
  TriggerEntity,
} from './reasoner/facts.js';

export interface Condition {
  id: string;
  name: string;
  severity: SeverityTier;
  symptoms: readonly string[];
  redFlags: readonly string[];
  differentialFrom: readonly string[];
  timeSensitiveHours: number | null;
  evidence: readonly string[];
  treatments: readonly string[];
  labTests: readonly string[];
  imaging: readonly string[];
  /** Specialists the condition is referred to, if any. */
  specialists: readonly string[];
}

export interface Symptom {
  id: string;
  name: string;
  /** Caller vocabulary (severity/onset qualifiers); matching ignores it. */
  modifiers: readonly string[];
}

export interface ContraindicationRule {
  ruleId: string;
  treatmentId: string;
  trigger: TriggerEntity;
  severity: ContraindicationSeverity;
}

export interface DrugInteractionRule {
  ruleId: string;
  /** The two drugs, as written in the fact (subject first). */
  drugs: readonly [string, string];
  severity: InteractionSeverity;
  guidance: string;
}

export interface DoseAdjustmentRule {
  ruleId: string;
  treatmentId: string;
  trigger: TriggerEntity;
  guidance: string;
}

export interface Treatment {
  id: string;
  name: string;
  treats: readonly string[];
  evidence: readonly string[];
  contraindications: readonly ContraindicationRule[];
  interactions: readonly DrugInteractionRule[];
  doseAdjustments: readonly DoseAdjustmentRule[];
}

export interface Requirement {
  ruleId: string;
  conditionId: string;
  itemId: string;
  rationale: string | null;
}

export type OrganStatus = 'normal' | 'impaired' | 'severe';

/**
 * Open attribute set. The validator reads the keys below and ignores anything else.
 */
export interface PatientProfile {
  allergies?: string[];
  conditions?: string[];
  medications?: string[];
  age?: number;
  pregnant?: boolean;
  trimester?: 1 | 2 | 3;
  renalStatus?: OrganStatus;
  hepaticStatus?: OrganStatus;
  [attribute: string]: unknown;
}

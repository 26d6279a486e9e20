import { InvalidQueryError } from './errors.js';
import type { FactStore, StoreMetadata } from './reasoner/factStore.js';
import { isCanonicalId, type EntityKind } from './reasoner/facts.js';
import type { FactSource } from './reasoner/knowledge.js';
import { matchConditions } from './reasoner/matcher.js';
import { rankDifferential, type RankedCandidate } from './reasoner/ranker.js';
import { buildReasoningChain, type ReasoningChain } from './reasoner/reasoningChain.js';
import { parsePatientProfile, validateTreatment, type SafetyResult } from './reasoner/safety.js';
import { DEFAULT_SCORING, type ScoringConfig } from './reasoner/scoring.js';
import type { KnowledgeHandle } from './reasoner/snapshot.js';
import { planFollowUp, recommendSpecialists, type FollowUp, type Referral } from './reasoner/referral.js';
import {
  URGENCY_LEVELS,
  assessUrgency,
  isUrgencyLevel,
  type TriageAssessment,
  type TriageRuleSet,
  type UrgencyLevel,
} from './reasoner/triage.js';
import type { Condition } from './types.js';

export type KnowledgeSummary = StoreMetadata & {
  facts: number;
  entities: Record<EntityKind, number>;
};

/**
 * Named operations the surrounding services call. Each one reads the current
 * snapshot once and is otherwise a pure function of its arguments.
 */
export class DiagnosticEngine {
  constructor(
    private readonly knowledge: KnowledgeHandle,
    private readonly triageRules: TriageRuleSet,
    private readonly scoring: ScoringConfig = DEFAULT_SCORING,
  ) {}

  snapshot(): FactStore {
    return this.knowledge.snapshot();
  }

  describeKnowledge(): KnowledgeSummary {
    const store = this.snapshot();
    return { ...store.metadata, facts: store.size, entities: store.countsByKind() };
  }

  reload(source?: FactSource): KnowledgeSummary {
    this.knowledge.reload(source);
    return this.describeKnowledge();
  }

  /**
   * Pass `store` to answer against a snapshot the caller already holds, e.g.
   * one whose fingerprint keys a cached result.
   */
  findConditionsBySymptoms(symptoms: readonly unknown[], store: FactStore = this.snapshot()): Record<string, number> {
    const { matches } = matchConditions(symptoms, store, this.scoring);
    const out: Record<string, number> = {};
    for (const [id, m] of matches) out[id] = m.score;
    return out;
  }

  generateDifferential(
    symptoms: readonly unknown[],
    limit?: number,
    store: FactStore = this.snapshot(),
  ): RankedCandidate[] {
    const { matches } = matchConditions(symptoms, store, this.scoring);
    return rankDifferential(matches, store, { limit, scoring: this.scoring });
  }

  generateReasoningChain(symptoms: readonly unknown[], conditionId: string, profile?: unknown): ReasoningChain {
    const store = this.snapshot();
    return buildReasoningChain(symptoms, conditionId, store, {
      scoring: this.scoring,
      profile: parsePatientProfile(profile),
    });
  }

  validateTreatment(treatmentId: string, profile: unknown): SafetyResult {
    return validateTreatment(treatmentId, profile, this.snapshot());
  }

  assessUrgency(symptoms: readonly unknown[], age?: number): Promise<TriageAssessment> {
    return assessUrgency(symptoms, this.snapshot(), this.triageRules, { age, scoring: this.scoring });
  }

  recommendSpecialists(conditionId: string, level: unknown): Referral {
    const store = this.snapshot();
    return recommendSpecialists(requireCondition(store, conditionId), requireLevel(level), store);
  }

  planFollowUp(conditionId: string, level: unknown): FollowUp {
    const store = this.snapshot();
    return planFollowUp(requireCondition(store, conditionId), requireLevel(level), store, this.triageRules);
  }

  // ------- lookups

  describeCondition(conditionId: string): Condition {
    return requireCondition(this.snapshot(), conditionId);
  }

  findLabTests(conditionId: string): string[] {
    const store = this.snapshot();
    return [...requireCondition(store, conditionId).labTests];
  }

  getAllLabTests(): string[] {
    return this.snapshot().listEntities('lab-test');
  }

  findImagingRequirements(conditionId: string): string[] {
    const store = this.snapshot();
    return [...requireCondition(store, conditionId).imaging];
  }

  getAllImaging(): string[] {
    return this.snapshot().listEntities('imaging');
  }

  findRedFlagSymptoms(conditionId: string): string[] {
    const store = this.snapshot();
    return [...requireCondition(store, conditionId).redFlags];
  }

  findTreatments(conditionId: string): string[] {
    const store = this.snapshot();
    return [...requireCondition(store, conditionId).treatments];
  }

  findEmergencyConditions(): string[] {
    return this.snapshot()
      .listConditions()
      .filter(c => c.severity === 'critical')
      .map(c => c.id);
  }

  getAllConditions(): string[] {
    return this.snapshot().listEntities('condition');
  }

  getAllSymptoms(): string[] {
    return this.snapshot().listEntities('symptom');
  }

  getAllTreatments(): string[] {
    return this.snapshot().listEntities('treatment');
  }
}

function requireCondition(store: FactStore, conditionId: string): Condition {
  if (typeof conditionId !== 'string' || !isCanonicalId(conditionId)) {
    throw new InvalidQueryError('Condition identifier must be a lowercase hyphenated token', {
      field: 'conditionId', conditionId: String(conditionId),
    });
  }
  const condition = store.getCondition(conditionId);
  if (!condition) throw new InvalidQueryError(`Unknown condition "${conditionId}"`, { conditionId });
  return condition;
}

function requireLevel(level: unknown): UrgencyLevel {
  if (!isUrgencyLevel(level)) {
    throw new InvalidQueryError(`Urgency level must be one of ${URGENCY_LEVELS.join(', ')}`, {
      field: 'level', level: String(level),
    });
  }
  return level;
}

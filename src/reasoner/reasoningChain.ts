import { InvalidQueryError } from '../errors.js';
import type { Condition, PatientProfile } from '../types.js';
import type { FactStore } from './factStore.js';
import { cite, isCanonicalId, type Fact, type FactCitation, type SeverityTier } from './facts.js';
import { matchConditions } from './matcher.js';
import { rankDifferential, type RankedCandidate } from './ranker.js';
import { validateTreatment, parsePatientProfile, type SafetyResult } from './safety.js';
import { DEFAULT_SCORING, type ScoringConfig } from './scoring.js';

export type ReasoningStepKind =
  | 'symptom-overlap'
  | 'red-flags'
  | 'severity'
  | 'differentials'
  | 'treatments'
  | 'safety';

export type ReasoningStep = {
  index: number;
  kind: ReasoningStepKind;
  label: string;
  summary: string;
  details: string[];
  citations: FactCitation[];
};

export type ReasoningChain = {
  conditionId: string;
  conditionName: string;
  storeVersion: string;
  storeFingerprint: string;
  symptoms: string[];
  severity: SeverityTier;
  /** Confidence the ranker assigns the condition for these symptoms (0 when nothing overlaps). */
  confidence: number;
  /** 1-based position in the differential, or null when outside it. */
  rank: number | null;
  steps: ReasoningStep[];
};

export type ExplainOptions = {
  profile?: PatientProfile;
  scoring?: ScoringConfig;
  limit?: number;
};

type Draft = Omit<ReasoningStep, 'index'>;

function present<T>(value: T | undefined): value is T {
  return value !== undefined;
}

function citeAll(facts: readonly Fact[]): FactCitation[] {
  const seen = new Set<string>();
  const out: FactCitation[] = [];
  for (const f of facts) {
    if (seen.has(f.id)) continue;
    seen.add(f.id);
    out.push(cite(f));
  }
  return out;
}

function overlapStep(condition: Condition, observed: string[], unrecognized: string[], store: FactStore): Draft {
  const matchedFacts = observed
    .map(s => store.findFact(condition.id, 'has-symptom', s))
    .filter(present);
  const details = matchedFacts.map(f => `${f.object} is a recorded symptom of ${condition.name}`);
  if (unrecognized.length) details.push(`Not in the knowledge base: ${unrecognized.join(', ')}`);

  if (matchedFacts.length === 0) {
    return {
      kind: 'symptom-overlap',
      label: 'Symptom overlap',
      summary: `None of the ${observed.length} observed symptoms is recorded for ${condition.name} (${condition.symptoms.length} compared)`,
      details,
      citations: citeAll(store.bySubjectRelation(condition.id, 'has-symptom')),
    };
  }
  return {
    kind: 'symptom-overlap',
    label: 'Symptom overlap',
    summary: `${matchedFacts.length} of ${condition.symptoms.length} recorded symptoms of ${condition.name} observed`,
    details,
    citations: citeAll(matchedFacts),
  };
}

function redFlagStep(condition: Condition, observed: string[], store: FactStore): Draft {
  const flagged = observed.map(s => store.findFact(condition.id, 'red-flag-symptom', s)).filter(present);
  if (flagged.length === 0) {
    return {
      kind: 'red-flags',
      label: 'Red-flag findings',
      summary: `No red-flag symptom of ${condition.name} observed`,
      details: condition.redFlags.map(s => `${s} not observed`),
      citations: citeAll(store.bySubjectRelation(condition.id, 'red-flag-symptom')),
    };
  }
  return {
    kind: 'red-flags',
    label: 'Red-flag findings',
    summary: `${flagged.length} red-flag symptom${flagged.length === 1 ? '' : 's'} of ${condition.name} observed`,
    details: flagged.map(f => `${f.object} is individually diagnostic of urgency`),
    citations: citeAll(flagged),
  };
}

function severityStep(condition: Condition, store: FactStore): Draft {
  const facts: Fact[] = [
    ...store.bySubjectRelation(condition.id, 'has-urgency'),
    ...store.bySubjectRelation(condition.id, 'time-sensitive'),
  ];
  const details = [`Severity tier: ${condition.severity}`];
  if (condition.timeSensitiveHours !== null) {
    details.push(`Time-sensitive: intervention window of ${condition.timeSensitiveHours}h`);
  }
  return {
    kind: 'severity',
    label: 'Severity classification',
    summary: `${condition.name} is classified ${condition.severity}${condition.timeSensitiveHours !== null ? ' and time-sensitive' : ''}`,
    details,
    citations: citeAll(facts),
  };
}

function differentialStep(
  condition: Condition,
  observed: string[],
  ranked: RankedCandidate[],
  store: FactStore,
): Draft | null {
  const position = ranked.findIndex(c => c.conditionId === condition.id);
  const alternatives = new Set<string>(ranked.map(c => c.conditionId).filter(id => id !== condition.id));
  for (const id of condition.differentialFrom) alternatives.add(id);
  for (const f of store.byObjectRelation(condition.id, 'differential-from')) alternatives.add(f.subject);
  if (alternatives.size === 0) return null;

  const facts: Fact[] = [];
  const details: string[] = [];
  for (const alt of Array.from(alternatives).sort()) {
    const recorded = [
      store.findFact(condition.id, 'differential-from', alt),
      store.findFact(alt, 'differential-from', condition.id),
    ].filter(present);
    const overlap = observed.map(s => store.findFact(alt, 'has-symptom', s)).filter(present);
    facts.push(...recorded, ...overlap);

    const altName = store.getCondition(alt)?.name ?? alt;
    const altRank = ranked.findIndex(c => c.conditionId === alt);
    const link = recorded.length ? ' (recorded differential)' : '';
    if (altRank === -1) {
      details.push(
        overlap.length === 0
          ? `excluded ${altName}${link}: no observed symptom overlaps`
          : `excluded ${altName}${link}: ranked outside the differential`,
      );
    } else if (position === -1 || altRank < position) {
      details.push(`retained ${altName}${link}: ranked #${altRank + 1} with confidence ${ranked[altRank]?.confidence ?? 0}`);
    } else {
      details.push(`retained ${altName}${link}: ranked #${altRank + 1}, below ${condition.name}`);
    }
  }
  if (facts.length === 0) return null;

  return {
    kind: 'differentials',
    label: 'Differential alternatives',
    summary: `${alternatives.size} alternative${alternatives.size === 1 ? '' : 's'} considered`,
    details,
    citations: citeAll(facts),
  };
}

function treatmentStep(condition: Condition, store: FactStore): Draft | null {
  const treatmentFacts = store.bySubjectRelation(condition.id, 'has-treatment');
  if (treatmentFacts.length === 0) return null;
  const evidenceFacts: Fact[] = [...store.bySubjectRelation(condition.id, 'evidence-source')];
  const details: string[] = [];
  for (const f of treatmentFacts) {
    const sources = store.bySubjectRelation(f.object, 'evidence-source');
    evidenceFacts.push(...sources);
    const name = store.getTreatment(f.object)?.name ?? f.object;
    details.push(sources.length ? `${name} (evidence: ${sources.map(s => s.object).join(', ')})` : name);
  }
  return {
    kind: 'treatments',
    label: 'Recommended treatments',
    summary: `${treatmentFacts.length} treatment${treatmentFacts.length === 1 ? '' : 's'} recorded for ${condition.name}`,
    details,
    citations: citeAll([...treatmentFacts, ...evidenceFacts]),
  };
}

function safetyStep(condition: Condition, profile: PatientProfile, store: FactStore): Draft | null {
  const results: SafetyResult[] = condition.treatments.map(t => validateTreatment(t, profile, store));
  const findings = results.flatMap(r => [...r.contraindications, ...r.warnings, ...r.doseAdjustments]);
  if (findings.length === 0) return null;

  const blocked = results.filter(r => r.blocked).map(r => r.treatmentId);
  const facts = findings.map(f => store.getFact(f.ruleId)).filter(present);
  return {
    kind: 'safety',
    label: 'Safety warnings',
    summary: blocked.length
      ? `Blocked for this patient: ${blocked.join(', ')}`
      : `${findings.length} advisory finding${findings.length === 1 ? '' : 's'} for this patient`,
    details: findings.map(f => f.message),
    citations: citeAll(facts),
  };
}

/**
 * Explains why `conditionId` is (or is not) supported by the observed symptoms.
 * Every step cites the facts it rests on, so the chain can be audited without
 * the engine.
 */
export function buildReasoningChain(
  symptoms: readonly unknown[],
  conditionId: string,
  store: FactStore,
  opts: ExplainOptions = {},
): ReasoningChain {
  if (typeof conditionId !== 'string' || !isCanonicalId(conditionId)) {
    throw new InvalidQueryError('Condition identifier must be a lowercase hyphenated token', {
      field: 'conditionId', conditionId: String(conditionId),
    });
  }
  const condition = store.getCondition(conditionId);
  if (!condition) throw new InvalidQueryError(`Unknown condition "${conditionId}"`, { conditionId });

  const scoring = opts.scoring ?? DEFAULT_SCORING;
  const profile = parsePatientProfile(opts.profile);
  const { matches, observed, unrecognized } = matchConditions(symptoms, store, scoring);
  const ranked = rankDifferential(matches, store, { scoring, limit: opts.limit });
  const position = ranked.findIndex(c => c.conditionId === conditionId);

  // confidence is reported even when the condition falls outside the limit
  const own = matches.get(conditionId);
  const confidence = own
    ? (rankDifferential(new Map([[conditionId, own]]), store, { scoring, limit: 1 })[0]?.confidence ?? 0)
    : 0;

  const treatments = treatmentStep(condition, store);
  const drafts: Array<Draft | null> = [
    overlapStep(condition, observed, unrecognized, store),
    redFlagStep(condition, observed, store),
    severityStep(condition, store),
    differentialStep(condition, observed, ranked, store),
    treatments,
    treatments ? safetyStep(condition, profile, store) : null,
  ];

  const steps = drafts
    .filter((d): d is Draft => d !== null && d.citations.length > 0)
    .map((d, index) => ({ index: index + 1, ...d }));

  return {
    conditionId,
    conditionName: condition.name,
    storeVersion: store.metadata.version,
    storeFingerprint: store.metadata.fingerprint,
    symptoms: observed,
    severity: condition.severity,
    confidence,
    rank: position === -1 ? null : position + 1,
    steps,
  };
}

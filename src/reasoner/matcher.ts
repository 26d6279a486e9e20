import { InvalidQueryError } from '../errors.js';
import type { FactStore } from './factStore.js';
import { SEVERITY_RANK, isCanonicalId, type SeverityTier } from './facts.js';
import { DEFAULT_SCORING, redFlagBonus, type ScoringConfig } from './scoring.js';

export type ConditionMatch = {
  conditionId: string;
  severity: SeverityTier;
  /** overlap + red-flag bonus; an integer */
  score: number;
  overlap: number;
  matchedSymptoms: string[];
  matchedRedFlags: string[];
};

export type MatchResult = {
  /** Non-zero overlaps only, in ranking order. */
  matches: Map<string, ConditionMatch>;
  observed: string[];
  /** Well-formed ids the store has no symptom for. */
  unrecognized: string[];
};

/** De-duplicates, keeping first-seen order. Rejects an empty list or a malformed id. */
export function normalizeSymptoms(symptoms: readonly unknown[]): string[] {
  if (!Array.isArray(symptoms) || symptoms.length === 0) {
    throw new InvalidQueryError('At least one symptom identifier is required', { field: 'symptoms' });
  }
  const out: string[] = [];
  for (const s of symptoms) {
    if (typeof s !== 'string' || !isCanonicalId(s)) {
      throw new InvalidQueryError('Symptom identifiers must be lowercase hyphenated tokens', {
        field: 'symptoms', symptom: typeof s === 'string' ? s : String(s),
      });
    }
    if (!out.includes(s)) out.push(s);
  }
  return out;
}

/** Severity, then red flags matched, then identifier. */
export function tieBreak(
  a: { severity: SeverityTier; matchedRedFlags: readonly string[]; conditionId: string },
  b: { severity: SeverityTier; matchedRedFlags: readonly string[]; conditionId: string },
): number {
  return (
    SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity] ||
    b.matchedRedFlags.length - a.matchedRedFlags.length ||
    (a.conditionId < b.conditionId ? -1 : a.conditionId > b.conditionId ? 1 : 0)
  );
}

export function compareMatches(a: ConditionMatch, b: ConditionMatch): number {
  return b.score - a.score || tieBreak(a, b);
}

export function matchConditions(
  symptoms: readonly unknown[],
  store: FactStore,
  scoring: ScoringConfig = DEFAULT_SCORING,
): MatchResult {
  const observed = normalizeSymptoms(symptoms);
  const unrecognized = observed.filter(s => !store.hasEntity(s, 'symptom'));

  const hits = new Map<string, { symptoms: string[]; redFlags: string[] }>();
  for (const symptom of observed) {
    for (const fact of store.byObjectRelation(symptom, 'has-symptom')) {
      let hit = hits.get(fact.subject);
      if (!hit) {
        hit = { symptoms: [], redFlags: [] };
        hits.set(fact.subject, hit);
      }
      hit.symptoms.push(symptom);
      if (store.findFact(fact.subject, 'red-flag-symptom', symptom)) hit.redFlags.push(symptom);
    }
  }

  const list: ConditionMatch[] = [];
  for (const [conditionId, hit] of hits) {
    const condition = store.getCondition(conditionId);
    if (!condition) continue;
    list.push({
      conditionId,
      severity: condition.severity,
      score: hit.symptoms.length + redFlagBonus(hit.redFlags.length, scoring),
      overlap: hit.symptoms.length,
      matchedSymptoms: [...hit.symptoms].sort(),
      matchedRedFlags: [...hit.redFlags].sort(),
    });
  }
  list.sort(compareMatches);

  return { matches: new Map(list.map((m): [string, ConditionMatch] => [m.conditionId, m])), observed, unrecognized };
}

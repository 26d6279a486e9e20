import { InvalidQueryError } from '../errors.js';
import type { FactStore } from './factStore.js';
import type { SeverityTier } from './facts.js';
import { tieBreak, type ConditionMatch } from './matcher.js';
import { DEFAULT_SCORING, confidenceFor, type ScoringConfig } from './scoring.js';

export type DifferentialLink = {
  /** Higher-ranked condition this one is a recorded differential of. */
  conditionId: string;
  factId: string;
};

export type RankedCandidate = {
  conditionId: string;
  name: string;
  severity: SeverityTier;
  score: number;
  confidence: number;
  matchedSymptoms: string[];
  missingSymptoms: string[];
  matchedRedFlags: string[];
  timeSensitiveHours: number | null;
  differentialOf: DifferentialLink[];
};

export type RankOptions = {
  limit?: number;
  scoring?: ScoringConfig;
};

export function resolveLimit(limit: unknown, fallback: number): number {
  if (limit === undefined || limit === null) return fallback;
  if (typeof limit !== 'number' || !Number.isInteger(limit) || limit < 1) {
    throw new InvalidQueryError('limit must be a positive integer', { field: 'limit', limit: String(limit) });
  }
  return limit;
}

/**
 * Normalizes matcher scores into confidences and orders the candidates.
 * Lower-ranked conditions recorded as `differential-from` a higher one are
 * annotated, not dropped.
 */
export function rankDifferential(
  matches: ReadonlyMap<string, ConditionMatch>,
  store: FactStore,
  opts: RankOptions = {},
): RankedCandidate[] {
  const scoring = opts.scoring ?? DEFAULT_SCORING;
  const limit = resolveLimit(opts.limit, scoring.defaultLimit);
  if (matches.size === 0) return [];

  const candidates: RankedCandidate[] = [];
  for (const m of matches.values()) {
    const condition = store.getCondition(m.conditionId);
    if (!condition) continue;
    const matched = new Set(m.matchedSymptoms);
    candidates.push({
      conditionId: m.conditionId,
      name: condition.name,
      severity: condition.severity,
      score: m.score,
      confidence: confidenceFor(m.overlap, condition.symptoms.length, m.matchedRedFlags.length, scoring),
      matchedSymptoms: [...m.matchedSymptoms],
      missingSymptoms: condition.symptoms.filter(s => !matched.has(s)),
      matchedRedFlags: [...m.matchedRedFlags],
      timeSensitiveHours: condition.timeSensitiveHours,
      differentialOf: [],
    });
  }

  candidates.sort((a, b) => b.confidence - a.confidence || tieBreak(a, b));
  const ranked = candidates.slice(0, limit);

  ranked.forEach((candidate, i) => {
    for (const higher of ranked.slice(0, i)) {
      const fact = store.findFact(candidate.conditionId, 'differential-from', higher.conditionId);
      if (fact) candidate.differentialOf.push({ conditionId: higher.conditionId, factId: fact.id });
    }
  });

  return ranked;
}

import fs from 'fs';
import { Engine } from 'json-rules-engine';
import { z } from 'zod';

import { LoadError } from '../errors.js';
import type { FactStore } from './factStore.js';
import { matchConditions } from './matcher.js';
import { rankDifferential, type RankedCandidate } from './ranker.js';
import { DEFAULT_SCORING, type ScoringConfig } from './scoring.js';

export const URGENCY_LEVELS = ['emergency', 'urgent', 'routine'] as const;
export type UrgencyLevel = (typeof URGENCY_LEVELS)[number];

export function isUrgencyLevel(value: unknown): value is UrgencyLevel {
  return typeof value === 'string' && (URGENCY_LEVELS as readonly string[]).includes(value);
}

const LEVEL_RANK: Record<UrgencyLevel, number> = { emergency: 0, urgent: 1, routine: 2 };

type RuleCondition =
  | { fact: string; operator: string; value: string | number | boolean | Array<string | number> }
  | { all: RuleCondition[] }
  | { any: RuleCondition[] };

const ruleCondition: z.ZodType<RuleCondition> = z.lazy(() =>
  z.union([
    z.object({
      fact: z.string().min(1),
      operator: z.string().min(1),
      value: z.union([z.string(), z.number(), z.boolean(), z.array(z.union([z.string(), z.number()]))]),
    }),
    z.object({ all: z.array(ruleCondition).min(1) }),
    z.object({ any: z.array(ruleCondition).min(1) }),
  ]),
);

const TriageRuleSetSchema = z.object({
  version: z.string().min(1),
  actions: z.object({ emergency: z.string().min(1), urgent: z.string().min(1), routine: z.string().min(1) }),
  followUp: z.object({
    emergency: z.string().min(1),
    /** Window used for urgent cases when no shorter time-sensitive window applies. */
    urgentWindowHours: z.number().int().positive(),
    routine: z.string().min(1),
  }),
  rules: z
    .array(
      z.object({
        id: z.string().min(1),
        level: z.enum(URGENCY_LEVELS),
        reason: z.string().min(1),
        priority: z.number().int().positive().optional(),
        conditions: z.union([
          z.object({ all: z.array(ruleCondition).min(1) }),
          z.object({ any: z.array(ruleCondition).min(1) }),
        ]),
      }),
    )
    .min(1),
});

export type TriageRuleSet = z.infer<typeof TriageRuleSetSchema>;
export type TriageRule = TriageRuleSet['rules'][number];

export type TriageFacts = {
  redFlagCount: number;
  topConfidence: number;
  topSeverity?: string;
  criticalConfidence: number;
  urgentConfidence: number;
  minTimeSensitiveHours?: number;
  age?: number;
};

export type TriageAssessment = {
  level: UrgencyLevel;
  recommendedAction: string;
  firedRules: { ruleId: string; level: UrgencyLevel; reason: string }[];
  redFlags: string[];
  candidates: Pick<RankedCandidate, 'conditionId' | 'severity' | 'confidence'>[];
  facts: TriageFacts;
};

export function parseTriageRules(raw: unknown, origin = 'inline'): TriageRuleSet {
  const parsed = TriageRuleSetSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new LoadError(`Malformed triage rules: ${issue?.message ?? 'invalid'}`, {
      origin, path: issue ? issue.path.join('.') : null,
    });
  }
  const ids = new Set<string>();
  for (const rule of parsed.data.rules) {
    if (ids.has(rule.id)) throw new LoadError(`Duplicate triage rule "${rule.id}"`, { origin, rule: rule.id });
    ids.add(rule.id);
  }
  return parsed.data;
}

export function loadTriageRules(path: string): TriageRuleSet {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(path, 'utf8'));
  } catch (err) {
    throw new LoadError(`Cannot read triage rules: ${err instanceof Error ? err.message : String(err)}`, { path });
  }
  return parseTriageRules(raw, path);
}

/** Facts the rules see; derived from the matcher and the full (unlimited) ranking. */
export function triageFacts(ranked: RankedCandidate[], redFlags: string[], age?: number): TriageFacts {
  const maxConfidence = (pred: (c: RankedCandidate) => boolean) =>
    ranked.filter(pred).reduce((m, c) => Math.max(m, c.confidence), 0);
  const windows = ranked
    .filter(c => c.confidence > 0.5 && c.timeSensitiveHours !== null)
    .map(c => c.timeSensitiveHours ?? Infinity);

  const facts: TriageFacts = {
    redFlagCount: redFlags.length,
    topConfidence: ranked[0]?.confidence ?? 0,
    criticalConfidence: maxConfidence(c => c.severity === 'critical'),
    urgentConfidence: maxConfidence(c => c.severity === 'urgent'),
  };
  if (ranked[0]) facts.topSeverity = ranked[0].severity;
  if (windows.length) facts.minTimeSensitiveHours = Math.min(...windows);
  if (age !== undefined) facts.age = age;
  return facts;
}

/**
 * Classifies how soon the patient should be seen. The rules engine is
 * promise-based; no I/O happens here.
 */
export async function assessUrgency(
  symptoms: readonly unknown[],
  store: FactStore,
  rules: TriageRuleSet,
  opts: { age?: number; scoring?: ScoringConfig } = {},
): Promise<TriageAssessment> {
  const scoring = opts.scoring ?? DEFAULT_SCORING;
  const { matches } = matchConditions(symptoms, store, scoring);
  const ranked = rankDifferential(matches, store, { scoring, limit: Math.max(1, matches.size) });
  const redFlags = Array.from(new Set(Array.from(matches.values()).flatMap(m => m.matchedRedFlags))).sort();
  const facts = triageFacts(ranked, redFlags, opts.age);

  const engine = new Engine([], { allowUndefinedFacts: true });
  for (const rule of rules.rules) {
    engine.addRule({
      name: rule.id,
      priority: rule.priority ?? 1,
      conditions: rule.conditions,
      event: { type: rule.id, params: { level: rule.level } },
    });
  }
  const { events } = await engine.run({ ...facts });

  const byId = new Map(rules.rules.map((r): [string, TriageRule] => [r.id, r]));
  const fired = events
    .map(e => byId.get(e.type))
    .filter((r): r is TriageRule => r !== undefined)
    .map(r => ({ ruleId: r.id, level: r.level, reason: r.reason }))
    .sort((a, b) => LEVEL_RANK[a.level] - LEVEL_RANK[b.level] || a.ruleId.localeCompare(b.ruleId));

  const level: UrgencyLevel = fired[0]?.level ?? 'routine';
  return {
    level,
    recommendedAction: rules.actions[level],
    firedRules: fired,
    redFlags,
    candidates: ranked.slice(0, scoring.defaultLimit).map(c => ({
      conditionId: c.conditionId, severity: c.severity, confidence: c.confidence,
    })),
    facts,
  };
}

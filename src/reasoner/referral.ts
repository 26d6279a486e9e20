import type { Condition } from '../types.js';
import type { FactStore } from './factStore.js';
import { cite, type FactCitation } from './facts.js';
import type { TriageRuleSet, UrgencyLevel } from './triage.js';

export type SpecialistRef = { id: string; name: string };

export type Referral = {
  conditionId: string;
  level: UrgencyLevel;
  /** Emergencies go through the emergency department first, with or without a specialist. */
  setting: 'emergency-department' | 'outpatient';
  specialists: SpecialistRef[];
  citations: FactCitation[];
};

export type FollowUp = {
  conditionId: string;
  level: UrgencyLevel;
  /** Hours until the patient must be seen; 0 for emergencies, null for routine care. */
  withinHours: number | null;
  timeline: string;
  citations: FactCitation[];
};

export function recommendSpecialists(condition: Condition, level: UrgencyLevel, store: FactStore): Referral {
  const facts = store.bySubjectRelation(condition.id, 'refers-to-specialist');
  return {
    conditionId: condition.id,
    level,
    setting: level === 'emergency' ? 'emergency-department' : 'outpatient',
    specialists: condition.specialists.map(id => ({ id, name: store.getEntity(id)?.name ?? id })),
    citations: facts.map(cite),
  };
}

/**
 * Urgent cases are seen within the condition's time-sensitive window when it
 * is shorter than the configured urgent window.
 */
export function planFollowUp(
  condition: Condition,
  level: UrgencyLevel,
  store: FactStore,
  rules: TriageRuleSet,
): FollowUp {
  const base = { conditionId: condition.id, level };
  switch (level) {
    case 'emergency':
      return { ...base, withinHours: 0, timeline: rules.followUp.emergency, citations: [] };
    case 'routine':
      return { ...base, withinHours: null, timeline: rules.followUp.routine, citations: [] };
    case 'urgent': {
      const timed = store.bySubjectRelation(condition.id, 'time-sensitive')[0];
      const hours =
        timed && timed.object < rules.followUp.urgentWindowHours ? timed.object : rules.followUp.urgentWindowHours;
      return {
        ...base,
        withinHours: hours,
        timeline: `Within ${hours} hours`,
        citations: timed && hours === timed.object ? [cite(timed)] : [],
      };
    }
  }
}

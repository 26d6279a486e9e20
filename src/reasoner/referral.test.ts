import { describe, expect, test } from 'vitest';

import { miniStore } from '../__fixtures__/graph.js';
import { parseTriageRules } from './triage.js';
import { planFollowUp, recommendSpecialists } from './referral.js';

const rules = parseTriageRules({
  version: 'test',
  actions: { emergency: 'Go now', urgent: 'Today', routine: 'Book' },
  followUp: { emergency: 'Immediately', urgentWindowHours: 24, routine: 'Within two weeks' },
  rules: [
    { id: 'r', level: 'urgent', reason: 'r', conditions: { all: [{ fact: 'age', operator: 'greaterThan', value: 1 }] } },
  ],
});

const store = miniStore();

function condition(id: string) {
  const found = store.getCondition(id);
  if (!found) throw new Error(`fixture has no condition ${id}`);
  return found;
}

describe('recommendSpecialists', () => {
  test('names the recorded specialists and cites the referral facts', () => {
    expect(recommendSpecialists(condition('gamma-crit'), 'urgent', store)).toEqual({
      conditionId: 'gamma-crit',
      level: 'urgent',
      setting: 'outpatient',
      specialists: [{ id: 'spec-one', name: 'Specialist one' }],
      citations: [
        { factId: 'refers-to-specialist(gamma-crit,spec-one)', subject: 'gamma-crit', relation: 'refers-to-specialist', object: 'spec-one' },
      ],
    });
  });

  test('sends emergencies to the emergency department even without a specialist', () => {
    const referral = recommendSpecialists(condition('beta-flu'), 'emergency', store);
    expect(referral.setting).toBe('emergency-department');
    expect(referral.specialists).toEqual([]);
    expect(referral.citations).toEqual([]);
  });
});

describe('planFollowUp', () => {
  test('is immediate for emergencies', () => {
    expect(planFollowUp(condition('gamma-crit'), 'emergency', store, rules)).toEqual({
      conditionId: 'gamma-crit',
      level: 'emergency',
      withinHours: 0,
      timeline: 'Immediately',
      citations: [],
    });
  });

  test('uses a shorter time-sensitive window for urgent cases', () => {
    const plan = planFollowUp(condition('gamma-crit'), 'urgent', store, rules);
    expect(plan.withinHours).toBe(2);
    expect(plan.timeline).toBe('Within 2 hours');
    expect(plan.citations.map(c => c.factId)).toEqual(['time-sensitive(gamma-crit,2)']);
  });

  test('falls back to the urgent window', () => {
    const plan = planFollowUp(condition('alpha-fever'), 'urgent', store, rules);
    expect(plan.withinHours).toBe(24);
    expect(plan.timeline).toBe('Within 24 hours');
    expect(plan.citations).toEqual([]);
  });

  test('has no deadline for routine care', () => {
    const plan = planFollowUp(condition('beta-flu'), 'routine', store, rules);
    expect(plan.withinHours).toBeNull();
    expect(plan.timeline).toBe('Within two weeks');
  });
});

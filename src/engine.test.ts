import { beforeEach, describe, expect, test } from 'vitest';

import { miniDocument } from './__fixtures__/graph.js';
import { config } from './config.js';
import { DiagnosticEngine } from './engine.js';
import { InvalidQueryError, LoadError, UnknownTreatmentError } from './errors.js';
import { KnowledgeHandle } from './reasoner/snapshot.js';
import { loadTriageRules } from './reasoner/triage.js';

const MENINGITIS_PRESENTATION = ['fever', 'severe-headache', 'stiff-neck', 'non-blanching-rash'];

function bundledEngine() {
  const knowledge = KnowledgeHandle.load({ kind: 'file', path: config.KNOWLEDGE_PATH });
  return new DiagnosticEngine(knowledge, loadTriageRules(config.TRIAGE_RULES_PATH));
}

describe('DiagnosticEngine with the bundled knowledge base', () => {
  const engine = bundledEngine();

  test('scores conditions by overlap and red flags', () => {
    const scores = engine.findConditionsBySymptoms(MENINGITIS_PRESENTATION);
    expect(Object.entries(scores)).toEqual([
      ['meningitis', 18],
      ['covid-19', 1],
      ['pneumonia', 1],
      ['influenza', 1],
    ]);
  });

  test('puts meningitis first in the differential', () => {
    const ranked = engine.generateDifferential(MENINGITIS_PRESENTATION);
    expect(ranked.map(c => [c.conditionId, c.confidence])).toEqual([
      ['meningitis', 0.6333],
      ['covid-19', 0.0909],
      ['influenza', 0.0909],
      ['pneumonia', 0.0833],
    ]);
    expect(ranked[0]?.severity).toBe('critical');
    expect(ranked[0]?.matchedRedFlags).toEqual(['non-blanching-rash', 'severe-headache', 'stiff-neck']);
    expect(ranked[3]?.differentialOf.map(d => d.conditionId)).toEqual(['covid-19', 'influenza']);
  });

  test('returns empty results when no symptom overlaps', () => {
    expect(engine.findConditionsBySymptoms(['purple-toes'])).toEqual({});
    expect(engine.generateDifferential(['purple-toes'])).toEqual([]);
  });

  test('honours an explicit limit', () => {
    expect(engine.generateDifferential(MENINGITIS_PRESENTATION, 1).map(c => c.conditionId)).toEqual(['meningitis']);
  });

  test('blocks aspirin for a bleeding disorder', () => {
    const result = engine.validateTreatment('aspirin', { conditions: ['bleeding-disorder'] });
    expect(result.blocked).toBe(true);
    expect(result.contraindications.map(c => c.message)).toEqual(['Aspirin is contraindicated: Bleeding disorder']);
  });

  test('warns about aspirin with warfarin', () => {
    const result = engine.validateTreatment('aspirin', { medications: ['warfarin'] });
    expect(result.blocked).toBe(false);
    expect(result.warnings).toEqual([
      {
        ruleId: 'drug-interaction(aspirin,warfarin)',
        kind: 'drug-interaction',
        severity: 'major',
        treatmentId: 'aspirin',
        trigger: null,
        interactsWith: 'warfarin',
        message:
          'major interaction between Aspirin and Warfarin: Additive bleeding risk; avoid unless directed by a cardiologist and monitor INR closely',
      },
    ]);
  });

  test('rejects an unknown treatment', () => {
    expect(() => engine.validateTreatment('unobtainium', {})).toThrow(UnknownTreatmentError);
  });

  test('lists the lab tests for diabetic ketoacidosis', () => {
    expect(engine.findLabTests('diabetic-ketoacidosis')).toEqual([
      'arterial-blood-gas',
      'blood-glucose',
      'blood-ketones',
      'serum-electrolytes',
    ]);
  });

  test('answers lookups', () => {
    expect(engine.findRedFlagSymptoms('meningitis')).toEqual([
      'altered-mental-status',
      'non-blanching-rash',
      'petechial-rash',
      'severe-headache',
      'stiff-neck',
    ]);
    expect(engine.findImagingRequirements('stroke')).toEqual(['ct-head', 'mri-brain']);
    expect(engine.findTreatments('heart-attack')).toEqual(['aspirin', 'cardiac-catheterization', 'immediate-911']);
    expect(engine.findEmergencyConditions()).toEqual([
      'appendicitis',
      'diabetic-ketoacidosis',
      'heart-attack',
      'meningitis',
      'pulmonary-embolism',
      'sepsis',
      'stroke',
    ]);
    expect(engine.getAllConditions()).toHaveLength(14);
    expect(() => engine.findLabTests('dragon-pox')).toThrow(InvalidQueryError);
  });

  test('explains meningitis for the presentation', () => {
    const chain = engine.generateReasoningChain(MENINGITIS_PRESENTATION, 'meningitis');
    expect(chain.rank).toBe(1);
    expect(chain.confidence).toBe(0.6333);
    expect(chain.steps[0]?.summary).toBe('4 of 12 recorded symptoms of Meningitis observed');
    expect(chain.steps[1]?.summary).toBe('3 red-flag symptoms of Meningitis observed');
  });

  test('triages the presentation as an emergency', async () => {
    const result = await engine.assessUrgency(MENINGITIS_PRESENTATION);
    expect(result.level).toBe('emergency');
    expect(result.firedRules.map(r => r.ruleId)).toEqual([
      'critical-condition-likely',
      'red-flag-observed',
      'time-critical-window',
      'critical-condition-possible',
    ]);
  });

  test('triages a mild cold as routine', async () => {
    const result = await engine.assessUrgency(['sneezing']);
    expect(result.level).toBe('routine');
    expect(result.candidates).toEqual([{ conditionId: 'common-cold', severity: 'common', confidence: 0.1429 }]);
  });

  test('refers conditions to specialists from the knowledge base', () => {
    const referral = engine.recommendSpecialists('meningitis', 'emergency');
    expect(referral.setting).toBe('emergency-department');
    expect(referral.specialists).toEqual([
      { id: 'infectious-disease-specialist', name: 'Infectious disease specialist' },
      { id: 'neurologist', name: 'Neurologist' },
    ]);
    expect(referral.citations.map(c => c.factId)).toEqual([
      'refers-to-specialist(meningitis,neurologist)',
      'refers-to-specialist(meningitis,infectious-disease-specialist)',
    ]);
    expect(engine.recommendSpecialists('sepsis', 'emergency').specialists).toEqual([]);
    expect(engine.recommendSpecialists('migraine', 'routine').setting).toBe('outpatient');
  });

  test('plans follow-up within the shorter of the urgent and time-sensitive windows', () => {
    expect(engine.planFollowUp('stroke', 'urgent')).toMatchObject({ withinHours: 3, timeline: 'Within 3 hours' });
    expect(engine.planFollowUp('appendicitis', 'urgent')).toMatchObject({
      withinHours: 24,
      timeline: 'Within 24 hours',
      citations: [],
    });
    expect(engine.planFollowUp('common-cold', 'routine').timeline).toBe('1-2 weeks, or sooner if symptoms worsen');
  });

  test('rejects an unknown urgency level or condition', () => {
    expect(() => engine.planFollowUp('stroke', 'soon')).toThrow(
      'Urgency level must be one of emergency, urgent, routine',
    );
    expect(() => engine.recommendSpecialists('stroke', undefined)).toThrow(InvalidQueryError);
    expect(() => engine.recommendSpecialists('dragon-pox', 'urgent')).toThrow(InvalidQueryError);
  });
});

describe('DiagnosticEngine.reload', () => {
  let engine: DiagnosticEngine;

  beforeEach(() => {
    engine = bundledEngine();
  });

  test('swaps in a new snapshot', () => {
    const summary = engine.reload({ kind: 'document', document: miniDocument(), origin: 'fixture' });
    expect(summary.version).toBe('test-1');
    expect(summary.entities.condition).toBe(3);
    expect(engine.getAllConditions()).toEqual(['alpha-fever', 'beta-flu', 'gamma-crit']);
  });

  test('answers against a snapshot taken before a reload', () => {
    const before = engine.snapshot();
    engine.reload({ kind: 'document', document: miniDocument(), origin: 'fixture' });
    expect(engine.generateDifferential(MENINGITIS_PRESENTATION, 1, before).map(c => c.conditionId)).toEqual(['meningitis']);
    expect(engine.findConditionsBySymptoms(['sneezing'], before)).toEqual({ 'common-cold': 1 });
    expect(engine.findConditionsBySymptoms(['sneezing'])).toEqual({});
  });

  test('keeps the previous snapshot when loading fails', () => {
    const before = engine.snapshot();
    expect(() => engine.reload({ kind: 'document', document: { version: 'broken' } })).toThrow(LoadError);
    expect(engine.snapshot()).toBe(before);
  });
});

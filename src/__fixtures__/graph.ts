import type { FactStore } from '../reasoner/factStore.js';
import { loadFactStore } from '../reasoner/knowledge.js';

/**
 * A small, hand-checked graph for unit tests. Returns a fresh object each time
 * so tests can mutate it freely.
 */
export function miniDocument() {
  return {
    version: 'test-1',
    entities: [
      { id: 'alpha-fever', kind: 'condition', name: 'Alpha fever' },
      { id: 'beta-flu', kind: 'condition', name: 'Beta flu' },
      { id: 'gamma-crit', kind: 'condition', name: 'Gamma crisis' },
      { id: 'fever', kind: 'symptom', modifiers: ['low-grade', 'high'] },
      { id: 'cough', kind: 'symptom' },
      { id: 'headache', kind: 'symptom' },
      { id: 'stiff-neck', kind: 'symptom' },
      { id: 'rash', kind: 'symptom' },
      { id: 'drug-a', kind: 'treatment', name: 'Drug A' },
      { id: 'drug-b', kind: 'treatment', name: 'Drug B' },
      { id: 'rest', kind: 'treatment', name: 'Rest' },
      { id: 'med-x', kind: 'medication', name: 'Med X' },
      { id: 'bleeding', kind: 'trigger', attribute: 'condition', name: 'Bleeding disorder' },
      { id: 'allergy-a', kind: 'trigger', attribute: 'allergy', allergen: 'class-a', name: 'Class A allergy' },
      { id: 'kidney', kind: 'trigger', attribute: 'renal', level: 'impaired', name: 'Reduced kidney function' },
      { id: 'elderly', kind: 'trigger', attribute: 'age-band', ageRange: { min: 65 }, name: '65 or older' },
      { id: 'late-pregnancy', kind: 'trigger', attribute: 'pregnancy', trimester: 3, name: 'Third trimester' },
      { id: 'lab-one', kind: 'lab-test', name: 'Lab one' },
      { id: 'scan-one', kind: 'imaging', name: 'Scan one' },
      { id: 'guide-one', kind: 'evidence', name: 'Guide one' },
      { id: 'spec-one', kind: 'specialist', name: 'Specialist one' },
    ],
    facts: [
      { subject: 'alpha-fever', relation: 'has-urgency', object: 'urgent' },
      { subject: 'alpha-fever', relation: 'has-symptom', object: 'fever' },
      { subject: 'alpha-fever', relation: 'has-symptom', object: 'cough' },
      { subject: 'alpha-fever', relation: 'red-flag-symptom', object: 'cough' },
      { subject: 'alpha-fever', relation: 'has-treatment', object: 'drug-b' },

      { subject: 'beta-flu', relation: 'has-urgency', object: 'common' },
      { subject: 'beta-flu', relation: 'has-symptom', object: 'fever' },
      { subject: 'beta-flu', relation: 'has-symptom', object: 'cough' },
      { subject: 'beta-flu', relation: 'has-symptom', object: 'headache' },
      { subject: 'beta-flu', relation: 'red-flag-symptom', object: 'cough' },
      { subject: 'beta-flu', relation: 'has-treatment', object: 'rest' },
      { subject: 'beta-flu', relation: 'differential-from', object: 'gamma-crit' },

      { subject: 'gamma-crit', relation: 'has-urgency', object: 'critical' },
      { subject: 'gamma-crit', relation: 'time-sensitive', object: 2 },
      { subject: 'gamma-crit', relation: 'has-symptom', object: 'fever' },
      { subject: 'gamma-crit', relation: 'has-symptom', object: 'headache' },
      { subject: 'gamma-crit', relation: 'has-symptom', object: 'stiff-neck' },
      { subject: 'gamma-crit', relation: 'has-symptom', object: 'rash' },
      { subject: 'gamma-crit', relation: 'red-flag-symptom', object: 'stiff-neck' },
      { subject: 'gamma-crit', relation: 'red-flag-symptom', object: 'rash' },
      { subject: 'gamma-crit', relation: 'has-treatment', object: 'drug-a' },
      { subject: 'gamma-crit', relation: 'differential-from', object: 'beta-flu' },
      { subject: 'gamma-crit', relation: 'evidence-source', object: 'guide-one' },
      { subject: 'gamma-crit', relation: 'requires-lab-test', object: 'lab-one', rationale: 'Confirms the crisis' },
      { subject: 'gamma-crit', relation: 'requires-imaging', object: 'scan-one' },
      { subject: 'gamma-crit', relation: 'refers-to-specialist', object: 'spec-one' },

      { subject: 'drug-a', relation: 'contraindication', object: 'bleeding', severity: 'absolute' },
      { subject: 'drug-a', relation: 'contraindication', object: 'allergy-a', severity: 'caution' },
      { subject: 'drug-a', relation: 'contraindication', object: 'late-pregnancy', severity: 'absolute' },
      { subject: 'drug-a', relation: 'drug-interaction', object: 'med-x', severity: 'major', guidance: 'Monitor closely' },
      { subject: 'med-x', relation: 'drug-interaction', object: 'drug-b', severity: 'minor', guidance: 'Space doses' },
      { subject: 'drug-a', relation: 'requires-dose-adjustment', object: 'kidney', guidance: 'Halve the dose' },
      { subject: 'drug-a', relation: 'requires-dose-adjustment', object: 'elderly', guidance: 'Start low' },
      { subject: 'drug-a', relation: 'evidence-source', object: 'guide-one' },
    ],
  };
}

export type MiniDocument = ReturnType<typeof miniDocument>;

export function miniStore(doc: unknown = miniDocument()): FactStore {
  return loadFactStore({ kind: 'document', document: doc, origin: 'fixture' });
}

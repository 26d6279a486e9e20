import path from 'path';
import { fileURLToPath } from 'url';
import { describe, expect, test } from 'vitest';

import { miniDocument, miniStore } from '../__fixtures__/graph.js';
import { LoadError } from '../errors.js';
import { loadFactStore } from './knowledge.js';

const KNOWLEDGE_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..', 'knowledge');

function loadError(doc: unknown): LoadError {
  try {
    miniStore(doc);
  } catch (err) {
    if (err instanceof LoadError) return err;
    throw err;
  }
  throw new Error('expected a LoadError');
}

describe('loadFactStore', () => {
  test('loads the fixture graph', () => {
    const store = miniStore();
    expect(store.size).toBe(miniDocument().facts.length);
    expect(store.metadata.version).toBe('test-1');
    expect(store.metadata.origin).toBe('fixture');
    expect(store.metadata.fingerprint).toMatch(/^[0-9a-f]{12}$/);
  });

  test('fingerprint is stable across loads and ignores record order', () => {
    const a = miniStore().metadata.fingerprint;
    const doc = miniDocument();
    doc.facts.reverse();
    doc.entities.reverse();
    expect(miniStore().metadata.fingerprint).toBe(a);
    expect(miniStore(doc).metadata.fingerprint).toBe(a);
  });

  test('fingerprint changes with the version', () => {
    const doc = miniDocument();
    doc.version = 'test-2';
    expect(miniStore(doc).metadata.fingerprint).not.toBe(miniStore().metadata.fingerprint);
  });

  test('fingerprint changes when a rule severity changes', () => {
    const doc = miniDocument();
    for (const f of doc.facts) {
      if (f.subject === 'drug-a' && f.relation === 'contraindication' && f.object === 'allergy-a') f.severity = 'absolute';
    }
    const store = miniStore(doc);
    expect(store.findFact('drug-a', 'contraindication', 'allergy-a')?.severity).toBe('absolute');
    expect(store.metadata.fingerprint).not.toBe(miniStore().metadata.fingerprint);
  });

  test('fingerprint changes when guidance or rationale text changes', () => {
    const base = miniStore().metadata.fingerprint;
    const guidance = miniDocument();
    for (const f of guidance.facts) {
      if (f.relation === 'drug-interaction' && f.subject === 'drug-a') f.guidance = 'Avoid together';
    }
    const rationale = miniDocument();
    for (const f of rationale.facts) {
      if (f.relation === 'requires-lab-test') f.rationale = 'Rules out the crisis';
    }
    expect(miniStore(guidance).metadata.fingerprint).not.toBe(base);
    expect(miniStore(rationale).metadata.fingerprint).not.toBe(base);
  });

  test('rejects a document that fails the schema', () => {
    const err = loadError({ version: 'x', entities: [{ id: 'Bad Id', kind: 'symptom' }], facts: [] });
    expect(err.code).toBe('LOAD_ERROR');
    expect(err.message).toBe('Malformed fact source: entities.0.id: must be a lowercase hyphenated token');
  });

  test('rejects duplicate entities', () => {
    const doc = miniDocument();
    doc.entities.push({ id: 'fever', kind: 'symptom' });
    expect(loadError(doc).message).toBe('Duplicate entity "fever"');
  });

  test('rejects an unknown relation', () => {
    const doc = miniDocument();
    doc.facts.push({ subject: 'beta-flu', relation: 'causes', object: 'fever' });
    const err = loadError(doc);
    expect(err.message).toBe('Unknown relation "causes"');
    expect(err.context.relation).toBe('causes');
  });

  test('rejects a fact naming an undefined entity', () => {
    const doc = miniDocument();
    doc.facts.push({ subject: 'beta-flu', relation: 'has-symptom', object: 'sneezing' });
    expect(loadError(doc).message).toBe('Fact references undefined object "sneezing"');
  });

  test('rejects an object of the wrong kind', () => {
    const doc = miniDocument();
    doc.facts.push({ subject: 'beta-flu', relation: 'has-treatment', object: 'fever' });
    expect(loadError(doc).message).toBe('Relation has-treatment cannot have a symptom as object');
  });

  test('rejects a contraindication without a valid severity', () => {
    const doc = miniDocument();
    doc.facts.push({ subject: 'drug-b', relation: 'contraindication', object: 'bleeding', severity: 'major' });
    expect(loadError(doc).message).toBe('contraindication needs severity absolute|caution');
  });

  test('rejects a duplicate fact', () => {
    const doc = miniDocument();
    doc.facts.push({ subject: 'beta-flu', relation: 'has-symptom', object: 'fever' });
    expect(loadError(doc).message).toBe('Duplicate fact has-symptom(beta-flu,fever)');
  });

  test('rejects a red flag that is not a symptom of the condition', () => {
    const doc = miniDocument();
    doc.facts.push({ subject: 'alpha-fever', relation: 'red-flag-symptom', object: 'rash' });
    const err = loadError(doc);
    expect(err.message).toBe("Red flag is not one of the condition's symptoms");
    expect(err.context).toEqual({ condition: 'alpha-fever', relation: 'red-flag-symptom', symptom: 'rash' });
  });

  test('rejects a condition without exactly one urgency', () => {
    const doc = miniDocument();
    doc.facts = doc.facts.filter(f => !(f.subject === 'beta-flu' && f.relation === 'has-urgency'));
    expect(loadError(doc).context).toEqual({ condition: 'beta-flu', found: 0 });
  });

  test('rejects a non-integer time-sensitive window', () => {
    const doc = miniDocument();
    doc.facts.push({ subject: 'alpha-fever', relation: 'time-sensitive', object: 1.5 });
    expect(loadError(doc).message).toBe('time-sensitive hours must be a positive integer');
  });

  test('rejects a treatment no condition links to', () => {
    const doc = miniDocument();
    doc.entities.push({ id: 'orphan', kind: 'treatment', name: 'Orphan' });
    expect(loadError(doc).context).toEqual({ treatment: 'orphan', relation: 'has-treatment' });
  });

  test('reports an unreadable file', () => {
    expect(() => loadFactStore({ kind: 'file', path: path.join(KNOWLEDGE_DIR, 'missing.json') })).toThrow(LoadError);
  });

  test('loads the bundled knowledge base', () => {
    const store = loadFactStore({ kind: 'file', path: path.join(KNOWLEDGE_DIR, 'facts.json') });
    expect(store.metadata.version).toBe('1.3.0');
    expect(store.listEntities('condition')).toContain('meningitis');
  });
});

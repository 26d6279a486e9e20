import { describe, expect, test } from 'vitest';

import { miniDocument, miniStore } from '../__fixtures__/graph.js';
import { InvalidQueryError } from '../errors.js';
import { matchConditions } from './matcher.js';
import { rankDifferential, resolveLimit } from './ranker.js';

describe('rankDifferential', () => {
  const store = miniStore();
  const rank = (symptoms: string[], limit?: number) =>
    rankDifferential(matchConditions(symptoms, store).matches, store, { limit });

  test('orders by confidence and reports missing symptoms', () => {
    const ranked = rank(['fever', 'stiff-neck', 'rash']);
    expect(ranked.map(c => [c.conditionId, c.confidence])).toEqual([
      ['gamma-crit', 0.95],
      ['alpha-fever', 0.5],
      ['beta-flu', 0.3333],
    ]);
    expect(ranked[0]?.missingSymptoms).toEqual(['headache']);
    expect(ranked[0]?.matchedRedFlags).toEqual(['rash', 'stiff-neck']);
    expect(ranked[0]?.timeSensitiveHours).toBe(2);
  });

  test('keeps a partial match below a complete one', () => {
    const ranked = rank(['fever', 'cough']);
    expect(ranked.map(c => [c.conditionId, c.confidence])).toEqual([
      ['alpha-fever', 1],
      ['beta-flu', 0.7667],
      ['gamma-crit', 0.25],
    ]);
  });

  test('breaks confidence ties by severity', () => {
    const doc = miniDocument();
    doc.facts.push({ subject: 'alpha-fever', relation: 'has-symptom', object: 'headache' });
    const tied = miniStore(doc);
    const ranked = rankDifferential(matchConditions(['fever', 'headache'], tied).matches, tied, {});
    expect(ranked.map(c => [c.conditionId, c.confidence])).toEqual([
      ['alpha-fever', 0.6667],
      ['beta-flu', 0.6667],
      ['gamma-crit', 0.5],
    ]);
  });

  test('annotates a lower candidate recorded as a differential of a higher one', () => {
    const ranked = rank(['fever', 'cough']);
    expect(ranked[2]?.differentialOf).toEqual([
      { conditionId: 'beta-flu', factId: 'differential-from(gamma-crit,beta-flu)' },
    ]);
    expect(ranked[1]?.differentialOf).toEqual([]);
  });

  test('truncates to the limit', () => {
    expect(rank(['fever'], 2).map(c => c.conditionId)).toEqual(['alpha-fever', 'beta-flu']);
  });

  test('is empty when nothing matched', () => {
    expect(rank(['sneezing'])).toEqual([]);
  });

  test('rejects a non-positive or fractional limit', () => {
    expect(() => rank(['fever'], 0)).toThrow(InvalidQueryError);
    expect(() => resolveLimit(2.5, 5)).toThrow('limit must be a positive integer');
    expect(resolveLimit(undefined, 5)).toBe(5);
  });
});

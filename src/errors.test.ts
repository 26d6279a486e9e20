import { describe, expect, test } from 'vitest';

import { EngineError, InvalidQueryError, LoadError, UnknownTreatmentError, describeError } from './errors.js';

describe('errors', () => {
  test('carry a code and a context', () => {
    const err = new LoadError('Duplicate entity "fever"', { entity: 'fever' });
    expect(err).toBeInstanceOf(EngineError);
    expect(err.name).toBe('LoadError');
    expect(err.code).toBe('LOAD_ERROR');
    expect(describeError(err)).toBe('LOAD_ERROR: Duplicate entity "fever" (entity=fever)');
  });

  test('describe errors without context', () => {
    expect(describeError(new InvalidQueryError('bad'))).toBe('INVALID_QUERY: bad');
    expect(describeError(new UnknownTreatmentError('x'))).toBe('UNKNOWN_TREATMENT: Unknown treatment "x" (treatmentId=x)');
    expect(describeError(new Error('plain'))).toBe('plain');
    expect(describeError('text')).toBe('text');
  });
});

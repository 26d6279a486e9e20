import express from 'express';
import { z } from 'zod';

import type { FactStore } from '../reasoner/factStore.js';
import { normalizeSymptoms } from '../reasoner/matcher.js';
import { resolveLimit } from '../reasoner/ranker.js';
import { handle, parseBody, sendCached, type RouteDeps } from './http.js';

const SymptomsBody = z.object({ symptoms: z.array(z.string()) });
const DifferentialBody = SymptomsBody.extend({ limit: z.number().optional() });
const ExplainBody = SymptomsBody.extend({ conditionId: z.string(), profile: z.unknown().optional() });
const TriageBody = SymptomsBody.extend({ age: z.number().nonnegative().max(150).optional() });

export default function diagnosisRoutes({ engine, cache }: RouteDeps) {
  const router = express.Router();

  // The key and the computation share one snapshot, so a reload mid-request
  // cannot file a new result under the old fingerprint.
  const cacheKey = (op: string, store: FactStore, symptoms: string[], extra = '') =>
    `${op}:${store.metadata.fingerprint}:${[...symptoms].sort().join(',')}${extra}`;

  router.post('/conditions/match', handle(async (req, res) => {
    const symptoms = normalizeSymptoms(parseBody(SymptomsBody, req.body).symptoms);
    const store = engine.snapshot();
    const body = await cache.getOrCompute(cacheKey('match', store, symptoms), () => ({
      scores: engine.findConditionsBySymptoms(symptoms, store),
    }));
    sendCached(res, body);
  }));

  router.post('/differential', handle(async (req, res) => {
    const input = parseBody(DifferentialBody, req.body);
    const symptoms = normalizeSymptoms(input.symptoms);
    const limit = input.limit === undefined ? undefined : resolveLimit(input.limit, 1);
    const store = engine.snapshot();
    const body = await cache.getOrCompute(cacheKey('differential', store, symptoms, `:${limit ?? 'default'}`), () => ({
      candidates: engine.generateDifferential(symptoms, limit, store),
    }));
    sendCached(res, body);
  }));

  router.post('/explain', handle((req, res) => {
    const input = parseBody(ExplainBody, req.body);
    res.json(engine.generateReasoningChain(input.symptoms, input.conditionId, input.profile));
  }));

  router.post('/triage', handle(async (req, res) => {
    const input = parseBody(TriageBody, req.body);
    res.json(await engine.assessUrgency(input.symptoms, input.age));
  }));

  return router;
}

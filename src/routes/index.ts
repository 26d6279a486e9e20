import express from 'express';

import conditionRoutes from './conditions.js';
import diagnosisRoutes from './diagnosis.js';
import type { RouteDeps } from './http.js';
import knowledgeRoutes from './knowledge.js';
import treatmentRoutes from './treatments.js';

export function createRouter(deps: RouteDeps) {
  const router = express.Router();
  router.use('/knowledge', knowledgeRoutes(deps));
  router.use('/treatments', treatmentRoutes(deps));
  router.use(diagnosisRoutes(deps));
  router.use(conditionRoutes(deps));
  return router;
}

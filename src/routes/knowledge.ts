import express from 'express';

import { createLogger } from '../logger.js';
import { handle, type RouteDeps } from './http.js';

const log = createLogger('knowledge');

export default function knowledgeRoutes({ engine }: RouteDeps) {
  const router = express.Router();

  router.get('/', handle((_req, res) => {
    res.json(engine.describeKnowledge());
  }));

  // Swaps in a freshly loaded snapshot; a failed load keeps the current one.
  router.post('/reload', handle((req, res) => {
    const summary = engine.reload();
    log.info(`reload requested by ${req.ip ?? 'unknown'}: now ${summary.version} (${summary.fingerprint})`);
    res.json(summary);
  }));

  return router;
}

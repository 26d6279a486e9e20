import express from 'express';
import { z } from 'zod';

import { handle, parseBody, type RouteDeps } from './http.js';

const ValidateBody = z.object({ profile: z.unknown().optional() });

export default function treatmentRoutes({ engine }: RouteDeps) {
  const router = express.Router();

  router.get('/', handle((_req, res) => {
    res.json({ treatments: engine.getAllTreatments() });
  }));

  router.post('/:id/validate', handle((req, res) => {
    const { profile } = parseBody(ValidateBody, req.body);
    res.json(engine.validateTreatment(req.params.id, profile ?? {}));
  }));

  return router;
}

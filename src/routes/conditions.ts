import express from 'express';

import { handle, type RouteDeps } from './http.js';

export default function conditionRoutes({ engine }: RouteDeps) {
  const router = express.Router();

  router.get('/conditions', handle((_req, res) => {
    res.json({ conditions: engine.getAllConditions() });
  }));

  router.get('/conditions/emergency', handle((_req, res) => {
    res.json({ conditions: engine.findEmergencyConditions() });
  }));

  router.get('/conditions/:id', handle((req, res) => {
    res.json(engine.describeCondition(req.params.id));
  }));

  router.get('/conditions/:id/red-flags', handle((req, res) => {
    res.json({ conditionId: req.params.id, redFlags: engine.findRedFlagSymptoms(req.params.id) });
  }));

  router.get('/conditions/:id/lab-tests', handle((req, res) => {
    res.json({ conditionId: req.params.id, labTests: engine.findLabTests(req.params.id) });
  }));

  router.get('/conditions/:id/imaging', handle((req, res) => {
    res.json({ conditionId: req.params.id, imaging: engine.findImagingRequirements(req.params.id) });
  }));

  router.get('/conditions/:id/treatments', handle((req, res) => {
    res.json({ conditionId: req.params.id, treatments: engine.findTreatments(req.params.id) });
  }));

  router.get('/conditions/:id/referral', handle((req, res) => {
    res.json(engine.recommendSpecialists(req.params.id, req.query.level));
  }));

  router.get('/conditions/:id/follow-up', handle((req, res) => {
    res.json(engine.planFollowUp(req.params.id, req.query.level));
  }));

  router.get('/lab-tests', handle((_req, res) => {
    res.json({ labTests: engine.getAllLabTests() });
  }));

  router.get('/imaging', handle((_req, res) => {
    res.json({ imaging: engine.getAllImaging() });
  }));

  router.get('/symptoms', handle((_req, res) => {
    res.json({ symptoms: engine.getAllSymptoms() });
  }));

  return router;
}

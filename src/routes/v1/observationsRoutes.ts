import { Router } from 'express';
import { createObservationsController, type ObservationsControllerDeps } from '../../controllers/observationsController.js';
import { ingestRateLimit } from '../../middleware/rateLimit.js';
import { requireApiKey } from '../../middleware/requireApiKey.js';

export function createObservationsRoutes(deps: ObservationsControllerDeps & { ingestApiKey: string }) {
  const controller = createObservationsController(deps);
  const routes = Router();

  routes.post('/process', ingestRateLimit, requireApiKey(deps.ingestApiKey), controller.processObservations);
  routes.post('/enqueue', ingestRateLimit, requireApiKey(deps.ingestApiKey), controller.enqueueObservations);
  routes.post('/enrich', controller.enrichObservation);

  return routes;
}

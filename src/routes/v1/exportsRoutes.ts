import { Router } from 'express';
import { createExportsController, type ExportsControllerDeps } from '../../controllers/exportsController.js';
import { requireApiKey } from '../../middleware/requireApiKey.js';

export function createExportsRoutes(deps: ExportsControllerDeps & { ingestApiKey: string }) {
  const controller = createExportsController(deps);
  const routes = Router();

  routes.post('/run', requireApiKey(deps.ingestApiKey), controller.runExport);
  routes.post('/preview', controller.previewReports);

  return routes;
}

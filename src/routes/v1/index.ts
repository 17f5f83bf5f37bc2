import { Router } from 'express';
import type { ExportsControllerDeps } from '../../controllers/exportsController.js';
import type { ObservationsControllerDeps } from '../../controllers/observationsController.js';
import { createExportsRoutes } from './exportsRoutes.js';
import { createObservationsRoutes } from './observationsRoutes.js';
import { opsRoutes } from './opsRoutes.js';

export type V1Dependencies = ObservationsControllerDeps & ExportsControllerDeps & { ingestApiKey: string };

export function createV1Routes(deps: V1Dependencies) {
  const v1Routes = Router();

  v1Routes.use('/observations', createObservationsRoutes(deps));
  v1Routes.use('/exports', createExportsRoutes(deps));
  v1Routes.use('/ops', opsRoutes);

  return v1Routes;
}

import type { Request, Response } from 'express';
import { getDependencySnapshots, getPipelineCounters, getRouteSnapshots } from '../observability/metrics.js';

export function getOpsMetrics(_req: Request, res: Response) {
  return res.json({
    routes: getRouteSnapshots(),
    dependencies: getDependencySnapshots(),
    pipeline: getPipelineCounters()
  });
}

import express from 'express';
import cors from 'cors';
import { createV1Routes, type V1Dependencies } from './routes/v1/index.js';
import { apiRateLimit } from './middleware/rateLimit.js';
import { auditLogger } from './middleware/audit.js';
import { errorHandler } from './middleware/errorHandler.js';
import { requestContext, responseWrapper } from './middleware/requestContext.js';
import { createRouteMetricMiddleware } from './observability/metrics.js';
import { createRequestSpanMiddleware } from './observability/tracing.js';

export type AppDependencies = V1Dependencies & {
  corsOrigin?: string;
};

export function createApp(deps: AppDependencies) {
  const app = express();

  app.use(requestContext);
  app.use(responseWrapper);

  app.use(cors({
    origin: deps.corsOrigin ?? false
  }));

  app.use(express.json({ limit: '2mb' }));
  app.use(createRequestSpanMiddleware());
  app.use(apiRateLimit);
  app.use(auditLogger);
  app.use(createRouteMetricMiddleware());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/v1', createV1Routes(deps));

  app.use((_req, res) => {
    res.status(404).json({ error: { code: 'NOT_FOUND', message: 'Route not found' } });
  });

  app.use(errorHandler);

  return app;
}

import express from 'express';
import helmet from 'helmet';
import type { CompositionRoot } from './app/composition-root';
import { createHealthRoutes } from './routes/health.routes';
import { createRetentionRoutes } from './routes/retention.routes';
import { createHealthController } from './controllers/health.controller';
import { traceIdMiddleware } from './middleware/trace-id.middleware';
import { requestLoggingMiddleware } from './middleware/request-logging.middleware';
import { errorHandler, notFoundHandler } from './middleware/error-handler.middleware';

export function createApp(root: CompositionRoot): express.Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(traceIdMiddleware);
  app.use(requestLoggingMiddleware);
  app.use(helmet());
  app.use(express.json({ limit: '16kb' }));

  app.get('/metrics', createHealthController(root.worker).getMetrics);

  app.use('/api/v1/health', createHealthRoutes(root.worker));
  app.use('/api/v1/retention', createRetentionRoutes(root));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

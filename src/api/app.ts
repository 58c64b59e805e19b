import express from 'express';
import { setupOpenAPI } from './openapi/index.js';
import { createReviewRouter, type ReviewRouterDeps } from './routes/reviews.js';
import { requestLogger } from './middleware/request-logger.js';
import { errorHandler } from './middleware/error-handler.js';

export function createApp(deps: ReviewRouterDeps): express.Express {
  const app = express();

  app.use(express.json({ limit: '10mb' }));
  app.use(requestLogger);

  setupOpenAPI(app);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', persistence: deps.db !== null, timestamp: new Date().toISOString() });
  });

  app.use(createReviewRouter(deps));

  app.use(errorHandler);

  return app;
}

import express from 'express';
import { createExecutionRouter, type ExecutionRouterOptions } from './api/executionRouter';
import { createHealthRouter } from './health';
import { errorHandler } from './middleware/errorHandler';

/**
 * Express app serving the execution API. Startup concerns (env, Sentry,
 * process handlers, listening) live in `index.ts`.
 */
export function createApp(options: ExecutionRouterOptions): express.Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.use(
    createHealthRouter({
      sessionStore: options.sessionStore,
      graphNames: options.graphs.map((graph) => graph.name),
    }),
  );
  app.use('/api', createExecutionRouter(options));

  app.use((_req, res) => {
    res.status(404).json({ status: 'error', statusCode: 404, message: 'Not found' });
  });
  app.use(errorHandler);

  return app;
}

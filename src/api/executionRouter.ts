import { NextFunction, Request, Response, Router } from 'express';
import { z } from 'zod';
import { AppError } from '../middleware/errorHandler';
import { GraphEngine, type EngineOptions } from '../services/stategraph/engine';
import { ExecutionBusyError, ExecutionNotFoundError } from '../services/stategraph/errors';
import type { StateGraph } from '../services/stategraph/graph';
import type { ExecutionSnapshot, SessionStore } from '../services/stategraph/sessionStore';
import type { ExecutionResult } from '../services/stategraph/types';
import logger from '../utils/logger';

export interface ExecutionRouterOptions {
  graphs: readonly StateGraph[];
  sessionStore: SessionStore;
  engineOptions?: Omit<EngineOptions, 'executionId' | 'sessionStore'>;
}

const startSchema = z.object({
  graph: z.string().min(1),
  input: z.unknown().optional(),
  userInputs: z.record(z.unknown()).optional(),
});

const inputSchema = z
  .object({ input: z.unknown() })
  .refine((body) => body.input !== undefined, { message: 'input is required', path: ['input'] });

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

function asyncRoute(handler: AsyncRoute) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

/** JSON body for an execution result; failures carry the error's name and message. */
export function serializeResult(result: ExecutionResult): Record<string, unknown> {
  if (result.status === 'failed') {
    const { error, ...rest } = result;
    return { ...rest, error: { name: error.name, message: error.message } };
  }
  return { ...result };
}

export function createExecutionRouter(options: ExecutionRouterOptions): Router {
  const router = Router();
  const graphs = new Map(options.graphs.map((graph): [string, StateGraph] => [graph.name, graph]));
  const { sessionStore } = options;
  // Executions with a resume or abandon in progress in this process.
  const busy = new Set<string>();

  async function exclusive<T>(executionId: string, work: () => Promise<T>): Promise<T> {
    if (busy.has(executionId)) {
      throw new ExecutionBusyError(executionId);
    }
    busy.add(executionId);
    try {
      return await work();
    } finally {
      busy.delete(executionId);
    }
  }

  function graphFor(name: string): StateGraph {
    const graph = graphs.get(name);
    if (!graph) {
      throw new AppError(`Unknown graph: ${name}`, 404);
    }
    return graph;
  }

  async function loadSnapshot(executionId: string): Promise<ExecutionSnapshot> {
    const snapshot = await sessionStore.load(executionId);
    if (!snapshot) {
      throw new ExecutionNotFoundError(executionId);
    }
    return snapshot;
  }

  async function restore(executionId: string): Promise<GraphEngine> {
    const snapshot = await loadSnapshot(executionId);
    return GraphEngine.restore(graphFor(snapshot.graphName), snapshot, {
      ...options.engineOptions,
      sessionStore,
    });
  }

  router.get('/graphs', (_req: Request, res: Response) => {
    res.json({ graphs: [...graphs.values()].map((graph) => graph.describe()) });
  });

  router.post(
    '/executions',
    asyncRoute(async (req, res) => {
      const body = startSchema.parse(req.body);
      const engine = new GraphEngine(graphFor(body.graph), {
        ...options.engineOptions,
        sessionStore,
      });
      logger.http(`[ExecutionRouter] Starting ${body.graph} as ${engine.executionId}`);
      const result = await engine.run(body.input, { userInputs: body.userInputs });
      res.status(201).json(serializeResult(result));
    }),
  );

  router.post(
    '/executions/:id/input',
    asyncRoute(async (req, res) => {
      const body = inputSchema.parse(req.body);
      const result = await exclusive(req.params.id, async () => {
        const engine = await restore(req.params.id);
        return engine.provideUserInput(body.input);
      });
      res.json(serializeResult(result));
    }),
  );

  router.get(
    '/executions/:id',
    asyncRoute(async (req, res) => {
      const engine = await restore(req.params.id);
      res.json(serializeResult(engine.getResult()));
    }),
  );

  router.get(
    '/executions/:id/history',
    asyncRoute(async (req, res) => {
      const snapshot = await loadSnapshot(req.params.id);
      res.json({ executionId: snapshot.executionId, history: snapshot.store.history });
    }),
  );

  router.delete(
    '/executions/:id',
    asyncRoute(async (req, res) => {
      await exclusive(req.params.id, async () => {
        const engine = await restore(req.params.id);
        await engine.abandon();
      });
      res.status(204).end();
    }),
  );

  return router;
}

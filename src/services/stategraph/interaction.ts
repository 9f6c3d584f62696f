import logger from '../../utils/logger';
import type { GraphEngine } from './engine';
import { toEdgeRef } from './graph';
import type {
  ExecutionResult,
  GraphEdge,
  InteractionRequest,
  NodeOutputRecord,
  StateSnapshot,
} from './types';

/**
 * Build the request surfaced while an execution waits on `edge`. Choices a
 * node proposes under `options`, and a string `message`, are lifted out of
 * its output so callers need not know the node's field names.
 */
export function createInteractionRequest(
  executionId: string,
  edge: GraphEdge,
  nodeOutput: NodeOutputRecord | undefined,
  requestedAt: Date,
): InteractionRequest {
  const options = nodeOutput && Array.isArray(nodeOutput.options) ? [...nodeOutput.options] : [];
  const message = nodeOutput && typeof nodeOutput.message === 'string' ? nodeOutput.message : undefined;
  return {
    executionId,
    nodeId: edge.source,
    ...(nodeOutput ? { nodeOutput } : {}),
    options,
    ...(message !== undefined ? { message } : {}),
    edge: toEdgeRef(edge),
    requestedAt: requestedAt.toISOString(),
  };
}

export type InteractionResponder = (
  request: InteractionRequest,
  state: StateSnapshot,
) => unknown;

/** Answers with the first proposed option, or `null` when none were offered. */
export const firstOptionResponder: InteractionResponder = (request) =>
  request.options.length > 0 ? request.options[0] : null;

export interface DriveOptions {
  /** Entry input, used when the engine has not started yet. */
  entryInput?: unknown;
  maxInteractions?: number;
}

/**
 * Run an execution to a terminal state, answering every interaction request
 * through `responder`. Gives back the suspended result if the responder is
 * still being asked after `maxInteractions` answers.
 */
export async function driveExecution(
  engine: GraphEngine,
  responder: InteractionResponder,
  options: DriveOptions = {},
): Promise<ExecutionResult> {
  const maxInteractions = options.maxInteractions ?? 20;
  let result = engine.status === 'idle' ? await engine.run(options.entryInput) : engine.getResult();
  let answered = 0;

  while (result.status === 'suspended') {
    if (answered >= maxInteractions) {
      logger.warn(`[Interaction] Gave up on ${engine.executionId} after ${answered} answers`, {
        nodeId: result.request.nodeId,
      });
      return result;
    }
    const answer = await responder(result.request, result.state);
    answered += 1;
    logger.debug(`[Interaction] Answering ${result.request.nodeId}`, { answer });
    result = await engine.provideUserInput(answer);
  }
  return result;
}

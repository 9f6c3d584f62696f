import { AppError } from '../../middleware/errorHandler';
import type { ExecutionStatus } from './types';

export class GraphBuildError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class InvalidExecutionStateError extends AppError {
  readonly status: ExecutionStatus;

  constructor(action: string, status: ExecutionStatus, detail?: string) {
    super(
      `Cannot ${action}: execution is ${status}${detail ? ` (${detail})` : ''}`,
      409,
    );
    this.status = status;
  }
}

export class ExecutionNotFoundError extends AppError {
  constructor(executionId: string) {
    super(`Execution not found: ${executionId}`, 404);
  }
}

export class NodeExecutionError extends AppError {
  readonly nodeId: string;
  readonly originalError: unknown;

  constructor(nodeId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Node ${nodeId} failed: ${reason}`, 500);
    this.nodeId = nodeId;
    this.originalError = cause;
  }
}

export class NodeTimeoutError extends AppError {
  constructor(nodeId: string, timeoutMs: number) {
    super(`Node ${nodeId} timed out after ${timeoutMs}ms`, 504);
  }
}

export class StepLimitExceededError extends AppError {
  constructor(maxSteps: number) {
    super(`Execution exceeded max steps (${maxSteps})`, 500);
  }
}

export class EdgeEvaluationError extends AppError {
  readonly edgeId: string;

  constructor(edgeId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Condition on edge ${edgeId} threw: ${reason}`, 500);
    this.edgeId = edgeId;
  }
}

export class MalformedOutputError extends AppError {
  readonly nodeId: string;

  constructor(nodeId: string, reason: string) {
    super(`Malformed output from node ${nodeId}: ${reason}`, 422);
    this.nodeId = nodeId;
  }
}

export class PersistenceError extends AppError {
  constructor(message: string) {
    super(message, 503);
  }
}

export class InvalidUserInputError extends AppError {
  readonly nodeId: string;

  constructor(nodeId: string, reason: string) {
    super(`Invalid user input for ${nodeId}: ${reason}`, 400);
    this.nodeId = nodeId;
  }
}

export class ExecutionBusyError extends AppError {
  constructor(executionId: string) {
    super(`Execution ${executionId} is already being resumed`, 409);
  }
}

import { randomUUID } from 'crypto';
import { readEngineSetting, type EngineConfig } from '../../config/engineConfig';
import { reportExecutionFailure } from '../../sentry';
import logger from '../../utils/logger';
import { metrics } from '../../utils/metrics';
import { evaluateEdge } from './conditions';
import {
  EdgeEvaluationError,
  GraphBuildError,
  InvalidExecutionStateError,
  MalformedOutputError,
  NodeExecutionError,
  NodeTimeoutError,
  PersistenceError,
  StepLimitExceededError,
} from './errors';
import type { StateGraph } from './graph';
import { createInteractionRequest } from './interaction';
import { invokeNode } from './nodeRegistry';
import { parseExecutionSnapshot, type ExecutionSnapshot, type SessionStore } from './sessionStore';
import { StateStore } from './stateStore';
import type {
  CompletedResult,
  ExecutionResult,
  ExecutionStatus,
  ExecutionWarning,
  FailedResult,
  GraphEdge,
  HistoryEntry,
  InteractionRequest,
  NodeContext,
  RunningResult,
  StepResult,
  SuspendedResult,
  TraceEntry,
} from './types';

export interface EngineOptions extends Partial<EngineConfig> {
  executionId?: string;
  /** Notified with a snapshot on every suspension and terminal state. */
  sessionStore?: SessionStore;
  now?: () => Date;
}

export interface RunOptions {
  /** User input recorded before the first step, keyed by node id. */
  userInputs?: Record<string, unknown>;
}

/**
 * Explicit options win; the environment is read only for policies left
 * unset. An explicit `maxSteps: undefined` means unbounded.
 */
function resolveConfig(options: EngineOptions): EngineConfig {
  return {
    maxSteps: 'maxSteps' in options ? options.maxSteps : readEngineSetting('maxSteps'),
    nodeTimeoutMs: options.nodeTimeoutMs ?? readEngineSetting('nodeTimeoutMs'),
    malformedOutput: options.malformedOutput ?? readEngineSetting('malformedOutput'),
    userInputReuse: options.userInputReuse ?? readEngineSetting('userInputReuse'),
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Drives one execution of a graph.
 *
 * Status moves `idle -> running -> suspended | completed | failed`, and
 * `suspended -> running` when input arrives. Completed and failed are final:
 * start another execution with a new engine over the same graph.
 */
export class GraphEngine {
  readonly executionId: string;
  private _store: StateStore;
  private readonly config: EngineConfig;
  private readonly sessionStore?: SessionStore;
  private readonly now: () => Date;

  private _status: ExecutionStatus = 'idle';
  private currentNodeId: string | null = null;
  private pendingEdgeId: string | null = null;
  private pendingRequest?: InteractionRequest;
  private failure?: { nodeId: string; error: Error };
  private steps = 0;
  private entryInput: unknown;
  private readonly visits = new Map<string, number>();
  private readonly consumedInputs = new Map<string, number>();
  private readonly trace: TraceEntry[] = [];
  private readonly warnings: ExecutionWarning[] = [];
  private abandoned = false;

  constructor(
    readonly graph: StateGraph,
    options: EngineOptions = {},
  ) {
    this.executionId = options.executionId ?? randomUUID();
    this.config = resolveConfig(options);
    this.sessionStore = options.sessionStore;
    this.now = options.now ?? (() => new Date());
    this._store = new StateStore(graph.fieldMapping, { now: this.now });
  }

  /**
   * Rebuild an engine from a persisted snapshot so a suspended execution can
   * resume in another process.
   */
  static restore(graph: StateGraph, snapshot: unknown, options: EngineOptions = {}): GraphEngine {
    const data = parseExecutionSnapshot(snapshot);
    if (data.graphName !== graph.name) {
      throw new GraphBuildError(
        `Snapshot of ${data.executionId} belongs to graph ${data.graphName}, not ${graph.name}`,
      );
    }

    const engine = new GraphEngine(graph, { ...options, executionId: data.executionId });
    engine._store = StateStore.fromSnapshot(graph.fieldMapping, data.store, { now: engine.now });
    engine._status = data.status;
    engine.currentNodeId = data.currentNodeId;
    engine.pendingEdgeId = data.pendingEdgeId;
    engine.steps = data.steps;
    for (const [nodeId, count] of Object.entries(data.visits)) engine.visits.set(nodeId, count);
    for (const [nodeId, seq] of Object.entries(data.consumedInputs)) {
      engine.consumedInputs.set(nodeId, seq);
    }
    engine.trace.push(...data.trace);
    engine.warnings.push(...data.warnings);

    if (data.status === 'suspended') {
      const edge = data.pendingEdgeId ? graph.getEdge(data.pendingEdgeId) : undefined;
      if (!edge) {
        throw new GraphBuildError(
          `Snapshot of ${data.executionId} waits on unknown edge: ${data.pendingEdgeId ?? '(none)'}`,
        );
      }
      engine.pendingRequest = createInteractionRequest(
        data.executionId,
        edge,
        engine._store.latestOutput(edge.source),
        new Date(data.updatedAt),
      );
    }
    if (data.status === 'failed' && data.error) {
      const error = new Error(data.error.message);
      error.name = data.error.name;
      engine.failure = { nodeId: data.error.nodeId, error };
    }

    logger.info(`[StateGraph] Restored execution ${data.executionId}`, {
      graph: graph.name,
      status: data.status,
      node: data.currentNodeId,
    });
    return engine;
  }

  get status(): ExecutionStatus {
    return this._status;
  }

  get store(): StateStore {
    return this._store;
  }

  getHistory(): readonly HistoryEntry[] {
    return this._store.getHistory();
  }

  async run(entryInput?: unknown, options: RunOptions = {}): Promise<ExecutionResult> {
    this.assertNotAbandoned('run');
    if (this._status !== 'idle') {
      throw new InvalidExecutionStateError('run', this._status);
    }
    const userInputs = Object.entries(options.userInputs ?? {});
    for (const [nodeId] of userInputs) {
      this.graph.getNode(nodeId);
    }
    for (const [nodeId, value] of userInputs) {
      this._store.recordUserInput(nodeId, value);
    }

    this._status = 'running';
    this.currentNodeId = this.graph.entryPoint;
    this.entryInput = entryInput;
    logger.info(`[StateGraph] Starting ${this.graph.name}`, {
      executionId: this.executionId,
      entryPoint: this.graph.entryPoint,
    });
    return this.drive();
  }

  /**
   * Record input for the node the execution is waiting on and re-evaluate the
   * blocking edge. If it is still false the execution stays suspended with a
   * refreshed request.
   */
  async provideUserInput(value: unknown): Promise<ExecutionResult> {
    this.assertNotAbandoned('provide user input');
    const edge = this.pendingEdgeId ? this.graph.getEdge(this.pendingEdgeId) : undefined;
    if (this._status !== 'suspended' || !edge) {
      throw new InvalidExecutionStateError('provide user input', this._status);
    }

    this._store.recordUserInput(edge.source, value);
    this._status = 'running';
    this.pendingRequest = undefined;

    let taken: boolean;
    try {
      taken = evaluateEdge(edge, this._store.getAll());
    } catch (error) {
      return this.fail(edge.source, new EdgeEvaluationError(edge.id, error));
    }
    if (!taken) {
      logger.info(`[StateGraph] ${edge.id} still false after input, staying suspended`);
      return this.suspend(edge);
    }

    this.consumeUserInput(edge.source);
    this.advance(edge);
    return this.drive();
  }

  /** Result of a suspended or finished execution. */
  getResult(): ExecutionResult {
    this.assertNotAbandoned('read result');
    if (this._status === 'suspended' && this.pendingRequest) {
      return this.suspendedResult(this.pendingRequest);
    }
    if (this._status === 'completed' && this.currentNodeId) {
      return this.completedResult(this.currentNodeId);
    }
    if (this._status === 'failed' && this.failure) {
      return this.failedResult(this.failure.nodeId, this.failure.error);
    }
    throw new InvalidExecutionStateError('read result', this._status);
  }

  /** Drop the persisted record. The engine refuses further calls. */
  async abandon(): Promise<void> {
    this.abandoned = true;
    this.pendingRequest = undefined;
    if (this.sessionStore) {
      try {
        await this.sessionStore.delete(this.executionId);
      } catch (error) {
        throw new PersistenceError(
          `Failed to delete execution ${this.executionId}: ${errorMessage(error)}`,
        );
      }
    }
    logger.info(`[StateGraph] Abandoned execution ${this.executionId}`, {
      status: this._status,
    });
  }

  toSnapshot(): ExecutionSnapshot {
    return {
      version: 1,
      executionId: this.executionId,
      graphName: this.graph.name,
      status: this._status,
      currentNodeId: this.currentNodeId,
      pendingEdgeId: this.pendingEdgeId,
      steps: this.steps,
      visits: Object.fromEntries(this.visits),
      consumedInputs: Object.fromEntries(this.consumedInputs),
      store: this._store.toSnapshot(),
      trace: [...this.trace],
      warnings: [...this.warnings],
      ...(this.failure
        ? {
            error: {
              name: this.failure.error.name,
              message: this.failure.error.message,
              nodeId: this.failure.nodeId,
            },
          }
        : {}),
      updatedAt: this.now().toISOString(),
    };
  }

  private async drive(): Promise<ExecutionResult> {
    for (;;) {
      const result = await this.step();
      if (result.status !== 'running') {
        return result;
      }
    }
  }

  private async step(): Promise<StepResult> {
    const nodeId = this.currentNodeId;
    if (nodeId === null) {
      throw new InvalidExecutionStateError('step', this._status, 'no current node');
    }
    const { maxSteps } = this.config;
    if (maxSteps !== undefined && this.steps >= maxSteps) {
      return this.fail(nodeId, new StepLimitExceededError(maxSteps));
    }

    const node = this.graph.getNode(nodeId);
    const isFirstStep = this.steps === 0;
    const visit = (this.visits.get(nodeId) ?? 0) + 1;
    this.visits.set(nodeId, visit);
    this.steps += 1;

    const context: NodeContext = {
      executionId: this.executionId,
      nodeId,
      state: this._store.getAll(),
      visit,
      ...(isFirstStep && this.entryInput !== undefined ? { input: this.entryInput } : {}),
    };
    this.entryInput = undefined;

    const started = this.now();
    let rawOutput: unknown;
    try {
      rawOutput = await invokeNode(node, context, this.config.nodeTimeoutMs);
    } catch (error) {
      this.recordTrace(nodeId, started, errorMessage(error));
      const failure = error instanceof NodeTimeoutError ? error : new NodeExecutionError(nodeId, error);
      return this.fail(nodeId, failure);
    }
    this.recordTrace(nodeId, started);
    metrics.increment('stategraph.node.invocations', { node: nodeId });

    const projection = this._store.project(nodeId, rawOutput);
    if (!projection.ok) {
      if (this.config.malformedOutput === 'fail') {
        return this.fail(nodeId, new MalformedOutputError(nodeId, projection.reason));
      }
      this.warnings.push({
        nodeId,
        kind: 'malformed_output',
        message: projection.reason,
        sequence: projection.sequence,
      });
    }

    return this.route(nodeId);
  }

  /** First true outgoing edge in registration order decides the next move. */
  private async route(nodeId: string): Promise<StepResult> {
    const snapshot = this._store.getAll();
    for (const edge of this.graph.outgoing(nodeId)) {
      let taken: boolean;
      try {
        taken = evaluateEdge(edge, snapshot);
      } catch (error) {
        return this.fail(nodeId, new EdgeEvaluationError(edge.id, error));
      }
      if (!taken) continue;

      if (edge.requiresUserInput && !this.consumeUserInput(edge.source)) {
        return this.suspend(edge);
      }
      return this.advance(edge);
    }
    return this.complete(nodeId);
  }

  /**
   * Marks the source node's user input as used by an edge. Under `once`
   * reuse a record counts only if it was written after the last one used.
   */
  private consumeUserInput(nodeId: string): boolean {
    const record = this._store.getUserInput(nodeId);
    if (!record) return false;
    const consumed = this.consumedInputs.get(nodeId) ?? 0;
    if (this.config.userInputReuse === 'once' && record.sequence <= consumed) {
      return false;
    }
    this.consumedInputs.set(nodeId, record.sequence);
    return true;
  }

  private advance(edge: GraphEdge): RunningResult {
    this.currentNodeId = edge.target;
    this.pendingEdgeId = null;
    logger.debug(`[StateGraph] ${edge.source} -> ${edge.target}`, { edge: edge.id });
    return { ...this.baseResult(), status: 'running', nodeId: edge.target };
  }

  private async suspend(edge: GraphEdge): Promise<SuspendedResult> {
    this._status = 'suspended';
    this.pendingEdgeId = edge.id;
    this.pendingRequest = createInteractionRequest(
      this.executionId,
      edge,
      this._store.latestOutput(edge.source),
      this.now(),
    );
    metrics.increment('stategraph.suspensions', { node: edge.source });
    logger.info(`[StateGraph] Waiting for input at ${edge.source}`, {
      executionId: this.executionId,
      edge: edge.id,
    });
    await this.persist();
    return this.suspendedResult(this.pendingRequest);
  }

  private async complete(nodeId: string): Promise<CompletedResult> {
    this._status = 'completed';
    this.currentNodeId = nodeId;
    this.pendingEdgeId = null;
    logger.info(`[StateGraph] Completed ${this.graph.name} at ${nodeId}`, {
      executionId: this.executionId,
      steps: this.steps,
    });
    await this.persist();
    return this.completedResult(nodeId);
  }

  private async fail(nodeId: string, error: Error): Promise<FailedResult> {
    this._status = 'failed';
    this.pendingEdgeId = null;
    this.failure = { nodeId, error };
    metrics.increment('stategraph.failures', { node: nodeId });
    logger.error(`[StateGraph] Execution failed at ${nodeId}: ${error.message}`, {
      executionId: this.executionId,
      error: error.name,
    });
    reportExecutionFailure(error, {
      executionId: this.executionId,
      graphName: this.graph.name,
      nodeId,
    });
    await this.persist();
    return this.failedResult(nodeId, error);
  }

  private async persist(): Promise<void> {
    if (!this.sessionStore) return;
    try {
      await this.sessionStore.save(this.executionId, this.toSnapshot());
    } catch (error) {
      throw new PersistenceError(
        `Failed to persist execution ${this.executionId}: ${errorMessage(error)}`,
      );
    }
  }

  private recordTrace(nodeId: string, started: Date, error?: string): void {
    const ended = this.now();
    this.trace.push({
      node: nodeId,
      startedAt: started.toISOString(),
      endedAt: ended.toISOString(),
      durationMs: ended.getTime() - started.getTime(),
      ...(error !== undefined ? { error } : {}),
    });
  }

  private baseResult() {
    return {
      executionId: this.executionId,
      graphName: this.graph.name,
      state: this._store.getAll(),
      steps: this.steps,
      trace: [...this.trace],
      warnings: [...this.warnings],
    };
  }

  private suspendedResult(request: InteractionRequest): SuspendedResult {
    return { ...this.baseResult(), status: 'suspended', request };
  }

  private completedResult(terminalNodeId: string): CompletedResult {
    return { ...this.baseResult(), status: 'completed', terminalNodeId };
  }

  private failedResult(nodeId: string, error: Error): FailedResult {
    return { ...this.baseResult(), status: 'failed', nodeId, error };
  }

  private assertNotAbandoned(action: string): void {
    if (this.abandoned) {
      throw new InvalidExecutionStateError(action, this._status, 'execution was abandoned');
    }
  }
}

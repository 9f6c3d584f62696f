export type GlobalState = Record<string, unknown>;

/** Read-only view of global state handed to handlers and predicates. */
export type StateSnapshot = Readonly<Record<string, unknown>>;

/** Raw field record captured from one node invocation. */
export type NodeOutputRecord = Readonly<Record<string, unknown>>;

export const RESULT_SUFFIX = '_result';
export const USER_INPUT_SUFFIX = '_user_input';

export function resultKey(nodeId: string): string {
  return `${nodeId}${RESULT_SUFFIX}`;
}

export function userInputKey(nodeId: string): string {
  return `${nodeId}${USER_INPUT_SUFFIX}`;
}

export type HistoryOperation = 'project' | 'user_input' | 'projection_failed';

export interface FieldSubstitution {
  field: string;
  rejected?: unknown;
  replacement?: unknown;
  reason: string;
}

export interface HistoryEntry {
  sequence: number;
  timestamp: string;
  nodeId: string;
  operation: HistoryOperation;
  changes: Readonly<Record<string, unknown>>;
  details?: {
    substitutions?: readonly FieldSubstitution[];
    error?: string;
  };
}

export interface UserInputRecord {
  input: unknown;
  timestamp: string;
  nodeId: string;
  nodeOutput?: NodeOutputRecord;
  /** History sequence of the entry that stored this record. */
  sequence: number;
}

export type ProjectionResult =
  | {
      ok: true;
      nodeId: string;
      output: NodeOutputRecord;
      changed: string[];
      substitutions: FieldSubstitution[];
      sequence: number;
    }
  | {
      ok: false;
      nodeId: string;
      reason: string;
      sequence: number;
    };

export interface NodeContext {
  executionId: string;
  nodeId: string;
  /** Entry input; only set on the first step of an execution. */
  input?: unknown;
  state: StateSnapshot;
  /** 1 on the first visit of this node, incremented on every revisit. */
  visit: number;
}

/**
 * A node returns a field record, or text embedding a JSON object.
 */
export type NodeHandler = (context: NodeContext) => unknown;

export interface GraphNode {
  id: string;
  handler: NodeHandler;
  description?: string;
}

export type EdgePredicate = (state: StateSnapshot) => boolean;

export interface GraphEdge {
  id: string;
  /** Position in build order; lower wins when several edges are true. */
  order: number;
  source: string;
  target: string;
  predicate: EdgePredicate;
  requiresUserInput: boolean;
  label?: string;
}

/** Serializable description of an edge. */
export interface EdgeRef {
  id: string;
  source: string;
  target: string;
  requiresUserInput: boolean;
  label?: string;
}

export type ExecutionStatus = 'idle' | 'running' | 'suspended' | 'completed' | 'failed';

export interface InteractionRequest {
  executionId: string;
  nodeId: string;
  nodeOutput?: NodeOutputRecord;
  options: unknown[];
  message?: string;
  edge: EdgeRef;
  requestedAt: string;
}

export interface TraceEntry {
  node: string;
  startedAt: string;
  endedAt: string;
  durationMs: number;
  error?: string;
}

export interface ExecutionWarning {
  nodeId: string;
  kind: 'malformed_output';
  message: string;
  sequence: number;
}

export interface ExecutionErrorInfo {
  name: string;
  message: string;
  nodeId: string;
}

interface ResultBase {
  executionId: string;
  graphName: string;
  state: StateSnapshot;
  steps: number;
  trace: TraceEntry[];
  warnings: ExecutionWarning[];
}

export interface RunningResult extends ResultBase {
  status: 'running';
  nodeId: string;
}

export interface SuspendedResult extends ResultBase {
  status: 'suspended';
  request: InteractionRequest;
}

export interface CompletedResult extends ResultBase {
  status: 'completed';
  terminalNodeId: string;
}

export interface FailedResult extends ResultBase {
  status: 'failed';
  nodeId: string;
  error: Error;
}

export type ExecutionResult = SuspendedResult | CompletedResult | FailedResult;

export type StepResult = RunningResult | ExecutionResult;

import { z } from 'zod';
import logger from '../../utils/logger';
import type { StoreSnapshot } from './stateStore';
import type {
  ExecutionErrorInfo,
  ExecutionStatus,
  ExecutionWarning,
  TraceEntry,
} from './types';

/**
 * Everything needed to resume an execution in another process: the store
 * contents plus a pointer to the current node and the edge being waited on.
 */
export interface ExecutionSnapshot {
  version: 1;
  executionId: string;
  graphName: string;
  status: ExecutionStatus;
  currentNodeId: string | null;
  pendingEdgeId: string | null;
  steps: number;
  visits: Record<string, number>;
  /** Per node, the sequence of the last user-input record an edge consumed. */
  consumedInputs: Record<string, number>;
  store: StoreSnapshot;
  trace: TraceEntry[];
  warnings: ExecutionWarning[];
  error?: ExecutionErrorInfo;
  updatedAt: string;
}

export interface SessionStore {
  save(executionId: string, snapshot: ExecutionSnapshot): Promise<void>;
  load(executionId: string): Promise<ExecutionSnapshot | null>;
  delete(executionId: string): Promise<void>;
}

const historyEntrySchema = z.object({
  sequence: z.number().int().positive(),
  timestamp: z.string(),
  nodeId: z.string(),
  operation: z.enum(['project', 'user_input', 'projection_failed']),
  changes: z.record(z.unknown()),
  details: z
    .object({
      substitutions: z
        .array(
          z.object({
            field: z.string(),
            rejected: z.unknown(),
            replacement: z.unknown(),
            reason: z.string(),
          }),
        )
        .optional(),
      error: z.string().optional(),
    })
    .optional(),
});

export const executionSnapshotSchema: z.ZodType<ExecutionSnapshot> = z.object({
  version: z.literal(1),
  executionId: z.string().min(1),
  graphName: z.string().min(1),
  status: z.enum(['idle', 'running', 'suspended', 'completed', 'failed']),
  currentNodeId: z.string().nullable(),
  pendingEdgeId: z.string().nullable(),
  steps: z.number().int().nonnegative(),
  visits: z.record(z.number().int().nonnegative()),
  consumedInputs: z.record(z.number().int().nonnegative()),
  store: z.object({
    state: z.record(z.unknown()),
    history: z.array(historyEntrySchema),
  }),
  trace: z.array(
    z.object({
      node: z.string(),
      startedAt: z.string(),
      endedAt: z.string(),
      durationMs: z.number(),
      error: z.string().optional(),
    }),
  ),
  warnings: z.array(
    z.object({
      nodeId: z.string(),
      kind: z.literal('malformed_output'),
      message: z.string(),
      sequence: z.number().int(),
    }),
  ),
  error: z
    .object({
      name: z.string(),
      message: z.string(),
      nodeId: z.string(),
    })
    .optional(),
  updatedAt: z.string(),
});

export function parseExecutionSnapshot(value: unknown): ExecutionSnapshot {
  return executionSnapshotSchema.parse(value);
}

/**
 * Process-local store. Snapshots are kept as JSON text so a loaded copy
 * never aliases the saved one.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, string>();

  async save(executionId: string, snapshot: ExecutionSnapshot): Promise<void> {
    this.sessions.set(executionId, JSON.stringify(snapshot));
    logger.debug(`[SessionStore] Saved ${executionId} (${snapshot.status})`);
  }

  async load(executionId: string): Promise<ExecutionSnapshot | null> {
    const raw = this.sessions.get(executionId);
    if (raw === undefined) return null;
    return parseExecutionSnapshot(JSON.parse(raw));
  }

  async delete(executionId: string): Promise<void> {
    this.sessions.delete(executionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}

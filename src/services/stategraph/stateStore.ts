import { isDeepStrictEqual } from 'util';
import logger from '../../utils/logger';
import { InvalidUserInputError } from './errors';
import { FieldMapping } from './fieldMapping';
import { isPlainRecord, jsonIncompatibility, parseNodeOutput } from './outputParser';
import {
  resultKey,
  userInputKey,
  type FieldSubstitution,
  type GlobalState,
  type HistoryEntry,
  type HistoryOperation,
  type NodeOutputRecord,
  type ProjectionResult,
  type StateSnapshot,
  type UserInputRecord,
} from './types';

export interface StoreSnapshot {
  state: GlobalState;
  history: HistoryEntry[];
}

export interface StateStoreOptions {
  now?: () => Date;
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function cloneFrozen<T>(value: T): T {
  return deepFreeze(structuredClone(value));
}

/** Splits off the fields of a node record that JSON cannot carry. */
function jsonSafeRecord(
  nodeId: string,
  record: NodeOutputRecord,
): { record: Record<string, unknown>; dropped: FieldSubstitution[] } {
  const safe: Record<string, unknown> = {};
  const dropped: FieldSubstitution[] = [];
  for (const [field, value] of Object.entries(record)) {
    const reason = jsonIncompatibility(value, field);
    if (reason === undefined) {
      safe[field] = value;
    } else {
      dropped.push({ field: `${resultKey(nodeId)}.${field}`, reason });
    }
  }
  return { record: safe, dropped };
}

/**
 * Global state for one execution.
 *
 * Every mutation goes through `project` or `recordUserInput`; both run to
 * completion synchronously and append exactly one history entry, so readers
 * never observe a partial projection and history is a total order.
 */
export class StateStore {
  private state: GlobalState = {};
  private readonly history: HistoryEntry[] = [];
  private readonly now: () => Date;

  constructor(
    readonly mapping: FieldMapping = FieldMapping.empty(),
    options: StateStoreOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  static fromSnapshot(
    mapping: FieldMapping,
    snapshot: StoreSnapshot,
    options: StateStoreOptions = {},
  ): StateStore {
    const store = new StateStore(mapping, options);
    store.state = structuredClone(snapshot.state);
    for (const entry of snapshot.history) {
      store.history.push(cloneFrozen(entry));
    }
    return store;
  }

  /**
   * Project a node's raw output into global state.
   *
   * Mapped fields are validated and written, the parsed record is kept
   * under `{nodeId}_result`. Values JSON cannot carry are replaced by the
   * field's default (mapped fields) or left out of the record, and listed as
   * substitutions. Output that is not a field record leaves state untouched
   * and is logged as `projection_failed`.
   */
  project(nodeId: string, rawOutput: unknown): ProjectionResult {
    const parsed = parseNodeOutput(rawOutput);
    if (!parsed.ok) {
      const entry = this.append(nodeId, 'projection_failed', {}, { error: parsed.reason });
      logger.warn(`[StateStore] Projection failed for ${nodeId}: ${parsed.reason}`);
      return { ok: false, nodeId, reason: parsed.reason, sequence: entry.sequence };
    }

    const { values, substitutions: rejected } = this.mapping.apply(nodeId, parsed.record);
    const { record, dropped } = jsonSafeRecord(nodeId, parsed.record);
    const output = cloneFrozen(record);
    const substitutions = [...rejected, ...dropped];

    const changes: Record<string, unknown> = {};
    for (const [field, value] of values) {
      if (!this.has(field) || !isDeepStrictEqual(this.state[field], value)) {
        changes[field] = value;
      }
    }
    const key = resultKey(nodeId);
    if (!this.has(key) || !isDeepStrictEqual(this.state[key], output)) {
      changes[key] = output;
    }

    const next: GlobalState = { ...this.state };
    for (const [field, value] of Object.entries(changes)) {
      next[field] = structuredClone(value);
    }
    this.state = next;

    const entry = this.append(
      nodeId,
      'project',
      changes,
      substitutions.length > 0 ? { substitutions } : undefined,
    );

    if (substitutions.length > 0) {
      logger.warn(`[StateStore] ${nodeId}: substituted defaults`, {
        fields: substitutions.map((s) => s.field),
      });
    }
    logger.debug(`[StateStore] ${nodeId} projected`, { changed: Object.keys(changes) });

    return {
      ok: true,
      nodeId,
      output,
      changed: Object.keys(changes),
      substitutions,
      sequence: entry.sequence,
    };
  }

  /**
   * Create or overwrite `{nodeId}_user_input`. The node's result record is
   * left as it is.
   */
  recordUserInput(nodeId: string, input: unknown): UserInputRecord {
    const issue = jsonIncompatibility(input, 'input');
    if (issue) {
      throw new InvalidUserInputError(nodeId, issue);
    }
    const sequence = this.history.length + 1;
    const nodeOutput = this.latestOutput(nodeId);
    const record: UserInputRecord = {
      input: structuredClone(input),
      timestamp: this.now().toISOString(),
      nodeId,
      ...(nodeOutput ? { nodeOutput } : {}),
      sequence,
    };
    const key = userInputKey(nodeId);
    this.state = { ...this.state, [key]: record };
    this.append(nodeId, 'user_input', { [key]: record });
    logger.info(`[StateStore] Recorded user input for ${nodeId}`);
    return cloneFrozen(record);
  }

  get(field: string): unknown {
    return this.has(field) ? structuredClone(this.state[field]) : undefined;
  }

  /** Deep copy of global state, detached from later writes. */
  getAll(): StateSnapshot {
    return cloneFrozen(this.state);
  }

  getResult(nodeId: string): NodeOutputRecord | undefined {
    const value = this.state[resultKey(nodeId)];
    return isPlainRecord(value) ? cloneFrozen(value) : undefined;
  }

  /**
   * Result record of the node's most recent visit, or undefined when that
   * visit's output could not be projected.
   */
  latestOutput(nodeId: string): NodeOutputRecord | undefined {
    for (let index = this.history.length - 1; index >= 0; index -= 1) {
      const entry = this.history[index];
      if (entry.nodeId !== nodeId) continue;
      if (entry.operation === 'projection_failed') return undefined;
      if (entry.operation === 'project') break;
    }
    return this.getResult(nodeId);
  }

  getUserInput(nodeId: string): UserInputRecord | undefined {
    const value = this.state[userInputKey(nodeId)];
    if (!isPlainRecord(value) || typeof value.sequence !== 'number') return undefined;
    return cloneFrozen({
      input: value.input,
      timestamp: String(value.timestamp),
      nodeId,
      ...(isPlainRecord(value.nodeOutput) ? { nodeOutput: value.nodeOutput } : {}),
      sequence: value.sequence,
    });
  }

  getHistory(): readonly HistoryEntry[] {
    return [...this.history];
  }

  toSnapshot(): StoreSnapshot {
    return {
      state: structuredClone(this.state),
      history: structuredClone(this.history),
    };
  }

  private has(field: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.state, field);
  }

  private append(
    nodeId: string,
    operation: HistoryOperation,
    changes: Record<string, unknown>,
    details?: HistoryEntry['details'],
  ): HistoryEntry {
    const entry: HistoryEntry = cloneFrozen({
      sequence: this.history.length + 1,
      timestamp: this.now().toISOString(),
      nodeId,
      operation,
      changes,
      ...(details ? { details } : {}),
    });
    this.history.push(entry);
    return entry;
  }
}

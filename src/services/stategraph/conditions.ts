import { z } from 'zod';
import logger from '../../utils/logger';
import { metrics } from '../../utils/metrics';
import { GraphBuildError } from './errors';
import { userInputKey, type EdgePredicate, type GraphEdge, type StateSnapshot } from './types';

export const CONDITION_OPERATORS = [
  'eq',
  'neq',
  'gt',
  'gte',
  'lt',
  'lte',
  'contains',
  'not_contains',
  'starts_with',
  'ends_with',
  'matches',
  'in',
  'not_in',
  'exists',
  'not_exists',
] as const;

export type ConditionOperator = (typeof CONDITION_OPERATORS)[number];

export interface Condition {
  field: string;
  operator: ConditionOperator;
  value?: unknown;
}

export interface ConditionGroup {
  logic: 'and' | 'or';
  conditions: (Condition | ConditionGroup)[];
}

const conditionSchema = z.object({
  field: z.string().min(1),
  operator: z.enum(CONDITION_OPERATORS),
  value: z.unknown().optional(),
});

export const conditionGroupSchema: z.ZodType<ConditionGroup> = z.lazy(() =>
  z.object({
    logic: z.enum(['and', 'or']),
    conditions: z.array(z.union([conditionSchema, conditionGroupSchema])),
  }),
);

/** Validate a condition group read from configuration or a request body. */
export function parseConditionGroup(input: unknown): ConditionGroup {
  const parsed = conditionGroupSchema.safeParse(input);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new GraphBuildError(`Invalid condition group: ${reason}`);
  }
  return parsed.data;
}

/**
 * Evaluate one edge against a snapshot. Predicates only read the frozen
 * snapshot, so calling this repeatedly has no effect on state.
 */
export function evaluateEdge(edge: GraphEdge, snapshot: StateSnapshot): boolean {
  metrics.increment('stategraph.edge.evaluations', { edge: edge.id });
  const result = edge.predicate(snapshot) === true;
  logger.debug(`[ConditionEval] ${edge.id} => ${result}`);
  return result;
}

export function getNestedValue(state: StateSnapshot, path: string): unknown {
  let current: unknown = state;
  for (const part of path.split('.')) {
    if (current === null || current === undefined || typeof current !== 'object') {
      return undefined;
    }
    current = Reflect.get(current, part);
  }
  return current;
}

function compareNumbers(
  fieldValue: unknown,
  conditionValue: unknown,
  compare: (a: number, b: number) => boolean,
): boolean {
  return typeof fieldValue === 'number' && typeof conditionValue === 'number'
    ? compare(fieldValue, conditionValue)
    : false;
}

function containsValue(fieldValue: unknown, conditionValue: unknown): boolean {
  if (typeof fieldValue === 'string' && typeof conditionValue === 'string') {
    return fieldValue.toLowerCase().includes(conditionValue.toLowerCase());
  }
  if (Array.isArray(fieldValue)) {
    return fieldValue.includes(conditionValue);
  }
  return false;
}

function evaluateOperator(
  fieldValue: unknown,
  operator: ConditionOperator,
  conditionValue: unknown,
): boolean {
  switch (operator) {
    case 'eq':
      return fieldValue === conditionValue;
    case 'neq':
      return fieldValue !== conditionValue;
    case 'gt':
      return compareNumbers(fieldValue, conditionValue, (a, b) => a > b);
    case 'gte':
      return compareNumbers(fieldValue, conditionValue, (a, b) => a >= b);
    case 'lt':
      return compareNumbers(fieldValue, conditionValue, (a, b) => a < b);
    case 'lte':
      return compareNumbers(fieldValue, conditionValue, (a, b) => a <= b);
    case 'contains':
      return containsValue(fieldValue, conditionValue);
    case 'not_contains':
      return !containsValue(fieldValue, conditionValue);
    case 'starts_with':
      return typeof fieldValue === 'string' && typeof conditionValue === 'string'
        ? fieldValue.toLowerCase().startsWith(conditionValue.toLowerCase())
        : false;
    case 'ends_with':
      return typeof fieldValue === 'string' && typeof conditionValue === 'string'
        ? fieldValue.toLowerCase().endsWith(conditionValue.toLowerCase())
        : false;
    case 'matches':
      if (typeof fieldValue === 'string' && typeof conditionValue === 'string') {
        try {
          return new RegExp(conditionValue, 'i').test(fieldValue);
        } catch {
          return false;
        }
      }
      return false;
    case 'in':
      return Array.isArray(conditionValue) ? conditionValue.includes(fieldValue) : false;
    case 'not_in':
      return Array.isArray(conditionValue) ? !conditionValue.includes(fieldValue) : true;
    case 'exists':
      return fieldValue !== undefined && fieldValue !== null;
    case 'not_exists':
      return fieldValue === undefined || fieldValue === null;
    default:
      return false;
  }
}

function isConditionGroup(item: Condition | ConditionGroup): item is ConditionGroup {
  return 'logic' in item && 'conditions' in item;
}

export function evaluateConditionGroup(group: ConditionGroup, state: StateSnapshot): boolean {
  if (group.conditions.length === 0) {
    return true;
  }
  const check = (item: Condition | ConditionGroup): boolean =>
    isConditionGroup(item)
      ? evaluateConditionGroup(item, state)
      : evaluateOperator(getNestedValue(state, item.field), item.operator, item.value);
  return group.logic === 'and' ? group.conditions.every(check) : group.conditions.some(check);
}

/** Validate a serializable condition group and turn it into an edge predicate. */
export function compileCondition(group: unknown): EdgePredicate {
  const checked = parseConditionGroup(group);
  return (state) => evaluateConditionGroup(checked, state);
}

export const always: EdgePredicate = () => true;

export function fieldEquals(field: string, value: unknown): EdgePredicate {
  return (state) => getNestedValue(state, field) === value;
}

/** True when every listed field equals the given value. */
export function whenState(expected: Record<string, unknown>): EdgePredicate {
  const entries = Object.entries(expected);
  return (state) => entries.every(([field, value]) => getNestedValue(state, field) === value);
}

export function allOf(...predicates: EdgePredicate[]): EdgePredicate {
  return (state) => predicates.every((predicate) => predicate(state));
}

export function anyOf(...predicates: EdgePredicate[]): EdgePredicate {
  return (state) => predicates.some((predicate) => predicate(state));
}

export function not(predicate: EdgePredicate): EdgePredicate {
  return (state) => !predicate(state);
}

export function hasUserInput(nodeId: string): EdgePredicate {
  return (state) => {
    const record = state[userInputKey(nodeId)];
    return record !== undefined && record !== null;
  };
}

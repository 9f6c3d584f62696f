import { z, type ZodTypeAny } from 'zod';
import { GraphBuildError } from './errors';
import { jsonIncompatibility } from './outputParser';
import { RESULT_SUFFIX, USER_INPUT_SUFFIX, type FieldSubstitution, type NodeOutputRecord } from './types';

/**
 * One row of the field mapping: output field `source` is projected into
 * global state under `target`.
 */
export interface FieldSpec {
  source: string;
  target: string;
  /**
   * Validates and may normalize the value; failures fall back to the default,
   * as do values that do not survive a JSON round trip.
   */
  schema?: ZodTypeAny;
  defaultValue?: unknown;
  /** Default computed from the producing node, e.g. `stage = nodeId`. */
  defaultFromNode?: (nodeId: string) => unknown;
  /** Write the default even when the output omits the field. */
  fillWhenMissing?: boolean;
}

export type FieldMappingInput =
  | readonly (FieldSpec | readonly [string, string])[]
  | Readonly<Record<string, string>>;

export interface MappedFields {
  values: Array<[string, unknown]>;
  substitutions: FieldSubstitution[];
}

type ResolvedDefault = { present: true; value: unknown } | { present: false };

function hasOwn(record: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

function isReserved(target: string): boolean {
  return target.endsWith(RESULT_SUFFIX) || target.endsWith(USER_INPUT_SUFFIX);
}

export class FieldMapping {
  readonly fields: readonly FieldSpec[];

  constructor(fields: readonly FieldSpec[]) {
    const sources = new Set<string>();
    const targets = new Set<string>();
    for (const field of fields) {
      if (!field.source || !field.target) {
        throw new GraphBuildError('Field mapping entries need a source and a target');
      }
      if (sources.has(field.source)) {
        throw new GraphBuildError(`Duplicate mapped source field: ${field.source}`);
      }
      if (targets.has(field.target)) {
        throw new GraphBuildError(`Duplicate mapped target field: ${field.target}`);
      }
      if (isReserved(field.target)) {
        throw new GraphBuildError(`Mapped target uses a reserved suffix: ${field.target}`);
      }
      const defaultIssue = hasOwn(field, 'defaultValue')
        ? jsonIncompatibility(field.defaultValue, `default of ${field.target}`)
        : undefined;
      if (defaultIssue) {
        throw new GraphBuildError(defaultIssue);
      }
      sources.add(field.source);
      targets.add(field.target);
    }
    this.fields = Object.freeze(fields.map((field) => Object.freeze({ ...field })));
  }

  static from(input: FieldMappingInput | FieldMapping): FieldMapping {
    if (input instanceof FieldMapping) return input;
    if (isRowList(input)) {
      return new FieldMapping(
        input.map((row) => (isPair(row) ? { source: row[0], target: row[1] } : row)),
      );
    }
    return new FieldMapping(
      Object.entries(input).map(([source, target]) => ({ source, target })),
    );
  }

  static empty(): FieldMapping {
    return new FieldMapping([]);
  }

  has(source: string): boolean {
    return this.fields.some((field) => field.source === source);
  }

  targets(): string[] {
    return this.fields.map((field) => field.target);
  }

  /**
   * Map an output record to `[target, value]` pairs in table order.
   * Unmapped output fields are ignored.
   */
  apply(nodeId: string, record: NodeOutputRecord): MappedFields {
    const values: Array<[string, unknown]> = [];
    const substitutions: FieldSubstitution[] = [];

    for (const field of this.fields) {
      if (!hasOwn(record, field.source)) {
        if (field.fillWhenMissing) {
          const fallback = resolveDefault(field, nodeId);
          if (fallback.present) values.push([field.target, fallback.value]);
        }
        continue;
      }

      const raw = record[field.source];
      let value: unknown = raw;
      let reason: string | undefined;
      if (field.schema) {
        const parsed = field.schema.safeParse(raw);
        if (parsed.success) {
          value = parsed.data;
        } else {
          reason = parsed.error.issues.map((issue) => issue.message).join('; ');
        }
      }
      if (reason === undefined) {
        reason = jsonIncompatibility(value, field.source);
      }

      if (reason === undefined) {
        values.push([field.target, value]);
        continue;
      }

      const fallback = resolveDefault(field, nodeId);
      substitutions.push({
        field: field.target,
        ...(jsonIncompatibility(raw, field.source) === undefined ? { rejected: raw } : {}),
        ...(fallback.present ? { replacement: fallback.value } : {}),
        reason,
      });
      if (fallback.present) values.push([field.target, fallback.value]);
    }

    return { values, substitutions };
  }
}

type FieldRows = readonly (FieldSpec | readonly [string, string])[];

function isRowList(input: FieldMappingInput): input is FieldRows {
  return Array.isArray(input);
}

function isPair(row: FieldSpec | readonly [string, string]): row is readonly [string, string] {
  return Array.isArray(row);
}

function resolveDefault(field: FieldSpec, nodeId: string): ResolvedDefault {
  if (field.defaultFromNode) {
    const value = field.defaultFromNode(nodeId);
    return jsonIncompatibility(value, field.target) === undefined
      ? { present: true, value }
      : { present: false };
  }
  if (hasOwn(field, 'defaultValue')) {
    return { present: true, value: field.defaultValue };
  }
  return { present: false };
}

/** Number clamped into `[min, max]`; non-numbers fail validation. */
export function clampedNumber(min: number, max: number) {
  return z.number().transform((value) => Math.min(max, Math.max(min, value)));
}

export const confidenceSchema = clampedNumber(0, 1);

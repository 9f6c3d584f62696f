import type { NodeOutputRecord } from './types';

export type ParsedOutput =
  | { ok: true; record: NodeOutputRecord }
  | { ok: false; reason: string };

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function kindOf(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return value.constructor?.name ?? 'object';
  }
  return typeof value;
}

/**
 * Why `value` would not come back unchanged from `JSON.stringify` and
 * `JSON.parse`, or undefined when it would. State and history are persisted
 * as JSON, so only such values may enter them.
 */
export function jsonIncompatibility(value: unknown, path: string): string | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return undefined;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? undefined : `non-finite number at ${path} is not JSON-serializable`;
  }
  if (Array.isArray(value)) {
    for (let index = 0; index < value.length; index += 1) {
      const issue = jsonIncompatibility(value[index], `${path}[${index}]`);
      if (issue) return issue;
    }
    return undefined;
  }
  if (isPlainRecord(value)) {
    for (const [key, child] of Object.entries(value)) {
      const issue = jsonIncompatibility(child, `${path}.${key}`);
      if (issue) return issue;
    }
    return undefined;
  }
  return `${kindOf(value)} at ${path} is not JSON-serializable`;
}

/**
 * Interpret a node's raw return value as a field record.
 *
 * Objects are taken as-is. Text is scanned for the outermost `{...}` span,
 * which must parse as a JSON object; model-backed nodes tend to wrap their
 * JSON in prose or code fences.
 */
export function parseNodeOutput(raw: unknown): ParsedOutput {
  if (isPlainRecord(raw)) {
    return { ok: true, record: raw };
  }

  if (typeof raw === 'string') {
    const start = raw.indexOf('{');
    const end = raw.lastIndexOf('}');
    if (start === -1 || end <= start) {
      return { ok: false, reason: 'no JSON object found in text output' };
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw.slice(start, end + 1));
    } catch (error) {
      return {
        ok: false,
        reason: `invalid JSON in text output: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
    if (!isPlainRecord(parsed)) {
      return { ok: false, reason: `embedded JSON is ${describe(parsed)}, not an object` };
    }
    return { ok: true, record: parsed };
  }

  return { ok: false, reason: `output of type ${describe(raw)} is not a field record` };
}

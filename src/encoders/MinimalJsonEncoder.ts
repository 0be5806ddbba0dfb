import type { TelemetryPayload } from '../types/telemetry.types';
import { PayloadEncodeError } from '../utils/errors';
import type { PayloadEncoder } from './PayloadEncoder';

const ESCAPES: Record<string, string> = {
  '"': '\\"',
  '\\': '\\\\',
  '\b': '\\b',
  '\f': '\\f',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

// Quote, backslash, C0 controls and unpaired surrogates
// eslint-disable-next-line no-control-regex
const NEEDS_ESCAPE = /["\\\u0000-\u001f]|[\ud800-\udbff](?![\udc00-\udfff])|(?<![\ud800-\udbff])[\udc00-\udfff]/g;

export const escapeJsonString = (value: string): string => {
  const escaped = value.replace(
    NEEDS_ESCAPE,
    (char) => ESCAPES[char] ?? `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`,
  );
  return `"${escaped}"`;
};

const isPlainObject = (value: object): value is Record<string, unknown> => {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

/**
 * Self-contained JSON writer covering objects, arrays, strings, numbers,
 * booleans and null. No whitespace, keys in insertion order, undefined members
 * skipped, non-finite numbers written as null.
 */
export function encodeJsonValue(value: unknown, path = '$', seen: Set<object> = new Set()): string {
  if (value === null) {
    return 'null';
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : 'null';
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (typeof value === 'string') {
    return escapeJsonString(value);
  }
  if (typeof value !== 'object') {
    throw new PayloadEncodeError(`Cannot encode ${typeof value} at ${path}`);
  }

  if (seen.has(value)) {
    throw new PayloadEncodeError(`Circular reference at ${path}`);
  }
  seen.add(value);

  try {
    if (Array.isArray(value)) {
      const items = value.map((item: unknown, index) => (
        item === undefined ? 'null' : encodeJsonValue(item, `${path}[${index}]`, seen)
      ));
      return `[${items.join(',')}]`;
    }

    if (!isPlainObject(value)) {
      throw new PayloadEncodeError(`Cannot encode ${value.constructor.name} instance at ${path}`);
    }

    const members = Object.entries(value)
      .filter(([, member]) => member !== undefined)
      .map(([key, member]) => `${escapeJsonString(key)}:${encodeJsonValue(member, `${path}.${key}`, seen)}`);
    return `{${members.join(',')}}`;
  } finally {
    seen.delete(value);
  }
}

/**
 * Fallback encoder with no dependencies beyond the runtime.
 */
export class MinimalJsonEncoder implements PayloadEncoder {
  readonly name = 'minimal';

  isAvailable(): boolean {
    return true;
  }

  encode(payload: TelemetryPayload): Buffer {
    return Buffer.from(encodeJsonValue(payload), 'utf8');
  }
}

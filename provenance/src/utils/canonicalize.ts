import { SerializationError } from './errors';

export type CanonicalPrimitive = null | boolean | string | number;
export type CanonicalValue = CanonicalPrimitive | CanonicalValue[] | CanonicalObject;
export interface CanonicalObject {
  [key: string]: CanonicalValue;
}

function isPlainRecord(value: object): value is Record<string, unknown> {
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function canonicalizeArray(value: readonly unknown[], path: string): CanonicalValue[] {
  return value.map((entry, index) => canonicalizeAt(entry, `${path}[${index}]`));
}

function canonicalizeObject(value: Record<string, unknown>, path: string): CanonicalObject {
  const sortedKeys = Object.keys(value).sort();
  const result: CanonicalObject = {};

  for (const key of sortedKeys) {
    const raw = value[key];
    if (raw === undefined) {
      continue;
    }
    result[key] = canonicalizeAt(raw, path ? `${path}.${key}` : key);
  }

  return result;
}

function canonicalizeAt(value: unknown, path: string): CanonicalValue {
  if (value === null) {
    return null;
  }

  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new SerializationError(`Non-finite number at ${path || '<root>'} cannot be canonicalized`);
    }
    return value;
  }

  if (Array.isArray(value)) {
    return canonicalizeArray(value, path);
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (typeof value === 'object' && isPlainRecord(value)) {
    return canonicalizeObject(value, path);
  }

  throw new SerializationError(`Unsupported value type at ${path || '<root>'}: ${typeof value}`);
}

export function canonicalize(value: unknown): CanonicalValue {
  return canonicalizeAt(value, '');
}

/** JSON with sorted object keys and `undefined` members dropped. */
export function canonicalJsonStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

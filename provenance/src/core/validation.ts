import { ValidationError } from '../utils/errors';
import type { GpsCoordinates, JsonValue } from '../types';

export type RawRecord = Record<string, unknown>;

interface NumberRule {
  min?: number;
  max?: number;
  integer?: boolean;
  exclusiveMin?: boolean;
}

function fieldPath(prefix: string, field: string): string {
  return prefix ? `${prefix}.${field}` : field;
}

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown, path: string): RawRecord {
  if (!isRecord(value)) {
    throw new ValidationError(`${path} must be an object`, { field: path });
  }
  return value;
}

export function requireString(source: RawRecord, field: string, prefix = ''): string {
  const path = fieldPath(prefix, field);
  const value = source[field];

  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`${path} is required`, { field: path });
  }

  return value;
}

export function optionalString(source: RawRecord, field: string, prefix = ''): string | undefined {
  const value = source[field];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'string') {
    const path = fieldPath(prefix, field);
    throw new ValidationError(`${path} must be a string`, { field: path });
  }

  return value;
}

function checkNumber(value: unknown, path: string, rule: NumberRule): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`${path} must be a finite number`, { field: path });
  }

  if (rule.integer && !Number.isInteger(value)) {
    throw new ValidationError(`${path} must be an integer`, { field: path, value });
  }

  if (rule.min !== undefined) {
    const belowMin = rule.exclusiveMin ? value <= rule.min : value < rule.min;
    if (belowMin) {
      const relation = rule.exclusiveMin ? 'greater than' : 'at least';
      throw new ValidationError(`${path} must be ${relation} ${rule.min}`, { field: path, value });
    }
  }

  if (rule.max !== undefined && value > rule.max) {
    throw new ValidationError(`${path} must be at most ${rule.max}`, { field: path, value });
  }

  return value;
}

export function requireNumber(source: RawRecord, field: string, rule: NumberRule = {}, prefix = ''): number {
  const path = fieldPath(prefix, field);
  if (source[field] === undefined || source[field] === null) {
    throw new ValidationError(`${path} is required`, { field: path });
  }
  return checkNumber(source[field], path, rule);
}

export function optionalNumber(
  source: RawRecord,
  field: string,
  rule: NumberRule = {},
  prefix = ''
): number | undefined {
  const value = source[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  return checkNumber(value, fieldPath(prefix, field), rule);
}

export function optionalBoolean(source: RawRecord, field: string, fallback: boolean, prefix = ''): boolean {
  const value = source[field];
  if (value === undefined || value === null) {
    return fallback;
  }

  if (typeof value !== 'boolean') {
    const path = fieldPath(prefix, field);
    throw new ValidationError(`${path} must be true or false`, { field: path });
  }

  return value;
}

export function requireBoolean(source: RawRecord, field: string, prefix = ''): boolean {
  const path = fieldPath(prefix, field);
  if (typeof source[field] !== 'boolean') {
    throw new ValidationError(`${path} is required and must be true or false`, { field: path });
  }
  return source[field] === true;
}

export function stringList(
  source: RawRecord,
  field: string,
  options: { required?: boolean; nonEmpty?: boolean } = {},
  prefix = ''
): string[] {
  const path = fieldPath(prefix, field);
  const value = source[field];

  if (value === undefined || value === null) {
    if (options.required) {
      throw new ValidationError(`${path} is required`, { field: path });
    }
    return [];
  }

  if (!Array.isArray(value)) {
    throw new ValidationError(`${path} must be an array of strings`, { field: path });
  }

  const entries = value.map((entry, index) => {
    if (typeof entry !== 'string') {
      throw new ValidationError(`${path}[${index}] must be a string`, { field: `${path}[${index}]` });
    }
    if (options.nonEmpty && entry.trim().length === 0) {
      throw new ValidationError(`${path}[${index}] must be a non-empty string`, { field: `${path}[${index}]` });
    }
    return entry;
  });

  return entries;
}

export function requireEnum<T extends string>(
  source: RawRecord,
  field: string,
  allowed: readonly T[],
  prefix = ''
): T {
  const path = fieldPath(prefix, field);
  const value = source[field];
  const match = allowed.find((candidate) => candidate === value);

  if (match === undefined) {
    throw new ValidationError(`${path} must be one of: ${allowed.join(', ')}`, { field: path });
  }

  return match;
}

function checkTimestamp(value: unknown, path: string): string {
  if (typeof value !== 'string' || Number.isNaN(Date.parse(value))) {
    throw new ValidationError(`${path} must be an ISO-8601 timestamp`, { field: path });
  }
  return value;
}

export function requireTimestamp(source: RawRecord, field: string, prefix = ''): string {
  return checkTimestamp(source[field], fieldPath(prefix, field));
}

export function optionalTimestamp(source: RawRecord, field: string, prefix = ''): string | undefined {
  const value = source[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  return checkTimestamp(value, fieldPath(prefix, field));
}

export function requireGps(source: RawRecord, field: string, prefix = ''): GpsCoordinates {
  const path = fieldPath(prefix, field);
  const raw = asRecord(source[field], path);

  return {
    latitude: requireNumber(raw, 'latitude', { min: -90, max: 90 }, path),
    longitude: requireNumber(raw, 'longitude', { min: -180, max: 180 }, path),
    altitude: optionalNumber(raw, 'altitude', {}, path),
  };
}

export function optionalGps(source: RawRecord, field: string, prefix = ''): GpsCoordinates | undefined {
  if (source[field] === undefined || source[field] === null) {
    return undefined;
  }
  return requireGps(source, field, prefix);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }

  if (typeof value === 'number') {
    return Number.isFinite(value);
  }

  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }

  if (isRecord(value)) {
    return Object.values(value).every(isJsonValue);
  }

  return false;
}

export function requireJson(source: RawRecord, field: string, prefix = ''): JsonValue {
  const path = fieldPath(prefix, field);
  const value = source[field];

  if (value === undefined || !isJsonValue(value)) {
    throw new ValidationError(`${path} is required and must be JSON`, { field: path });
  }

  return value;
}

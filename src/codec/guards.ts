import { GenAIError } from '../errors/GenAIError.js';

// Structural checks over parsed JSON. Each failure names the offending path.

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function expectRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw GenAIError.decode(`${path} must be an object`, { path });
  }
  return value;
}

export function optionalRecord(value: unknown, path: string): Record<string, unknown> | undefined {
  return value === undefined || value === null ? undefined : expectRecord(value, path);
}

export function optionalArray(value: unknown, path: string): unknown[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw GenAIError.decode(`${path} must be an array`, { path });
  }
  return value;
}

export function optionalString(value: unknown, path: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw GenAIError.decode(`${path} must be a string`, { path });
  }
  return value;
}

export function expectString(value: unknown, path: string): string {
  const str = optionalString(value, path);
  if (str === undefined) {
    throw GenAIError.decode(`${path} is required`, { path });
  }
  return str;
}

export function optionalBoolean(value: unknown, path: string): boolean | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw GenAIError.decode(`${path} must be a boolean`, { path });
  }
  return value;
}

/** Integers may be encoded as JSON numbers or, for 64-bit fields, as decimal strings. */
export function optionalInteger(value: unknown, path: string): number | undefined {
  if (value === undefined || value === null) return undefined;
  const n = typeof value === 'string' && /^-?\d+$/.test(value) ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isInteger(n)) {
    throw GenAIError.decode(`${path} must be an integer`, { path });
  }
  return n;
}

import { DataContractViolation } from '../raw/errors.js';
import { isRawRecord } from '../raw/platform-client-interface.js';
import type { RawRecord } from '../raw/platform-client-interface.js';

/** Reads a dotted path ("author.user.display_name") out of a raw record. */
export function pick(raw: RawRecord, path: string): unknown {
  let current: unknown = raw;
  for (const segment of path.split('.')) {
    if (!isRawRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}

export function requireString(raw: RawRecord, path: string, kind: string): string {
  const value = pick(raw, path);
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string' || value.trim() === '') {
    throw new DataContractViolation(`${kind}: missing required field "${path}"`, path);
  }
  return value;
}

export function optionalString(raw: RawRecord, path: string): string | null {
  const value = pick(raw, path);
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

export function requireInt(raw: RawRecord, path: string, kind: string): number {
  const value = optionalNumber(raw, path);
  if (value === null || !Number.isInteger(value)) {
    throw new DataContractViolation(`${kind}: field "${path}" must be an integer`, path);
  }
  return value;
}

/** Numbers may arrive as JSON numbers or numeric strings (SonarCloud measures). */
export function optionalNumber(raw: RawRecord, path: string): number | null {
  const value = pick(raw, path);
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function optionalBoolean(raw: RawRecord, path: string): boolean | null {
  const value = pick(raw, path);
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return null;
}

export function optionalDate(raw: RawRecord, path: string, kind: string): Date | null {
  const value = pick(raw, path);
  if (value === undefined || value === null || value === '') return null;
  if (typeof value !== 'string') {
    throw new DataContractViolation(`${kind}: field "${path}" is not a timestamp`, path);
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new DataContractViolation(`${kind}: field "${path}" has invalid timestamp "${value}"`, path);
  }
  return date;
}

export function requireEnum<T extends string>(
  raw: RawRecord,
  path: string,
  allowed: readonly T[],
  kind: string,
): T {
  const value = pick(raw, path);
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new DataContractViolation(
      `${kind}: "${path}" has value ${JSON.stringify(value) ?? 'undefined'} outside {${allowed.join(', ')}}`,
      path,
    );
  }
  return match;
}

export function optionalEnum<T extends string>(
  raw: RawRecord,
  path: string,
  allowed: readonly T[],
  kind: string,
): T | null {
  const value = pick(raw, path);
  if (value === undefined || value === null || value === '') return null;
  return requireEnum(raw, path, allowed, kind);
}

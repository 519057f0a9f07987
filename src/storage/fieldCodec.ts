import { ValidationError } from '../errors.js';
import type { FieldValue, LiteralFieldType } from '../types/schema.js';

/** What better-sqlite3 accepts as a bound parameter. */
export type SqlValue = string | number | bigint | Buffer | null;

export const SQL_COLUMN_TYPES: Record<LiteralFieldType, string> = {
  string: 'TEXT',
  integer: 'INTEGER',
  double: 'REAL',
  boolean: 'INTEGER',
  timestamp: 'INTEGER',
  'string[]': 'TEXT',
  'integer[]': 'TEXT',
  'double[]': 'TEXT',
  blob: 'BLOB',
};

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isNumberArray(value: unknown, integer: boolean): value is number[] {
  return (
    Array.isArray(value) &&
    value.every(
      (item) => typeof item === 'number' && (integer ? Number.isInteger(item) : Number.isFinite(item)),
    )
  );
}

/** Whether `value` is acceptable for a field of `type`. `null` always is. */
export function matchesFieldType(type: LiteralFieldType, value: unknown): boolean {
  if (value === null) return true;
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'double':
      return typeof value === 'number' && !Number.isNaN(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'timestamp':
      return value instanceof Date && !Number.isNaN(value.getTime());
    case 'string[]':
      return isStringArray(value);
    case 'integer[]':
      return isNumberArray(value, true);
    case 'double[]':
      return isNumberArray(value, false);
    case 'blob':
      return value instanceof Uint8Array;
  }
}

export function encodeField(type: LiteralFieldType, field: string, value: unknown): SqlValue {
  if (value === null) return null;
  if (!matchesFieldType(type, value)) {
    throw new ValidationError(`Field "${field}" expects ${type}, got ${describeValue(value)}`);
  }
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Date) return value.getTime();
  if (value instanceof Uint8Array) return Buffer.from(value);
  return JSON.stringify(value);
}

export function encodeStringList(field: string, value: unknown): SqlValue {
  return encodeField('string[]', field, value);
}

function parseJsonList(raw: unknown): unknown[] | null {
  if (typeof raw !== 'string') return null;
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed : null;
}

export function decodeField(type: LiteralFieldType, raw: unknown): FieldValue | null {
  if (raw === null || raw === undefined) return null;
  switch (type) {
    case 'string':
      return typeof raw === 'string' ? raw : String(raw);
    case 'integer':
    case 'double':
      return typeof raw === 'number' ? raw : Number(raw);
    case 'boolean':
      return raw === 1 || raw === true;
    case 'timestamp':
      return typeof raw === 'number' ? new Date(raw) : null;
    case 'string[]': {
      const list = parseJsonList(raw);
      return isStringArray(list) ? list : null;
    }
    case 'integer[]':
    case 'double[]': {
      const list = parseJsonList(raw);
      return isNumberArray(list, type === 'integer[]') ? list : null;
    }
    case 'blob':
      return raw instanceof Uint8Array ? new Uint8Array(raw) : null;
  }
}

export function decodeStringList(raw: unknown): string[] | null {
  const decoded = decodeField('string[]', raw);
  return isStringArray(decoded) ? decoded : null;
}

/** Row ids held by the `o` column. */
export function decodeRowIdList(raw: unknown): number[] {
  const list = parseJsonList(raw);
  return isNumberArray(list, true) ? list : [];
}

function describeValue(value: unknown): string {
  if (Array.isArray(value)) return 'array';
  if (value instanceof Date) return 'Date';
  return typeof value;
}

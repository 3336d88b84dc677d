import { DxfError, DxfErrorCode, ErrorDetails, MalformedValueError } from '../errors/types';
import { FieldValue, ValueType } from './types';

export type WireType = 'string' | 'double' | 'int16' | 'int32' | 'int64' | 'boolean' | 'binary' | 'handle' | 'unknown';

export const GroupCode = {
  ENTITY_TYPE: 0,
  HANDLE: 5,
  SUBCLASS_MARKER: 100,
  APPLICATION_GROUP: 102,
  COMMENT: 999
} as const;

const INT16_RANGE = { min: -32768, max: 32767 };
const INT32_RANGE = { min: -2147483648, max: 2147483647 };

function inRange(code: number, from: number, to: number): boolean {
  return code >= from && code <= to;
}

/**
 * Fixed, version-independent wire type of a group code
 */
export function wireTypeOf(code: number): WireType {
  // Handles and binary chunks sit inside the string ranges, so they go first
  if (code === 5 || code === 105 || code === 1005) return 'handle';
  if (inRange(code, 320, 369) || inRange(code, 390, 399) || inRange(code, 480, 481)) return 'handle';
  if (inRange(code, 310, 319) || code === 1004) return 'binary';

  if (inRange(code, 0, 9) || code === 100 || code === 102 || code === 999) return 'string';
  if (inRange(code, 300, 309) || inRange(code, 410, 419) || inRange(code, 430, 439)) return 'string';
  if (inRange(code, 470, 479) || inRange(code, 1000, 1009)) return 'string';

  if (inRange(code, 10, 59) || inRange(code, 110, 149) || inRange(code, 210, 239)) return 'double';
  if (inRange(code, 460, 469) || inRange(code, 1010, 1059)) return 'double';

  if (inRange(code, 60, 79) || inRange(code, 170, 179) || inRange(code, 270, 289)) return 'int16';
  if (inRange(code, 370, 389) || inRange(code, 400, 409) || inRange(code, 1060, 1070)) return 'int16';

  if (inRange(code, 90, 99) || inRange(code, 420, 429) || inRange(code, 440, 459) || code === 1071) return 'int32';
  if (inRange(code, 160, 169)) return 'int64';
  if (inRange(code, 290, 299)) return 'boolean';
  return 'unknown';
}

/**
 * Whether an integer value fits the wire type of its group code
 */
export function fitsWireType(code: number, value: number): boolean {
  switch (wireTypeOf(code)) {
    case 'int16':
      return value >= INT16_RANGE.min && value <= INT16_RANGE.max;
    case 'int32':
      return value >= INT32_RANGE.min && value <= INT32_RANGE.max;
    case 'int64':
      return Number.isSafeInteger(value);
    case 'boolean':
      return value === 0 || value === 1;
    default:
      return true;
  }
}

const DOUBLE_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const HEX_PATTERN = /^[0-9A-Fa-f]+$/;

export function parseDouble(raw: string, details?: ErrorDetails): number {
  const trimmed = raw.trim();
  if (!DOUBLE_PATTERN.test(trimmed)) {
    throw new MalformedValueError(`Expected a floating point value, got "${raw}"`, raw, details);
  }
  return Number(trimmed);
}

export function parseInteger(raw: string, details?: ErrorDetails): number {
  const trimmed = raw.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new MalformedValueError(`Expected an integer value, got "${raw}"`, raw, details);
  }
  return Number(trimmed);
}

export function parseHandle(raw: string, details?: ErrorDetails): number {
  const trimmed = raw.trim();
  if (!HEX_PATTERN.test(trimmed)) {
    throw new MalformedValueError(`Expected a hexadecimal handle, got "${raw}"`, raw, details);
  }
  const value = parseInt(trimmed, 16);
  if (!Number.isSafeInteger(value)) {
    throw new MalformedValueError(`Handle "${raw}" does not fit in 53 bits`, raw, details);
  }
  return value;
}

/**
 * Convert a raw value line to the declared type of its field
 */
export function convertValue(raw: string, type: ValueType, details?: ErrorDetails): string | number {
  switch (type) {
    case 'double':
      return parseDouble(raw, details);
    case 'integer':
    case 'boolean':
      return parseInteger(raw, details);
    case 'handle':
      return parseHandle(raw, details);
    case 'string':
      return raw;
  }
}

/**
 * Right-justify a group code to width 3
 */
export function formatGroupCode(code: number): string {
  return String(code).padStart(3, ' ');
}

/**
 * Fixed-point with six fraction digits, never an exponent
 */
export function formatDouble(value: number, details?: ErrorDetails): string {
  if (!Number.isFinite(value)) {
    throw new MalformedValueError(`Cannot write non-finite value ${value}`, String(value), details);
  }
  if (Math.abs(value) >= 1e21) {
    // toFixed switches to exponent notation from 1e21 on
    return `${BigInt(Math.round(value)).toString()}.000000`;
  }
  return value.toFixed(6);
}

export function formatHandle(value: number): string {
  return value.toString(16).toUpperCase();
}

/**
 * Format a field value for the wire according to its declared type
 */
export function formatValue(value: FieldValue | undefined, type: ValueType, details?: ErrorDetails): string {
  if (type === 'string') {
    if (typeof value !== 'string') throw fieldTypeError(type, value, details);
    return value;
  }
  if (typeof value !== 'number') throw fieldTypeError(type, value, details);
  switch (type) {
    case 'double':
      return formatDouble(value, details);
    case 'handle':
      if (!Number.isSafeInteger(value) || value < 0) {
        throw new MalformedValueError(`Invalid handle ${value}`, String(value), details);
      }
      return formatHandle(value);
    case 'integer':
    case 'boolean':
      if (!Number.isInteger(value)) {
        throw new MalformedValueError(`Expected an integer, got ${value}`, String(value), details);
      }
      return String(value);
  }
}

function fieldTypeError(type: ValueType, value: FieldValue | undefined, details?: ErrorDetails): DxfError {
  return new DxfError(
    `Expected a ${type} value, got ${value === undefined ? 'nothing' : typeof value}`,
    DxfErrorCode.FIELD_TYPE,
    undefined,
    details
  );
}

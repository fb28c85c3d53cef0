/**
 * FASTENABLE annotations: a decimal literal followed by a marker comment
 * naming its kind, e.g. `#define CHUNK 64` followed by a `POW FASTENABLE`
 * marker comment.
 */

import { Value, ValueKind } from '../types.js';

export const FASTENABLE_PATTERN = /(\d+)(?=\s*\/\*\s*(INT|POW|BOOL)\s+FASTENABLE\s*\*\/)/;

const KIND_BY_TAG: Record<string, ValueKind> = {
  INT: 'integer',
  POW: 'powerOfTwo',
  BOOL: 'boolean',
};

const INT64_MAX = (1n << 63n) - 1n;

/**
 * Throws a RangeError for a literal that does not fit in signed 64 bits,
 * since writing it back would change the value.
 */
export function makeValue(kind: ValueKind, literal: string): Value {
  const parsed = BigInt(literal);
  if (parsed > INT64_MAX) {
    throw new RangeError(`${literal} does not fit in a signed 64-bit integer`);
  }
  switch (kind) {
    case 'integer':
    case 'powerOfTwo':
      return { kind, value: parsed };
    case 'boolean':
      return { kind, value: parsed !== 0n };
  }
}

/**
 * Value of the first annotation on a line, if any
 */
export function findAnnotation(line: string): Value | null {
  const match = FASTENABLE_PATTERN.exec(line);
  if (!match) {
    return null;
  }
  const kind = KIND_BY_TAG[match[2]];
  if (!kind) {
    return null;
  }
  return makeValue(kind, match[1]);
}

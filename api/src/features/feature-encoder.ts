// api/src/features/feature-encoder.ts

import { EncodingError } from './encoding.error';
import { FEATURE_SCHEMA } from './feature-schema';
import { EncodedVector, RawInput } from './feature.types';

/** ---------- number parsing ---------- */

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Strict decimal parse. Surrounding whitespace is allowed; empty strings,
 * hex, NaN and Infinity are not. Returns null when the text is not a number.
 */
export function parseDecimal(text: string): number | null {
  const trimmed = text.trim();
  if (!DECIMAL.test(trimmed)) return null;
  const n = Number(trimmed);
  if (!Number.isFinite(n)) return null;
  return n === 0 ? 0 : n; // folds -0
}

/** ---------- encoder ---------- */

/**
 * Map caller input onto the schema. Absent slots become 0; a present slot
 * that is not a number fails the whole encoding.
 */
export function encodeFeatures(raw: RawInput): EncodedVector {
  const out: number[] = [];

  for (const name of FEATURE_SCHEMA) {
    const value = raw[name];
    if (value === undefined) {
      out.push(0);
      continue;
    }

    const n = parseDecimal(value);
    if (n === null) throw new EncodingError(name, value);
    out.push(n);
  }

  return Object.freeze(out);
}

/** ---------- wire format ---------- */

export function serializeVector(vector: EncodedVector): string {
  return vector.map((v) => String(v)).join(',');
}

/**
 * Read a serialized vector back. Throws RangeError on a wrong length and
 * EncodingError (naming the slot) on a malformed entry.
 */
export function parseVector(text: string): EncodedVector {
  const parts = text.split(',');
  if (parts.length !== FEATURE_SCHEMA.length) {
    throw new RangeError(
      `Expected ${FEATURE_SCHEMA.length} values, got ${parts.length}`,
    );
  }

  return Object.freeze(
    parts.map((part, i) => {
      const n = parseDecimal(part);
      if (n === null) throw new EncodingError(FEATURE_SCHEMA[i], part);
      return n;
    }),
  );
}

/** ---------- input normalisation ---------- */

/**
 * Flatten a query-string or JSON map into RawInput.
 * Repeated parameters keep their last value; null and undefined are absent.
 * Booleans map to one-hot 1/0; nested objects are kept as JSON text so a
 * schema slot holding one fails to encode.
 */
export function toRawInput(params: Readonly<Record<string, unknown>>): RawInput {
  const raw: Record<string, string> = {};

  for (const [name, value] of Object.entries(params)) {
    const last: unknown = Array.isArray(value) ? value[value.length - 1] : value;
    if (last === undefined || last === null) continue;

    if (typeof last === 'string') {
      raw[name] = last;
    } else if (typeof last === 'number') {
      raw[name] = String(last);
    } else if (typeof last === 'boolean') {
      raw[name] = last ? '1' : '0';
    } else {
      raw[name] = JSON.stringify(last);
    }
  }

  return raw;
}

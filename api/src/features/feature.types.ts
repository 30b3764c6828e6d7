/**
 * Caller-supplied feature values keyed by feature name. Any subset of the
 * schema may be present; names outside the schema are ignored.
 */
export type RawInput = Readonly<Record<string, string | undefined>>;

/**
 * One number per schema slot, in schema order.
 */
export type EncodedVector = readonly number[];

/** Content type of a serialized vector sent to the scorer */
export const VECTOR_CONTENT_TYPE = 'text/csv';

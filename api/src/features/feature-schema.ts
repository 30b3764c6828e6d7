// api/src/features/feature-schema.ts
import schemaJson from './feature-schema.json';

/**
 * Number of input slots the hosted classifier was trained with.
 */
export const FEATURE_COUNT = 58;

function loadSchema(names: unknown): readonly string[] {
  if (!Array.isArray(names) || names.length !== FEATURE_COUNT) {
    throw new Error(`Feature schema must list exactly ${FEATURE_COUNT} names`);
  }

  const seen = new Set<string>();
  for (const name of names) {
    if (typeof name !== 'string' || name.trim() === '') {
      throw new Error(`Feature schema contains an invalid name: ${String(name)}`);
    }
    if (seen.has(name)) {
      throw new Error(`Feature schema contains a duplicate name: ${name}`);
    }
    seen.add(name);
  }

  return Object.freeze([...seen]);
}

/**
 * Ordered feature names. Position i of an encoded vector holds the value of
 * FEATURE_SCHEMA[i]; the order is the column order of the training data.
 *
 * Numeric columns first (age, campaign, pdays, previous, no_previous_contact),
 * then the one-hot indicators for job, marital, education, default, housing,
 * loan, contact, month, day_of_week and poutcome.
 */
export const FEATURE_SCHEMA: readonly string[] = loadSchema(schemaJson);

const FEATURE_NAMES: ReadonlySet<string> = new Set(FEATURE_SCHEMA);

export function isFeatureName(name: string): boolean {
  return FEATURE_NAMES.has(name);
}

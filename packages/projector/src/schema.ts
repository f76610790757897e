// packages/projector/src/schema.ts
import { Errors } from '@featflat/core';

export const LABEL = 'label';

/**
 * Output column order for a caller-supplied feature list.
 *
 * Every occurrence of `label` is dropped and, if there was one, a single
 * `label` goes last. Other names must be distinct. The input is not mutated.
 */
export function normalizeSchema(features: readonly string[]): readonly string[] {
  if (features.length === 0) throw Errors.INVALID_SCHEMA('no features given');

  const rest = features.filter((f) => f !== LABEL);
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const f of rest) {
    if (f.length === 0) throw Errors.INVALID_SCHEMA('empty feature name');
    if (seen.has(f)) dupes.add(f);
    seen.add(f);
  }
  if (dupes.size > 0) {
    throw Errors.INVALID_SCHEMA(`duplicate features: ${[...dupes].join(', ')}`, { duplicates: [...dupes] });
  }

  const schema = rest.length === features.length ? rest : [...rest, LABEL];
  return Object.freeze(schema);
}

// packages/resolver/src/datadirectories.ts
import { Errors, float, viewNode } from '@featflat/core';
import type { DirectoryFieldMode, FeatureRecord, ResolvedValue } from '@featflat/core';
import { search } from './search';

export const DATADIRECTORIES_KEY = 'datadirectories';

// Positions in the PE optional header's data-directory array, which the
// record producer emits in header order (IMAGE_DIRECTORY_ENTRY_*).
// A wrong index silently reads another directory; contract test:
// packages/resolver/test/datadirectories.spec.ts.
export const DIRECTORY_INDEX = {
  export: 0,          // IMAGE_DIRECTORY_ENTRY_EXPORT
  resource: 2,        // IMAGE_DIRECTORY_ENTRY_RESOURCE
  debug: 6,           // IMAGE_DIRECTORY_ENTRY_DEBUG
  iat: 12             // IMAGE_DIRECTORY_ENTRY_IAT
} as const;
export type DirectoryName = keyof typeof DIRECTORY_INDEX;

export type DirectoryField = 'size' | 'virtual_address';

export interface DirectoryLookup {
  directory: DirectoryName;
  field: DirectoryField;
  // field read instead under DirectoryFieldMode 'legacy'
  legacyField?: DirectoryField;
}

export function fieldFor(lookup: DirectoryLookup, mode: DirectoryFieldMode): DirectoryField {
  return mode === 'legacy' && lookup.legacyField ? lookup.legacyField : lookup.field;
}

export function readDirectory(
  record: FeatureRecord,
  feature: string,
  lookup: DirectoryLookup,
  mode: DirectoryFieldMode
): ResolvedValue {
  const hit = search(record, DATADIRECTORIES_KEY);
  if (!hit.found) throw Errors.DATADIRECTORY_MISSING(feature);

  const table = viewNode(hit.value);
  if (table.kind !== 'sequence') {
    throw Errors.DATADIRECTORY_MALFORMED(feature, `'${DATADIRECTORIES_KEY}' is a ${table.kind}, expected a sequence`);
  }
  if (table.value.length === 0) return float(0);

  const index = DIRECTORY_INDEX[lookup.directory];
  const field = fieldFor(lookup, mode);
  if (index >= table.value.length) {
    throw Errors.DATADIRECTORY_MALFORMED(feature, `no entry at index ${index} (table has ${table.value.length})`, { index, field });
  }

  const entry = viewNode(table.value[index]);
  if (entry.kind !== 'mapping' || !Object.hasOwn(entry.value, field)) {
    throw Errors.DATADIRECTORY_MALFORMED(feature, `entry ${index} has no '${field}'`, { index, field });
  }
  return entry.value[field];
}

// packages/resolver/src/sections.ts
// Aggregates over the per-section entries of a record.
import { Errors, float, viewNode } from '@featflat/core';
import type { FeatureRecord, FloatValue, JsonArray } from '@featflat/core';
import { search } from './search';

export type SectionStat = 'mean' | 'min' | 'max';

// column suffix -> per-section key
export const SECTION_FIELDS = {
  entropy: 'entropy',
  rawsize: 'size',
  virtualsize: 'vsize'
} as const;
export type SectionMeasure = keyof typeof SECTION_FIELDS;

export const SECTIONS_KEY = 'sections';

export interface SectionAggregate {
  stat: SectionStat;
  measure: SectionMeasure;
}

function locateSections(record: FeatureRecord, feature: string): JsonArray {
  const hit = search(record, SECTIONS_KEY);
  if (!hit.found) throw Errors.SECTIONS_MISSING(feature);

  const view = viewNode(hit.value);
  if (view.kind !== 'sequence') {
    throw Errors.SECTIONS_MALFORMED(feature, `'${SECTIONS_KEY}' is a ${view.kind}, expected a sequence`);
  }
  return view.value;
}

function sectionValues(sections: JsonArray, field: string, feature: string): number[] {
  return sections.map((entry, index) => {
    const view = viewNode(entry);
    if (view.kind !== 'mapping') {
      throw Errors.SECTIONS_MALFORMED(feature, `section ${index} is not a mapping`, { index });
    }
    const hit = search(view.value, field);
    if (!hit.found) {
      throw Errors.SECTIONS_MALFORMED(feature, `${field} not found in section ${index}`, { index, field });
    }
    if (typeof hit.value !== 'number') {
      throw Errors.SECTIONS_MALFORMED(feature, `${field} of section ${index} is not a number`, { index, field });
    }
    return hit.value;
  });
}

/**
 * Means and the empty-table zero are computed floats; min and max return the
 * winning section's own value.
 */
export function aggregateSections(
  record: FeatureRecord,
  feature: string,
  agg: SectionAggregate
): number | FloatValue {
  const sections = locateSections(record, feature);
  // an empty section table is valid and aggregates to zero
  if (sections.length === 0) return float(0);

  const values = sectionValues(sections, SECTION_FIELDS[agg.measure], feature);

  switch (agg.stat) {
    case 'mean': {
      let sum = 0;
      for (const v of values) sum += v;
      return float(sum / values.length);
    }
    case 'min': {
      let lo = Infinity;
      for (const v of values) lo = Math.min(lo, v);
      return lo;
    }
    case 'max': {
      let hi = -Infinity;
      for (const v of values) hi = Math.max(hi, v);
      return hi;
    }
  }
}

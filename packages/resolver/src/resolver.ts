// packages/resolver/src/resolver.ts
// Feature name -> value. Specialized extractors always take precedence over
// the generic search, even when the record carries a key of the same name.
import { Errors } from '@featflat/core';
import type { DirectoryFieldMode, FeatureRecord, ResolvedValue } from '@featflat/core';
import { search } from './search';
import { aggregateSections, SECTION_FIELDS } from './sections';
import type { SectionAggregate, SectionMeasure, SectionStat } from './sections';
import { DIRECTORY_INDEX, fieldFor, readDirectory } from './datadirectories';
import type { DirectoryLookup } from './datadirectories';

type Extractor = (record: FeatureRecord, feature: string, mode: DirectoryFieldMode) => ResolvedValue;

export type ExtractorInfo =
  | { name: string; kind: 'sections'; stat: SectionStat; field: string }
  | { name: string; kind: 'datadirectory'; index: number; field: string };

const STATS: SectionStat[] = ['mean', 'min', 'max'];
const MEASURES: SectionMeasure[] = ['entropy', 'rawsize', 'virtualsize'];

const SECTION_AGGREGATES: Record<string, SectionAggregate> = Object.fromEntries(
  STATS.flatMap((stat) => MEASURES.map((measure): [string, SectionAggregate] =>
    [`sections_${stat}_${measure}`, { stat, measure }]))
);

const DIRECTORY_LOOKUPS: Record<string, DirectoryLookup> = {
  export_size:   { directory: 'export',   field: 'size' },
  export_rva:    { directory: 'export',   field: 'size' },
  resource_size: { directory: 'resource', field: 'size' },
  debug_size:    { directory: 'debug',    field: 'size', legacyField: 'virtual_address' },
  debug_rva:     { directory: 'debug',    field: 'virtual_address' },
  iat_rva:       { directory: 'iat',      field: 'virtual_address' }
};

const EXTRACTORS = new Map<string, Extractor>([
  ...Object.entries(SECTION_AGGREGATES).map(([name, agg]): [string, Extractor] =>
    [name, (record, feature) => aggregateSections(record, feature, agg)]),
  ...Object.entries(DIRECTORY_LOOKUPS).map(([name, lookup]): [string, Extractor] =>
    [name, (record, feature, mode) => readDirectory(record, feature, lookup, mode)])
]);

export function listExtractors(mode: DirectoryFieldMode = 'documented'): ExtractorInfo[] {
  const sections = Object.entries(SECTION_AGGREGATES).map(([name, agg]): ExtractorInfo => ({
    name, kind: 'sections', stat: agg.stat, field: SECTION_FIELDS[agg.measure]
  }));
  const directories = Object.entries(DIRECTORY_LOOKUPS).map(([name, lookup]): ExtractorInfo => ({
    name, kind: 'datadirectory', index: DIRECTORY_INDEX[lookup.directory], field: fieldFor(lookup, mode)
  }));
  return [...sections, ...directories];
}

export interface ResolverOptions {
  directoryFields?: DirectoryFieldMode;
}

export interface Resolver {
  readonly directoryFields: DirectoryFieldMode;
  /** Throws FeatureError when the feature cannot be produced. */
  resolve(record: FeatureRecord, feature: string): ResolvedValue;
}

export function createResolver(opts: ResolverOptions = {}): Resolver {
  const mode = opts.directoryFields ?? 'documented';
  return {
    directoryFields: mode,
    resolve(record, feature) {
      const extractor = EXTRACTORS.get(feature);
      if (extractor) return extractor(record, feature, mode);

      const hit = search(record, feature);
      if (!hit.found) throw Errors.FEATURE_NOT_FOUND(feature);
      return hit.value;
    }
  };
}

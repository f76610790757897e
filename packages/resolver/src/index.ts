export { search } from './search';
export { aggregateSections, SECTIONS_KEY, SECTION_FIELDS } from './sections';
export type { SectionAggregate, SectionMeasure, SectionStat } from './sections';
export { readDirectory, fieldFor, DATADIRECTORIES_KEY, DIRECTORY_INDEX } from './datadirectories';
export type { DirectoryField, DirectoryLookup, DirectoryName } from './datadirectories';
export { createResolver, listExtractors } from './resolver';
export type { ExtractorInfo, Resolver, ResolverOptions } from './resolver';

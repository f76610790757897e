/* packages/resolver/test/resolver.spec.ts */
import { describe, it, expect } from 'vitest';
import { createResolver, listExtractors } from '../src';
import { catchFeatureError, directories, loadSampleRecord } from '../../../tests/helpers';

describe('resolver dispatch', () => {
  const resolver = createResolver();

  it('falls back to generic search for unknown names', () => {
    const sample = loadSampleRecord();
    expect(resolver.resolve(sample, 'major_linker_version')).toBe(14);
    expect(resolver.resolve(sample, 'subsystem')).toBe('WINDOWS_GUI');
    expect(resolver.resolve(sample, 'label')).toBe(1);
  });

  it('FeatureNotFound when generic search is exhausted', () => {
    const err = catchFeatureError(() => resolver.resolve(loadSampleRecord(), 'nonexistent_feature'));
    expect(err.kind).toBe('FeatureNotFound');
    expect(err.feature).toBe('nonexistent_feature');
    expect(err.message).toBe("Feature 'nonexistent_feature' could not be extracted");
  });

  it('specialized extractors win over a verbatim key of the same name', () => {
    const rec = { export_size: 999, datadirectories: directories(13) };
    expect(resolver.resolve(rec, 'export_size')).toBe(0);

    const withSections = { sections_max_entropy: -1, sections: [{ entropy: 1.0 }, { entropy: 3.5 }] };
    expect(resolver.resolve(withSections, 'sections_max_entropy')).toBe(3.5);
  });

  it('specialized names fail on their own terms even if the key exists verbatim', () => {
    const err = catchFeatureError(() => resolver.resolve({ debug_rva: 7 }, 'debug_rva'));
    expect(err.kind).toBe('DatadirectoryMissing');
  });

  it('returns composite values untouched; scalar enforcement is the projector\'s job', () => {
    expect(resolver.resolve({ exports: ['a'] }, 'exports')).toEqual(['a']);
  });

  it('defaults to documented directory fields', () => {
    expect(resolver.directoryFields).toBe('documented');
    expect(createResolver({ directoryFields: 'legacy' }).directoryFields).toBe('legacy');
  });
});

describe('extractor catalog', () => {
  it('lists nine section aggregates and six directory lookups', () => {
    const all = listExtractors();
    expect(all.filter((e) => e.kind === 'sections')).toHaveLength(9);
    expect(all.filter((e) => e.kind === 'datadirectory')).toHaveLength(6);
  });

  it('describes what each extractor reads', () => {
    const all = listExtractors();
    expect(all.find((e) => e.name === 'sections_mean_rawsize')).toEqual({
      name: 'sections_mean_rawsize', kind: 'sections', stat: 'mean', field: 'size'
    });
    expect(all.find((e) => e.name === 'iat_rva')).toEqual({
      name: 'iat_rva', kind: 'datadirectory', index: 12, field: 'virtual_address'
    });
  });

  it('reflects the legacy field mapping', () => {
    const legacy = listExtractors('legacy');
    expect(legacy.find((e) => e.name === 'debug_size')).toMatchObject({ index: 6, field: 'virtual_address' });
    expect(legacy.find((e) => e.name === 'export_rva')).toMatchObject({ index: 0, field: 'size' });
  });

  it('export_rva reads the export table size in both modes', () => {
    expect(listExtractors().find((e) => e.name === 'export_rva')).toMatchObject({ index: 0, field: 'size' });
  });

  it('only catalogued names are specialized', () => {
    const names = listExtractors().map((e) => e.name);
    expect(names).toContain('sections_min_virtualsize');
    expect(names).toContain('debug_size');
    expect(names).not.toContain('sections');
    expect(names).not.toContain('label');
  });
});

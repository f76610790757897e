// packages/projector/src/projector.ts
import { Errors, FloatValue, isFeatureError, viewNode } from '@featflat/core';
import type { CellValue, DirectoryFieldMode, FeatureError, FeatureRecord, Row } from '@featflat/core';
import { createResolver } from '@featflat/resolver';
import type { Resolver } from '@featflat/resolver';
import { normalizeSchema } from './schema';

export type ProjectionResult =
  | { ok: true; row: Row }
  | { ok: false; error: FeatureError };

export interface ProjectorOptions {
  directoryFields?: DirectoryFieldMode;
  // injected for tests; built from directoryFields otherwise
  resolver?: Resolver;
}

/**
 * One record in, one row out. The schema is fixed at construction; nothing
 * else is kept between calls, so a projector can be shared freely.
 */
export class RecordProjector {
  readonly schema: readonly string[];
  private readonly resolver: Resolver;

  constructor(features: readonly string[], opts: ProjectorOptions = {}) {
    this.schema = normalizeSchema(features);
    this.resolver = opts.resolver ?? createResolver({ directoryFields: opts.directoryFields });
  }

  get directoryFields(): DirectoryFieldMode {
    return this.resolver.directoryFields;
  }

  /** Resolves a single feature to a cell; throws FeatureError. */
  cell(record: FeatureRecord, feature: string): CellValue {
    const value = this.resolver.resolve(record, feature);
    if (value instanceof FloatValue) return value;
    const view = viewNode(value);
    if (view.kind !== 'scalar') throw Errors.NON_SCALAR(feature, view.kind);
    return view.value;
  }

  project(record: FeatureRecord): ProjectionResult {
    const row: Row = [];
    try {
      for (const feature of this.schema) row.push(this.cell(record, feature));
    } catch (e) {
      if (isFeatureError(e)) return { ok: false, error: e };
      throw e;
    }
    return { ok: true, row };
  }

  /** Pairs a row with the schema, e.g. for JSON output. */
  toRecord(row: Row): Record<string, CellValue> {
    const out: Record<string, CellValue> = {};
    this.schema.forEach((name, i) => { out[name] = row[i]; });
    return out;
  }
}

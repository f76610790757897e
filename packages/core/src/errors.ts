// packages/core/src/errors.ts
export type FeatureErrorKind =
  | 'FeatureNotFound'
  | 'NonScalarFeature'
  | 'SectionsMissing'
  | 'SectionsMalformed'
  | 'DatadirectoryMissing'
  | 'DatadirectoryMalformed'
  | 'MalformedRecord'
  | 'InvalidSchema';

export interface FeatureErrorInit {
  feature?: string;
  line?: number;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class FeatureError extends Error {
  readonly kind: FeatureErrorKind;
  readonly feature?: string;
  readonly line?: number;
  readonly details?: Record<string, unknown>;

  constructor(kind: FeatureErrorKind, message: string, init: FeatureErrorInit = {}) {
    super(message, init.cause === undefined ? undefined : { cause: init.cause });
    this.name = 'FeatureError';
    this.kind = kind;
    this.feature = init.feature;
    this.line = init.line;
    this.details = init.details;
  }
}

export function isFeatureError(e: unknown): e is FeatureError {
  return e instanceof FeatureError;
}

export const Errors = {
  FEATURE_NOT_FOUND: (feature: string) =>
    new FeatureError('FeatureNotFound', `Feature '${feature}' could not be extracted`, { feature }),
  NON_SCALAR: (feature: string, shape: 'mapping' | 'sequence') =>
    new FeatureError('NonScalarFeature', `Feature '${feature}' is a complex object`, { feature, details: { shape } }),
  SECTIONS_MISSING: (feature: string) =>
    new FeatureError('SectionsMissing', 'Sections not found in the record', { feature }),
  SECTIONS_MALFORMED: (feature: string, reason: string, details?: Record<string, unknown>) =>
    new FeatureError('SectionsMalformed', `Sections malformed for '${feature}': ${reason}`, { feature, details }),
  DATADIRECTORY_MISSING: (feature: string) =>
    new FeatureError('DatadirectoryMissing', 'Datadirectories not found in the record', { feature }),
  DATADIRECTORY_MALFORMED: (feature: string, reason: string, details?: Record<string, unknown>) =>
    new FeatureError('DatadirectoryMalformed', `Datadirectories malformed for '${feature}': ${reason}`, { feature, details }),
  MALFORMED_RECORD: (line: number, reason: string, cause?: unknown) =>
    new FeatureError('MalformedRecord', `Line ${line} is not a JSON object: ${reason}`, { line, cause }),
  INVALID_SCHEMA: (reason: string, details?: Record<string, unknown>) =>
    new FeatureError('InvalidSchema', `Invalid feature schema: ${reason}`, { details })
} as const;

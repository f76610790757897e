// packages/core/src/schemas.ts
import { z } from 'zod';
import { isJsonObject } from './types';
import type { JsonObject } from './types';

export const ErrorModeEnum = z.enum(['abort-on-first-error', 'skip-and-report']);
export const DirectoryFieldModeEnum = z.enum(['documented', 'legacy']);

export const FeatureListSchema = z.array(z.string().min(1)).min(1);

// featflat.json
export const ConfigSchema = z.object({
  features: FeatureListSchema,
  errorMode: ErrorModeEnum.default('abort-on-first-error'),
  progressEvery: z.number().int().positive().default(10_000),
  directoryFields: DirectoryFieldModeEnum.default('documented')
}).strict();
export type Config = z.infer<typeof ConfigSchema>;

// POST /project
// record passes through as the same object so the key order the body
// decoder recorded stays attached to it.
export const ProjectRequestSchema = z.object({
  features: FeatureListSchema,
  record: z.custom<JsonObject>(isJsonObject, { message: 'Expected object' }),
  directoryFields: DirectoryFieldModeEnum.optional()
}).strict();
export type ProjectRequest = z.infer<typeof ProjectRequestSchema>;

// POST /convert
export const ConvertRequestSchema = z.object({
  path: z.string().min(1),
  features: FeatureListSchema.optional(),
  outputPath: z.string().min(1).optional(),
  errorMode: ErrorModeEnum.optional(),
  directoryFields: DirectoryFieldModeEnum.optional()
}).strict();
export type ConvertRequest = z.infer<typeof ConvertRequestSchema>;

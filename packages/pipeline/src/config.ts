// packages/pipeline/src/config.ts
import fs from 'node:fs';
import path from 'node:path';
import { ConfigSchema, isJsonObject } from '@featflat/core';
import type { Config, JsonObject } from '@featflat/core';

export const CONFIG_FILE = 'featflat.json';

// header and data-directory columns of the stock EMBER export
export const DEFAULT_FEATURES: readonly string[] = [
  'debug_size',
  'debug_rva',
  'iat_rva',
  'export_size',
  'export_rva',
  'resource_size',
  'major_linker_version',
  'minor_linker_version',
  'major_operating_system_version',
  'minor_operating_system_version',
  'major_image_version',
  'minor_image_version',
  'exports',
  'label'
];

export function findUp(filename: string, startDir = process.cwd()): string | null {
  let dir = path.resolve(startDir);
  while (true) {
    const candidate = path.join(dir, filename);
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedConfig {
  config: Config;
  // file the values came from; null when running on built-in defaults
  source: string | null;
}

function readConfigFile(file: string): JsonObject {
  const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  if (!isJsonObject(parsed)) throw new Error(`${file}: config must be a JSON object`);
  return parsed;
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (env.FEATFLAT_ERROR_MODE) out.errorMode = env.FEATFLAT_ERROR_MODE;
  if (env.FEATFLAT_DIRECTORY_FIELDS) out.directoryFields = env.FEATFLAT_DIRECTORY_FIELDS;
  if (env.FEATFLAT_PROGRESS_EVERY) out.progressEvery = Number(env.FEATFLAT_PROGRESS_EVERY);
  return out;
}

/**
 * Reads featflat.json (FEATFLAT_CONFIG, or the nearest one walking up from
 * cwd), applies FEATFLAT_* overrides and validates the result. Throws a
 * ZodError on invalid values.
 */
export function loadConfig(opts: LoadConfigOptions = {}): LoadedConfig {
  const env = opts.env ?? process.env;
  const cwd = opts.cwd ?? process.cwd();

  let source: string | null;
  if (env.FEATFLAT_CONFIG) {
    source = path.resolve(cwd, env.FEATFLAT_CONFIG);
    if (!fs.existsSync(source)) throw new Error(`FEATFLAT_CONFIG points at a missing file: ${source}`);
  } else {
    source = findUp(CONFIG_FILE, cwd);
  }

  const base: JsonObject = source ? readConfigFile(source) : { features: [...DEFAULT_FEATURES] };
  const config = ConfigSchema.parse({ ...base, ...envOverrides(env) });
  return { config, source };
}

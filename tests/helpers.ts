/* tests/helpers.ts */
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { FeatureError, isJsonObject } from '@featflat/core';
import type { FeatureRecord, JsonObject } from '@featflat/core';

const HERE = path.dirname(fileURLToPath(import.meta.url));
export const SAMPLE_RECORD_PATH = path.resolve(HERE, '../packages/resolver/test/fixtures/sample-record.json');

export function loadSampleRecord(): FeatureRecord {
  const parsed: unknown = JSON.parse(fs.readFileSync(SAMPLE_RECORD_PATH, 'utf-8'));
  if (!isJsonObject(parsed)) throw new Error(`fixture is not a JSON object: ${SAMPLE_RECORD_PATH}`);
  return parsed;
}

/** runs fn and returns the FeatureError it throws; anything else fails the test */
export function catchFeatureError(fn: () => unknown): FeatureError {
  try {
    fn();
  } catch (e) {
    if (e instanceof FeatureError) return e;
    throw e;
  }
  throw new Error('expected a FeatureError');
}

/** n data-directory entries; entry i has size i*10 and virtual_address i*100 */
export function directories(n: number): JsonObject[] {
  return Array.from({ length: n }, (_, i) => ({ size: i * 10, virtual_address: i * 100 }));
}

/** fresh scratch directory under the OS temp dir */
export function makeTempDir(prefix = 'featflat-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeLines(file: string, lines: string[]): string {
  fs.writeFileSync(file, lines.map((l) => l + '\n').join(''));
  return file;
}

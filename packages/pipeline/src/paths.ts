// packages/pipeline/src/paths.ts
import path from 'node:path';

/** `data/train_0.jsonl` -> `data/train_0.csv`; only the last extension is replaced. */
export function deriveOutputPath(sourcePath: string): string {
  const ext = path.extname(sourcePath);
  return sourcePath.slice(0, sourcePath.length - ext.length) + '.csv';
}

// packages/pipeline/src/source.ts
// JSON Lines reader: one decoded record (or one decode failure) per line.
import fs from 'node:fs';
import readline from 'node:readline';
import { Errors, decodeJson, isJsonObject, viewNode } from '@featflat/core';
import type { FeatureError, FeatureRecord, JsonValue } from '@featflat/core';

export type SourceItem =
  | { line: number; record: FeatureRecord }
  | { line: number; error: FeatureError };

export function decodeLine(text: string, line: number): SourceItem {
  let parsed: JsonValue;
  try {
    parsed = decodeJson(text);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return { line, error: Errors.MALFORMED_RECORD(line, reason, e) };
  }
  if (!isJsonObject(parsed)) {
    return { line, error: Errors.MALFORMED_RECORD(line, `top-level value is a ${viewNode(parsed).kind}`) };
  }
  return { line, record: parsed };
}

/**
 * Lines are numbered from 1. A blank line is reported as malformed; the end
 * of the file simply ends the iteration.
 */
export async function* readRecords(file: string): AsyncGenerator<SourceItem> {
  const input = fs.createReadStream(file, { encoding: 'utf-8' });
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  let line = 0;
  try {
    for await (const text of rl) {
      line++;
      yield decodeLine(text, line);
    }
  } finally {
    rl.close();
    input.destroy();
  }
}

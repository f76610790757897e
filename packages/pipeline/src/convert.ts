// packages/pipeline/src/convert.ts
// JSONL -> CSV conversion job.
import fs from 'node:fs';
import type { DirectoryFieldMode, ErrorMode, FeatureError, FeatureErrorKind } from '@featflat/core';
import { RecordProjector } from '@featflat/projector';
import type { ProjectionResult } from '@featflat/projector';
import { CsvWriter } from './csv';
import { silentLogger } from './logger';
import type { BaseLogger } from './logger';
import { deriveOutputPath } from './paths';
import { readRecords } from './source';

export interface ConvertOptions {
  features: readonly string[];
  outputPath?: string;
  errorMode?: ErrorMode;
  directoryFields?: DirectoryFieldMode;
  progressEvery?: number;
  logger?: BaseLogger;
}

export interface RecordFailure {
  line: number;
  kind: FeatureErrorKind;
  feature?: string;
  message: string;
}

export type ConvertFailureReason = 'SOURCE_NOT_FOUND' | 'OUTPUT_EXISTS' | 'RECORD_FAILED';

export type ConvertResult =
  | {
      ok: true;
      sourcePath: string;
      outputPath: string;
      lines: number;
      rows: number;
      // always empty under abort-on-first-error
      failures: RecordFailure[];
    }
  | {
      ok: false;
      reason: ConvertFailureReason;
      sourcePath: string;
      outputPath: string;
      message: string;
      failure?: RecordFailure;
    };

function toFailure(error: FeatureError, line: number): RecordFailure {
  return {
    line,
    kind: error.kind,
    ...(error.feature !== undefined ? { feature: error.feature } : {}),
    message: error.message
  };
}

function isAlreadyExists(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'EEXIST';
}

/**
 * Converts one JSON Lines file into CSV.
 *
 * The output is never overwritten. Under `abort-on-first-error` (default)
 * the first bad line deletes the partial CSV and fails the job; under
 * `skip-and-report` bad lines are left out and listed in `failures`.
 * An invalid feature list throws before any file is touched.
 */
export async function convertFile(sourcePath: string, opts: ConvertOptions): Promise<ConvertResult> {
  const log = opts.logger ?? silentLogger;
  const errorMode = opts.errorMode ?? 'abort-on-first-error';
  const progressEvery = opts.progressEvery ?? 10_000;
  const projector = new RecordProjector(opts.features, { directoryFields: opts.directoryFields });
  const outputPath = opts.outputPath ?? deriveOutputPath(sourcePath);

  if (!fs.existsSync(sourcePath)) {
    const message = `File ${sourcePath} not found.`;
    log.warn({ sourcePath }, message);
    return { ok: false, reason: 'SOURCE_NOT_FOUND', sourcePath, outputPath, message };
  }

  log.info({ sourcePath, outputPath, errorMode, columns: projector.schema.length }, 'conversion-start');

  const exists = (): ConvertResult => {
    const message = `The file ${outputPath} already exists.`;
    log.warn({ outputPath }, message);
    return { ok: false, reason: 'OUTPUT_EXISTS', sourcePath, outputPath, message };
  };
  if (fs.existsSync(outputPath)) return exists();

  let writer: CsvWriter;
  try {
    writer = await CsvWriter.open(outputPath, projector.schema);
  } catch (e) {
    if (isAlreadyExists(e)) return exists();
    throw e;
  }

  const failures: RecordFailure[] = [];
  let lines = 0;
  let rows = 0;

  try {
    for await (const item of readRecords(sourcePath)) {
      lines = item.line;
      const result: ProjectionResult = 'error' in item
        ? { ok: false, error: item.error }
        : projector.project(item.record);

      if (result.ok) {
        await writer.writeRow(result.row);
        rows++;
      } else {
        const failure = toFailure(result.error, item.line);
        log.error({ sourcePath, ...failure }, failure.message);
        if (errorMode === 'abort-on-first-error') {
          await writer.abort();
          return {
            ok: false,
            reason: 'RECORD_FAILED',
            sourcePath,
            outputPath,
            message: `Line ${failure.line}: ${failure.message}`,
            failure
          };
        }
        failures.push(failure);
      }

      if (lines % progressEvery === 0) log.info(`[${lines}] lines processed for ${sourcePath}`);
    }
    await writer.close();
  } catch (e) {
    await writer.abort();
    throw e;
  }

  log.info({ outputPath, lines, rows, skipped: failures.length }, `CSV file generated successfully at ${outputPath}`);
  return { ok: true, sourcePath, outputPath, lines, rows, failures };
}

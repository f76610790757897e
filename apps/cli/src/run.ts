// apps/cli/src/run.ts
import path from 'node:path';
import { ZodError } from 'zod';
import { isFeatureError } from '@featflat/core';
import { convertFile, createLogger, loadConfig } from '@featflat/pipeline';
import type { BaseLogger, LoadedConfig } from '@featflat/pipeline';
import { USAGE, parseArgs } from './args';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

export interface CliIO {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  logger?: BaseLogger;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

function tryLoadConfig(cwd: string, env: NodeJS.ProcessEnv): LoadedConfig | string {
  try {
    return loadConfig({ cwd, env });
  } catch (e) {
    if (e instanceof ZodError) {
      return e.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    }
    if (e instanceof Error) return e.message;
    throw e;
  }
}

/** Runs one conversion and returns the process exit code. */
export async function runCli(argv: readonly string[], io: CliIO = {}): Promise<number> {
  const cwd = io.cwd ?? process.cwd();
  const env = io.env ?? process.env;
  const stdout = io.stdout ?? ((line: string) => process.stdout.write(line + '\n'));
  const stderr = io.stderr ?? ((line: string) => process.stderr.write(line + '\n'));

  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    stderr(`featflat: ${parsed.message}`);
    stderr(USAGE);
    return EXIT_USAGE;
  }
  const { args } = parsed;

  const loaded = tryLoadConfig(cwd, env);
  if (typeof loaded === 'string') {
    stderr(`featflat: invalid configuration: ${loaded}`);
    return EXIT_USAGE;
  }
  const { config } = loaded;

  const logger = io.logger ?? createLogger('featflat', env.LOG_LEVEL ?? 'info');
  try {
    const result = await convertFile(path.resolve(cwd, args.source), {
      features: args.features ?? config.features,
      outputPath: args.out === undefined ? undefined : path.resolve(cwd, args.out),
      errorMode: args.mode ?? config.errorMode,
      directoryFields: args.directoryFields ?? config.directoryFields,
      progressEvery: config.progressEvery,
      logger
    });
    if (!result.ok) {
      stderr(result.message);
      return EXIT_FAILED;
    }
    for (const f of result.failures) stderr(`skipped line ${f.line}: ${f.message}`);
    stdout(`${result.rows} rows written to ${result.outputPath}`);
    return EXIT_OK;
  } catch (e) {
    if (isFeatureError(e) && e.kind === 'InvalidSchema') {
      stderr(`featflat: ${e.message}`);
      return EXIT_USAGE;
    }
    throw e;
  }
}

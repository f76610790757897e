// apps/cli/src/args.ts
import { DirectoryFieldModeEnum, ErrorModeEnum } from '@featflat/core';
import type { DirectoryFieldMode, ErrorMode } from '@featflat/core';

export const USAGE =
  'usage: featflat <file.jsonl> [--features a,b,c] [--out path] ' +
  '[--mode abort-on-first-error|skip-and-report] [--directory-fields documented|legacy]';

export interface CliArgs {
  source: string;
  features?: string[];
  out?: string;
  mode?: ErrorMode;
  directoryFields?: DirectoryFieldMode;
}

export type ParsedArgs =
  | { ok: true; args: CliArgs }
  | { ok: false; message: string };

const FLAGS = ['--features', '--out', '--mode', '--directory-fields'] as const;
type Flag = (typeof FLAGS)[number];

function isFlag(s: string): s is Flag {
  return FLAGS.some((f) => f === s);
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  const values = new Map<Flag, string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }
    // --flag=value and --flag value
    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg : arg.slice(0, eq);
    if (!isFlag(name)) return { ok: false, message: `unknown option ${name}` };
    const value = eq === -1 ? argv[++i] : arg.slice(eq + 1);
    if (value === undefined || value === '') return { ok: false, message: `${name} needs a value` };
    values.set(name, value);
  }

  if (positional.length !== 1) {
    return { ok: false, message: positional.length === 0 ? 'missing input file' : 'expected exactly one input file' };
  }

  const args: CliArgs = { source: positional[0] };

  const features = values.get('--features');
  if (features !== undefined) {
    const list = features.split(',').map((s) => s.trim()).filter(Boolean);
    if (list.length === 0) return { ok: false, message: '--features needs at least one name' };
    args.features = list;
  }

  const out = values.get('--out');
  if (out !== undefined) args.out = out;

  const mode = values.get('--mode');
  if (mode !== undefined) {
    const parsed = ErrorModeEnum.safeParse(mode);
    if (!parsed.success) return { ok: false, message: `--mode must be one of ${ErrorModeEnum.options.join(', ')}` };
    args.mode = parsed.data;
  }

  const dirs = values.get('--directory-fields');
  if (dirs !== undefined) {
    const parsed = DirectoryFieldModeEnum.safeParse(dirs);
    if (!parsed.success) {
      return { ok: false, message: `--directory-fields must be one of ${DirectoryFieldModeEnum.options.join(', ')}` };
    }
    args.directoryFields = parsed.data;
  }

  return { ok: true, args };
}

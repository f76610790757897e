// packages/pipeline/src/logger.ts
import pino from 'pino';
import type { BaseLogger } from 'pino';

export type { BaseLogger };

export function createLogger(name = 'featflat', level = process.env.LOG_LEVEL ?? 'info'): BaseLogger {
  return pino({ name, level });
}

// silent logger for callers that do not care about progress output
export const silentLogger: BaseLogger = pino({ level: 'silent' });

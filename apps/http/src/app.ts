// apps/http/src/app.ts
import Fastify from 'fastify';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import path from 'node:path';
import { ZodError } from 'zod';
import type { ZodIssue } from 'zod';
import { ConvertRequestSchema, ProjectRequestSchema, decodeJson, isFeatureError, isJsonObject } from '@featflat/core';
import type { Config } from '@featflat/core';
import { listExtractors } from '@featflat/resolver';
import { RecordProjector } from '@featflat/projector';
import { convertFile } from '@featflat/pipeline';
import type { ConvertFailureReason } from '@featflat/pipeline';

export interface AppOptions {
  config: Config;
  // relative /convert paths resolve here, and no path may leave it
  dataRoot?: string;
  logger?: boolean;
  bodyLimit?: number;
  corsOrigins?: string[];
}

function shouldDebug(req: FastifyRequest) {
  const query = isJsonObject(req.query) ? req.query : {};
  const q = String(query.debug ?? '');
  const h = String(req.headers['x-debug'] ?? '');
  return q === '1' || h === '1' || process.env.DEBUG_ERRORS === '1';
}

export function classifyError(e: unknown) {
  const message = e instanceof Error ? e.message : String(e);
  if (e instanceof ZodError) return { code: 'VALIDATION', status: 400, message };
  if (isFeatureError(e)) {
    return e.kind === 'InvalidSchema'
      ? { code: 'VALIDATION', status: 400, message }
      : { code: e.kind, status: 422, message };
  }
  // body parser / schema errors raised by fastify itself
  if (e instanceof Error && 'statusCode' in e && typeof e.statusCode === 'number' && e.statusCode < 500) {
    const code = 'code' in e && typeof e.code === 'string' ? e.code : 'BAD_REQUEST';
    return { code, status: e.statusCode, message };
  }
  return { code: 'FEATFLAT_INTERNAL', status: 500, message };
}

function validationDetails(issues: ZodIssue[]) {
  return issues.map((i) => ({ path: i.path.join('.'), msg: i.message, code: i.code }));
}

const CONVERT_STATUS: Record<ConvertFailureReason, number> = {
  SOURCE_NOT_FOUND: 404,
  OUTPUT_EXISTS: 409,
  RECORD_FAILED: 422
};

export async function buildApp(opts: AppOptions): Promise<FastifyInstance> {
  const { config } = opts;
  const dataRoot = path.resolve(opts.dataRoot ?? process.cwd());

  const app = Fastify({
    logger: opts.logger ?? true,
    bodyLimit: opts.bodyLimit ?? 5_000_000
  });

  const allow = opts.corsOrigins ?? [];
  await app.register(cors, {
    origin: (origin, cb) => {
      if (!origin || allow.length === 0 || allow.includes(origin)) return cb(null, true);
      cb(new Error('CORS not allowed'), false);
    },
    credentials: true
  });

  await app.register(rateLimit, {
    max: 600,
    timeWindow: '1 minute'
  });

  // JSON bodies keep the key order of their text; see decodeJson
  app.removeContentTypeParser('application/json');
  app.addContentTypeParser('application/json', { parseAs: 'string' }, (_req, body, done) => {
    try {
      done(null, decodeJson(String(body)));
    } catch (e) {
      const err = e instanceof Error ? e : new Error(String(e));
      done(Object.assign(err, { statusCode: 400 }), undefined);
    }
  });

  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('x-request-id', req.id);
    return payload;
  });

  app.setErrorHandler((err, req, rep) => {
    const { code, status, message } = classifyError(err);
    if (status >= 500) req.log.error({ err, requestId: req.id }, 'request-error');
    else req.log.warn({ code, requestId: req.id }, message);
    rep.status(status).send({
      code,
      message: 'Request failed',
      error: message,
      requestId: req.id,
      ...(shouldDebug(req) ? { trace: { errorCode: code } } : {})
    });
  });

  app.get('/healthz', async () => ({ ok: true }));

  // ------------------------------------
  // GET /features  (default schema + specialized extractors)
  // ------------------------------------
  app.get('/features', async () => ({
    defaults: config.features,
    directoryFields: config.directoryFields,
    extractors: listExtractors(config.directoryFields)
  }));

  // ------------------------------------
  // POST /project  (one record -> one row)
  // ------------------------------------
  app.post('/project', async (req, reply) => {
    const parsed = ProjectRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.status(400).send({ code: 'VALIDATION', details: validationDetails(parsed.error.issues) });
    }
    const { features, record, directoryFields } = parsed.data;

    const projector = new RecordProjector(features, { directoryFields: directoryFields ?? config.directoryFields });
    const result = projector.project(record);
    if (!result.ok) {
      const { error } = result;
      return reply.status(422).send({
        code: error.kind,
        feature: error.feature,
        message: error.message,
        ...(shouldDebug(req) && error.details ? { details: error.details } : {})
      });
    }
    return reply.send({
      schema: projector.schema,
      row: result.row,
      values: projector.toRecord(result.row)
    });
  });

  // ------------------------------------
  // POST /convert  (JSONL file -> CSV next to it)
  // ------------------------------------
  app.post('/convert', async (req, reply) => {
    const parsed = ConvertRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.status(400).send({ code: 'VALIDATION', details: validationDetails(parsed.error.issues) });
    }
    const body = parsed.data;

    const inRoot = (p: string) => {
      const abs = path.resolve(dataRoot, p);
      return abs === dataRoot || abs.startsWith(dataRoot + path.sep) ? abs : null;
    };
    const sourcePath = inRoot(body.path);
    const outputPath = body.outputPath === undefined ? undefined : inRoot(body.outputPath);
    if (!sourcePath || outputPath === null) {
      return reply.status(400).send({ code: 'PATH_OUTSIDE_ROOT', message: `paths must stay inside ${dataRoot}` });
    }

    const result = await convertFile(sourcePath, {
      features: body.features ?? config.features,
      outputPath,
      errorMode: body.errorMode ?? config.errorMode,
      directoryFields: body.directoryFields ?? config.directoryFields,
      progressEvery: config.progressEvery,
      logger: req.log
    });

    if (result.ok) return reply.send(result);
    return reply.status(CONVERT_STATUS[result.reason]).send({ code: result.reason, ...result });
  });

  return app;
}

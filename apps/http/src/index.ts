// apps/http/src/index.ts
import { loadConfig } from '@featflat/pipeline';
import { buildApp } from './app';

async function main() {
  const { config, source } = loadConfig();
  const corsOrigins = (process.env.CORS_ORIGIN || '').split(',').map(s => s.trim()).filter(Boolean);

  const app = await buildApp({
    config,
    dataRoot: process.env.FEATFLAT_DATA_ROOT,
    corsOrigins
  });

  app.log.info(
    {
      config: source ?? 'built-in defaults',
      features: config.features.length,
      error_mode: config.errorMode,
      directory_fields: config.directoryFields,
      data_root: process.env.FEATFLAT_DATA_ROOT ?? 'cwd'
    },
    'featflat-config'
  );

  const onShutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting-down');
    try {
      await app.close();
    } finally {
      process.exit(0);
    }
  };
  const shutdownOn = (signal: NodeJS.Signals) =>
    process.on(signal, () => {
      onShutdown(signal).catch((err) => {
        app.log.error({ err }, 'shutdown-failed');
        process.exit(1);
      });
    });
  shutdownOn('SIGINT');
  shutdownOn('SIGTERM');

  const port = Number(process.env.PORT ?? 4000);
  const host = process.env.HOST ?? '0.0.0.0';
  await app.listen({ port, host });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Fatal boot error', err);
  process.exit(1);
});

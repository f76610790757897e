#!/usr/bin/env tsx
// apps/cli/src/index.ts
import { runCli } from './run';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    // eslint-disable-next-line no-console
    console.error('featflat: unexpected failure', err);
    process.exitCode = 1;
  });

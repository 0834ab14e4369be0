#!/usr/bin/env node
// This is the process entrypoint that serves MCP over stdin/stdout.

import { startServer } from './server.js';

startServer({ env: process.env, input: process.stdin, output: process.stdout })
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
    process.exit(1);
  });

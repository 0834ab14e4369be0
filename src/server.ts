// This module wires configuration, model availability, and the stdio transport into one server run.

import type { Readable, Writable } from 'node:stream';
import type { Logger } from 'pino';
import { loadServerConfig } from './config/config.js';
import { type ModelClientFactory, createServerRuntime } from './gemini/runtime.js';
import { RPC_INTERNAL_ERROR, rpcError } from './mcp/protocol.js';
import { runStdioTransport, writeResponseLine } from './transport/stdio.js';
import type { ServerConfig } from './types/domain.js';
import { normalizeError } from './utils/errors.js';
import { createLogger, errorForLog } from './utils/logger.js';
import { MCP_SERVER_NAME, MCP_SERVER_VERSION } from './version.js';

export interface StartServerOptions {
  env: Record<string, string | undefined>;
  input: Readable;
  output: Writable;
  logger?: Logger;
  createModelClient?: ModelClientFactory;
}

// This function runs the server until input ends and returns the process exit code.
export async function startServer(options: StartServerOptions): Promise<number> {
  const logger = options.logger ?? createLogger(options.env.LOG_LEVEL);
  logger.info({ event: 'server_starting', name: MCP_SERVER_NAME, version: MCP_SERVER_VERSION }, 'server_starting');

  // A closed stdout (EPIPE) is reported through the pending write; the listener keeps it from being rethrown.
  options.output.on('error', (error) => {
    logger.error({ event: 'server_output_failed', error: errorForLog(error) }, 'server_output_failed');
  });

  let config: ServerConfig;
  try {
    config = loadServerConfig(options.env, logger);
  } catch (error) {
    const appError = normalizeError(error);
    logger.fatal({ event: 'server_config_invalid', code: appError.code, error: errorForLog(error) }, 'server_config_invalid');
    // One protocol line tells the supervising client why the server is exiting.
    try {
      await writeResponseLine(options.output, rpcError(undefined, RPC_INTERNAL_ERROR, appError.message));
    } catch (writeError) {
      logger.error({ event: 'server_output_failed', error: errorForLog(writeError) }, 'server_output_failed');
    }
    return 1;
  }

  const runtime = createServerRuntime(config, logger, options.createModelClient);
  try {
    const stats = await runStdioTransport({ input: options.input, output: options.output, runtime, logger });
    logger.info({ event: 'server_stopped', ...stats }, 'server_stopped');
    return 0;
  } catch (error) {
    logger.fatal({ event: 'server_transport_failed', error: errorForLog(error) }, 'server_transport_failed');
    return 1;
  }
}

// This module drives the newline-delimited JSON-RPC loop over a readable and writable stream pair.

import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { Logger } from 'pino';
import { RPC_INTERNAL_ERROR, handleRpcRequest, rpcError } from '../mcp/protocol.js';
import type { ServerRuntime } from '../types/domain.js';
import type { JsonRpcId, JsonRpcRequest, JsonRpcResponse } from '../types/mcp.js';
import { isJsonObject, tryParseJson } from '../utils/json.js';
import { errorForLog } from '../utils/logger.js';

export interface StdioTransportOptions {
  input: Readable;
  output: Writable;
  runtime: ServerRuntime;
  logger: Logger;
}

export interface StdioTransportStats {
  received: number;
  responded: number;
  dropped: number;
}

// Extraction records how far it got so a failure can still echo the id when one was read.
class RequestExtractionError extends Error {
  public readonly id: JsonRpcId | undefined;

  public constructor(message: string, id?: JsonRpcId) {
    super(message);
    this.name = 'RequestExtractionError';
    this.id = id;
  }
}

function isJsonRpcId(value: unknown): value is JsonRpcId {
  return value === null || typeof value === 'string' || typeof value === 'number';
}

// This helper pulls method, id, and params out of one parsed frame.
export function extractRequest(frame: unknown): JsonRpcRequest {
  if (!isJsonObject(frame)) {
    throw new RequestExtractionError('request must be a JSON object');
  }

  const rawId = frame.id;
  let id: JsonRpcId = null;
  if (rawId !== undefined) {
    if (!isJsonRpcId(rawId)) {
      throw new RequestExtractionError('request id must be a string, number, or null');
    }
    id = rawId;
  }

  const params = frame.params ?? {};
  if (!isJsonObject(params)) {
    throw new RequestExtractionError('params must be a JSON object', id);
  }

  return {
    jsonrpc: typeof frame.jsonrpc === 'string' ? frame.jsonrpc : undefined,
    id,
    method: typeof frame.method === 'string' ? frame.method : String(frame.method),
    params
  };
}

// This helper writes one response line and resolves once the stream has accepted it.
export function writeResponseLine(output: Writable, response: JsonRpcResponse): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(`${JSON.stringify(response)}\n`, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

// This function processes frames strictly one at a time until the input stream ends.
export async function runStdioTransport(options: StdioTransportOptions): Promise<StdioTransportStats> {
  const { input, output, runtime, logger } = options;
  const stats: StdioTransportStats = { received: 0, responded: 0, dropped: 0 };
  const lines = createInterface({ input, crlfDelay: Infinity, terminal: false });

  logger.info({ event: 'mcp_stdio_transport_started' }, 'mcp_stdio_transport_started');

  for await (const line of lines) {
    const trimmed = line.trim();
    if (trimmed.length === 0) {
      continue;
    }

    stats.received += 1;
    const parsed = tryParseJson(trimmed);
    if (!parsed.ok) {
      stats.dropped += 1;
      logger.warn(
        { event: 'mcp_stdio_frame_dropped', reason: parsed.reason, frameLength: trimmed.length },
        'mcp_stdio_frame_dropped'
      );
      continue;
    }

    let knownId: JsonRpcId | undefined = undefined;
    let response: JsonRpcResponse;
    try {
      const request = extractRequest(parsed.value);
      knownId = request.id;
      response = await handleRpcRequest(request, { runtime, logger });
    } catch (error) {
      if (error instanceof RequestExtractionError) {
        knownId = error.id;
      }
      logger.error(
        { event: 'mcp_stdio_request_failed', rpcRequestId: knownId, error: errorForLog(error) },
        'mcp_stdio_request_failed'
      );
      const detail = error instanceof Error ? error.message : String(error);
      response = rpcError(knownId, RPC_INTERNAL_ERROR, `Internal error: ${detail}`);
    }

    await writeResponseLine(output, response);
    stats.responded += 1;
  }

  logger.info({ event: 'mcp_stdio_input_closed', ...stats }, 'mcp_stdio_input_closed');
  return stats;
}

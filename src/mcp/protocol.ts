// This module routes one decoded JSON-RPC request to the MCP method handlers and shapes the response envelope.

import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { ServerRuntime } from '../types/domain.js';
import type { JsonRpcId, JsonRpcRequest, JsonRpcResponse } from '../types/mcp.js';
import { AppError, normalizeError } from '../utils/errors.js';
import { isJsonObject } from '../utils/json.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from '../version.js';
import { buildToolList } from './tool-schemas.js';
import { executeTool } from './tools.js';

export const RPC_METHOD_NOT_FOUND = -32601;
export const RPC_INTERNAL_ERROR = -32603;

export interface RpcContext {
  runtime: ServerRuntime;
  logger: Logger;
}

// This helper creates a canonical JSON-RPC error payload; a missing id stays missing on the wire.
export function rpcError(id: JsonRpcId | undefined, code: number, message: string): JsonRpcResponse {
  return {
    jsonrpc: '2.0',
    id,
    error: {
      code,
      message
    }
  };
}

function rpcResult(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return {
    jsonrpc: '2.0',
    id,
    result
  };
}

// This helper maps internal application errors into the two JSON-RPC codes this server emits.
export function mapAppErrorToRpc(error: AppError): { code: number; message: string } {
  if (error.code === 'method_not_found') {
    return { code: RPC_METHOD_NOT_FOUND, message: error.message };
  }

  return { code: RPC_INTERNAL_ERROR, message: error.message };
}

function buildInitializeResult(): Record<string, unknown> {
  return {
    protocolVersion: MCP_PROTOCOL_VERSION,
    capabilities: {
      tools: {}
    },
    serverInfo: {
      name: MCP_SERVER_NAME,
      version: MCP_SERVER_VERSION
    }
  };
}

// This function handles one JSON-RPC request; every failure becomes an error envelope for the same id.
export async function handleRpcRequest(request: JsonRpcRequest, context: RpcContext): Promise<JsonRpcResponse> {
  const requestId = request.id ?? null;
  const startedAt = Date.now();
  const rpcTraceId = randomUUID();
  const { logger } = context;

  logger.info(
    {
      event: 'mcp_rpc_request_received',
      rpcTraceId,
      rpcRequestId: requestId,
      method: request.method
    },
    'mcp_rpc_request_received'
  );

  try {
    switch (request.method) {
      case 'initialize':
        return rpcResult(requestId, buildInitializeResult());

      case 'tools/list':
        return rpcResult(requestId, { tools: buildToolList(context.runtime.availability) });

      case 'tools/call': {
        const params: Record<string, unknown> = request.params ?? {};
        const name = params.name;
        const args = params.arguments ?? {};

        if (typeof name !== 'string') {
          logger.warn(
            {
              event: 'mcp_tool_call_invalid_name',
              rpcTraceId,
              rpcRequestId: requestId,
              providedNameType: typeof name
            },
            'mcp_tool_call_invalid_name'
          );
          throw new AppError('invalid_params', 'tools/call requires params.name as string.');
        }

        logger.info(
          {
            event: 'mcp_tool_call_requested',
            rpcTraceId,
            rpcRequestId: requestId,
            toolName: name,
            arguments: isJsonObject(args) ? sanitizeForLog(args) : typeof args
          },
          'mcp_tool_call_requested'
        );

        const result = await executeTool(name, args, {
          runtime: context.runtime,
          logger: logger.child({ rpcTraceId })
        });
        return rpcResult(requestId, result);
      }

      default:
        throw new AppError('method_not_found', `Method not found: ${request.method}`);
    }
  } catch (error) {
    const appError = normalizeError(error);
    const mapped = mapAppErrorToRpc(appError);

    logger.error(
      {
        event: 'mcp_rpc_request_failed',
        rpcTraceId,
        rpcRequestId: requestId,
        method: request.method,
        code: appError.code,
        rpcCode: mapped.code,
        details: sanitizeForLog(appError.details),
        error: errorForLog(error),
        durationMs: Date.now() - startedAt
      },
      'mcp_rpc_request_failed'
    );

    return rpcError(requestId, mapped.code, mapped.message);
  } finally {
    logger.info(
      {
        event: 'mcp_rpc_request_completed',
        rpcTraceId,
        rpcRequestId: requestId,
        method: request.method,
        durationMs: Date.now() - startedAt
      },
      'mcp_rpc_request_completed'
    );
  }
}

// This file defines minimal JSON-RPC and MCP protocol payload types used by the stdio transport.

export type JsonRpcId = string | number | null;

export interface JsonRpcRequest {
  jsonrpc?: string;
  id?: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

// The id is omitted only when a failure happened before it could be read from the request.
export type JsonRpcResponse =
  | { jsonrpc: '2.0'; id?: JsonRpcId; result: unknown; error?: never }
  | { jsonrpc: '2.0'; id?: JsonRpcId; error: JsonRpcError; result?: never };

export interface McpTool {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface ToolCallResult {
  content: Array<{ type: 'text'; text: string }>;
}

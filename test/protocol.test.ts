// This test suite verifies JSON-RPC method routing, id echoing, and error envelopes.

import pino from 'pino';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { GeminiClient } from '../src/gemini/client.js';
import { handleRpcRequest, mapAppErrorToRpc, type RpcContext } from '../src/mcp/protocol.js';
import type { ServerRuntime } from '../src/types/domain.js';
import { AppError, normalizeError } from '../src/utils/errors.js';

function makeContext(availability?: ServerRuntime['availability']): RpcContext {
  const client = new GeminiClient({
    apiKey: 'test-key',
    apiBaseUrl: 'https://generativelanguage.googleapis.com',
    selectedModel: 'gemini-2.0-flash',
    timeoutMs: 1000
  });

  return {
    runtime: {
      availability: availability ?? { status: 'available', model: 'gemini-2.0-flash', client },
      systemPrompt: null,
      maxOutputTokens: 8192
    },
    logger: pino({ level: 'silent' })
  };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('json-rpc dispatcher', () => {
  it('echoes string, numeric, and null ids on initialize', async () => {
    const context = makeContext();

    for (const id of ['req-1', 42, null]) {
      const response = await handleRpcRequest({ jsonrpc: '2.0', id, method: 'initialize' }, context);
      expect(response.id).toBe(id);
    }
  });

  it('treats a missing id as null', async () => {
    const response = await handleRpcRequest({ method: 'initialize' }, makeContext());
    expect(response.id).toBeNull();
  });

  it('returns identical initialize results on repeated calls', async () => {
    const context = makeContext();
    const first = await handleRpcRequest({ id: 1, method: 'initialize' }, context);
    const second = await handleRpcRequest({ id: 2, method: 'initialize' }, context);

    expect(first.result).toEqual({
      protocolVersion: '2024-11-05',
      capabilities: { tools: {} },
      serverInfo: { name: 'gemini-collab-mcp', version: '1.0.0' }
    });
    expect(second.result).toEqual(first.result);
  });

  it('lists tools for the current availability', async () => {
    const response = await handleRpcRequest(
      { id: 3, method: 'tools/list' },
      makeContext({ status: 'unavailable', error: 'boom' })
    );

    expect(response.result).toMatchObject({ tools: [{ name: 'server_info' }] });
  });

  it('rejects unsupported methods with -32601', async () => {
    const response = await handleRpcRequest({ id: 4, method: 'resources/list' }, makeContext());

    expect(response).toEqual({
      jsonrpc: '2.0',
      id: 4,
      error: { code: -32601, message: 'Method not found: resources/list' }
    });
  });

  it('turns unknown tools into -32603 error envelopes', async () => {
    const response = await handleRpcRequest(
      { id: 5, method: 'tools/call', params: { name: 'gemini_translate', arguments: {} } },
      makeContext()
    );

    expect(response).toEqual({
      jsonrpc: '2.0',
      id: 5,
      error: { code: -32603, message: 'Unknown tool: gemini_translate' }
    });
  });

  it('requires a string tool name', async () => {
    const response = await handleRpcRequest({ id: 6, method: 'tools/call', params: {} }, makeContext());

    expect(response.error).toEqual({ code: -32603, message: 'tools/call requires params.name as string.' });
  });

  it('reports invalid tool arguments with -32603', async () => {
    const response = await handleRpcRequest(
      { id: 7, method: 'tools/call', params: { name: 'gemini_brainstorm', arguments: {} } },
      makeContext()
    );

    expect(response.error).toEqual({
      code: -32603,
      message: 'Invalid arguments for gemini_brainstorm: topic: Required'
    });
  });

  it('reports an unknown model as a successful result, unlike an unknown tool', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);

    const response = await handleRpcRequest(
      { id: 8, method: 'tools/call', params: { name: 'ask_gemini', arguments: { prompt: 'hi', model: 'gpt-4' } } },
      makeContext()
    );

    expect(response.error).toBeUndefined();
    expect(response.result).toMatchObject({
      content: [{ type: 'text', text: expect.stringContaining('• gemini-1.5-flash-8b - Small model for simple tasks') }]
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('surfaces upstream failures as -32603 errors', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response(JSON.stringify({ error: { message: 'Quota exceeded' } }), { status: 429 }))
    );

    const response = await handleRpcRequest(
      { id: 9, method: 'tools/call', params: { name: 'ask_gemini', arguments: { prompt: 'hi' } } },
      makeContext()
    );

    expect(response).toEqual({
      jsonrpc: '2.0',
      id: 9,
      error: { code: -32603, message: 'Error calling Gemini: Gemini API returned HTTP 429: Quota exceeded' }
    });
  });

  it('maps only method lookups to -32601', () => {
    expect(mapAppErrorToRpc(new AppError('method_not_found', 'Method not found: x'))).toEqual({
      code: -32601,
      message: 'Method not found: x'
    });
    expect(mapAppErrorToRpc(new AppError('tool_not_found', 'Unknown tool: x'))).toEqual({
      code: -32603,
      message: 'Unknown tool: x'
    });
  });

  it('maps errors by code alone', () => {
    const normalized = normalizeError(new Error('socket hang up'));

    expect(normalized).toBeInstanceOf(AppError);
    expect(normalized.code).toBe('internal_error');
    expect(normalized).not.toHaveProperty('statusCode');
    expect(mapAppErrorToRpc(normalized)).toEqual({ code: -32603, message: 'socket hang up' });
    expect(mapAppErrorToRpc(normalizeError('boom'))).toEqual({
      code: -32603,
      message: 'An unexpected error occurred.'
    });
  });
});

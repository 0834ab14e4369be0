// This test suite verifies request shaping and typed failure mapping for the Gemini REST adapter.

import { afterEach, describe, expect, it, vi } from 'vitest';
import { GeminiClient } from '../src/gemini/client.js';
import { AppError } from '../src/utils/errors.js';

function makeClient(overrides?: Partial<ConstructorParameters<typeof GeminiClient>[0]>): GeminiClient {
  return new GeminiClient({
    apiKey: 'test-key',
    apiBaseUrl: 'https://generativelanguage.googleapis.com',
    selectedModel: 'gemini-2.0-flash',
    timeoutMs: 1000,
    ...(overrides ?? {})
  });
}

function jsonResponse(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: {
      'content-type': 'application/json'
    }
  });
}

const BASE_REQUEST = {
  prompt: 'Explain cache stampedes.',
  temperature: 0.5,
  model: 'gemini-2.0-flash',
  maxOutputTokens: 8192
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('gemini client', () => {
  it('posts one generateContent request and joins candidate text parts', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      jsonResponse({
        candidates: [
          {
            content: { parts: [{ text: 'Hello ' }, { text: 'world' }] },
            finishReason: 'STOP'
          }
        ]
      })
    );
    vi.stubGlobal('fetch', fetchMock);

    const result = await makeClient().complete(BASE_REQUEST);

    expect(result).toEqual({ ok: true, text: 'Hello world', model: 'gemini-2.0-flash' });
    expect(fetchMock).toHaveBeenCalledTimes(1);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://generativelanguage.googleapis.com/v1beta/models/gemini-2.0-flash:generateContent');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({ 'x-goog-api-key': 'test-key' });
    expect(JSON.parse(String(init?.body))).toEqual({
      contents: [{ role: 'user', parts: [{ text: 'Explain cache stampedes.' }] }],
      generationConfig: { temperature: 0.5, maxOutputTokens: 8192 }
    });
  });

  it('keeps a path prefix on the configured base URL', () => {
    const client = makeClient({ apiBaseUrl: 'http://proxy.local/gemini/' });
    expect(client.endpointFor('gemini-1.5-flash')).toBe(
      'http://proxy.local/gemini/v1beta/models/gemini-1.5-flash:generateContent'
    );
  });

  it('rejects unknown models without calling the API', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);

    const result = await makeClient().complete({ ...BASE_REQUEST, model: 'gpt-4' });

    expect(result).toEqual({ ok: false, failure: { kind: 'unknown_model', requestedModel: 'gpt-4' } });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('accepts the selected model even when it is outside the catalogue', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => jsonResponse({ candidates: [{ content: { parts: [{ text: 'ok' }] } }] }))
    );

    const result = await makeClient({ selectedModel: 'gemini-exp-test' }).complete({
      ...BASE_REQUEST,
      model: 'gemini-exp-test'
    });

    expect(result).toEqual({ ok: true, text: 'ok', model: 'gemini-exp-test' });
  });

  it('reports the provider error message for non-2xx responses', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () =>
        jsonResponse({ error: { code: 403, message: 'API key not valid.', status: 'PERMISSION_DENIED' } }, 403)
      )
    );

    const result = await makeClient().complete(BASE_REQUEST);

    expect(result).toEqual({
      ok: false,
      failure: { kind: 'upstream_error', message: 'Gemini API returned HTTP 403: API key not valid.', status: 403 }
    });
  });

  it('falls back to the raw body when the error is not JSON', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('Bad Gateway', { status: 502 })));

    const result = await makeClient().complete(BASE_REQUEST);

    expect(result).toEqual({
      ok: false,
      failure: { kind: 'upstream_error', message: 'Gemini API returned HTTP 502: Bad Gateway', status: 502 }
    });
  });

  it('explains blocked prompts that produce no text', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ promptFeedback: { blockReason: 'SAFETY' } })));

    const result = await makeClient().complete(BASE_REQUEST);

    expect(result).toEqual({
      ok: false,
      failure: { kind: 'upstream_error', message: 'Gemini returned no text (blockReason: SAFETY).', status: 200 }
    });
  });

  it('maps network failures into upstream errors', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );

    const result = await makeClient().complete(BASE_REQUEST);

    expect(result).toEqual({
      ok: false,
      failure: { kind: 'upstream_error', message: 'Gemini API request failed: fetch failed' }
    });
  });

  it('aborts requests that exceed the configured timeout', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_input: string | URL | Request, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
          })
      )
    );

    const result = await makeClient({ timeoutMs: 5 }).complete(BASE_REQUEST);

    expect(result).toEqual({
      ok: false,
      failure: { kind: 'upstream_error', message: 'Gemini API request timed out after 5 ms.' }
    });
  });

  it('fails construction for an invalid base URL', () => {
    expect(() => makeClient({ apiBaseUrl: 'not a url' })).toThrow(AppError);
    expect(() => makeClient({ apiBaseUrl: 'ftp://example.test' })).toThrow(
      'Unsupported Gemini API base URL protocol: ftp:'
    );
  });
});

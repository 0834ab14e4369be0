// This module calls the Gemini generateContent REST endpoint and reports every outcome as a typed result.

import type { Logger } from 'pino';
import { z } from 'zod';
import type { CompletionRequest, CompletionResult, ModelClient } from '../types/domain.js';
import { AppError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { isKnownModel } from './models.js';

export interface GeminiClientOptions {
  apiKey: string;
  apiBaseUrl: string;
  selectedModel: string;
  timeoutMs: number;
  logger?: Logger;
}

const generateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional()
          })
          .optional(),
        finishReason: z.string().optional()
      })
    )
    .optional(),
  promptFeedback: z
    .object({
      blockReason: z.string().optional()
    })
    .optional()
});

const errorBodySchema = z.object({
  error: z.object({
    message: z.string()
  })
});

// This helper validates the configured base URL once so a bad value degrades the server at startup.
function normalizeBaseUrl(value: string): string {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new AppError('model_client_init_failed', `Invalid Gemini API base URL: ${value}`);
  }

  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    throw new AppError('model_client_init_failed', `Unsupported Gemini API base URL protocol: ${parsed.protocol}`);
  }

  return parsed.toString().replace(/\/+$/, '');
}

// This helper extracts the provider error message from a non-2xx body, falling back to the raw text.
function describeErrorBody(body: string): string {
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(body));
    if (parsed.success) {
      return parsed.data.error.message;
    }
  } catch {
    // Not JSON; the raw body is used below.
  }

  const trimmed = body.trim();
  return trimmed.length > 0 ? trimmed.slice(0, 500) : 'empty response body';
}

// This helper concatenates the text parts of the first candidate or explains why there is none.
function readCandidateText(payload: unknown): { text: string } | { reason: string } {
  const parsed = generateContentResponseSchema.safeParse(payload);
  if (!parsed.success) {
    return { reason: 'Gemini returned an unexpected response shape.' };
  }

  const candidate = parsed.data.candidates?.[0];
  const text = (candidate?.content?.parts ?? [])
    .map((part) => part.text ?? '')
    .join('');

  if (text.length > 0) {
    return { text };
  }

  const blockReason = parsed.data.promptFeedback?.blockReason;
  if (blockReason) {
    return { reason: `Gemini returned no text (blockReason: ${blockReason}).` };
  }

  if (candidate?.finishReason) {
    return { reason: `Gemini returned no text (finishReason: ${candidate.finishReason}).` };
  }

  return { reason: 'Gemini returned no text.' };
}

export class GeminiClient implements ModelClient {
  public readonly selectedModel: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;

  public constructor(options: GeminiClientOptions) {
    this.baseUrl = normalizeBaseUrl(options.apiBaseUrl);
    this.apiKey = options.apiKey;
    this.selectedModel = options.selectedModel;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
  }

  // This method builds the generateContent URL for one model name.
  public endpointFor(model: string): string {
    return `${this.baseUrl}/v1beta/models/${encodeURIComponent(model)}:generateContent`;
  }

  // This method performs exactly one upstream attempt and never throws.
  public async complete(request: CompletionRequest): Promise<CompletionResult> {
    if (request.model !== this.selectedModel && !isKnownModel(request.model)) {
      return { ok: false, failure: { kind: 'unknown_model', requestedModel: request.model } };
    }

    const startedAt = Date.now();
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(this.endpointFor(request.model), {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': this.apiKey
        },
        body: JSON.stringify({
          contents: [
            {
              role: 'user',
              parts: [{ text: request.prompt }]
            }
          ],
          generationConfig: {
            temperature: request.temperature,
            maxOutputTokens: request.maxOutputTokens
          }
        }),
        signal: controller.signal
      });

      if (!response.ok) {
        const body = await response.text();
        const message = `Gemini API returned HTTP ${response.status}: ${describeErrorBody(body)}`;
        this.logger?.warn(
          {
            event: 'gemini_request_rejected',
            model: request.model,
            status: response.status,
            body: sanitizeForLog(body),
            durationMs: Date.now() - startedAt
          },
          'gemini_request_rejected'
        );
        return { ok: false, failure: { kind: 'upstream_error', message, status: response.status } };
      }

      const outcome = readCandidateText((await response.json()) as unknown);
      if ('reason' in outcome) {
        this.logger?.warn(
          { event: 'gemini_response_empty', model: request.model, reason: outcome.reason },
          'gemini_response_empty'
        );
        return { ok: false, failure: { kind: 'upstream_error', message: outcome.reason, status: response.status } };
      }

      this.logger?.debug(
        {
          event: 'gemini_request_completed',
          model: request.model,
          textLength: outcome.text.length,
          durationMs: Date.now() - startedAt
        },
        'gemini_request_completed'
      );
      return { ok: true, text: outcome.text, model: request.model };
    } catch (error) {
      this.logger?.warn(
        {
          event: 'gemini_request_failed',
          model: request.model,
          error: errorForLog(error),
          durationMs: Date.now() - startedAt
        },
        'gemini_request_failed'
      );

      if (controller.signal.aborted) {
        return {
          ok: false,
          failure: { kind: 'upstream_error', message: `Gemini API request timed out after ${this.timeoutMs} ms.` }
        };
      }

      const detail = error instanceof Error ? error.message : String(error);
      return { ok: false, failure: { kind: 'upstream_error', message: `Gemini API request failed: ${detail}` } };
    } finally {
      clearTimeout(timeout);
    }
  }
}

// This module turns process environment variables into the immutable server configuration.

import { homedir } from 'node:os';
import { join } from 'node:path';
import type { Logger } from 'pino';
import { z } from 'zod';
import { DEFAULT_MODEL, isKnownModel } from '../gemini/models.js';
import type { ServerConfig } from '../types/domain.js';
import { AppError } from '../utils/errors.js';

export const API_KEY_PLACEHOLDER = 'YOUR_API_KEY_HERE';
export const DEFAULT_API_BASE_URL = 'https://generativelanguage.googleapis.com';
export const DEFAULT_SYSTEM_PROMPT_PATH = '~/.gemini-collab/GEMINI.md';
export const DEFAULT_REQUEST_TIMEOUT_MS = 120_000;
export const DEFAULT_MAX_OUTPUT_TOKENS = 8192;

// Blank variables behave as if they were unset.
function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());
const optionalPositiveInt = z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional());

const envSchema = z.object({
  GEMINI_API_KEY: optionalText,
  GEMINI_MODEL: optionalText,
  GEMINI_SYSTEM_PROMPT: optionalText,
  GEMINI_API_BASE_URL: optionalText,
  GEMINI_TIMEOUT_MS: optionalPositiveInt,
  GEMINI_MAX_OUTPUT_TOKENS: optionalPositiveInt
});

// This helper expands a leading "~" to the current user's home directory.
export function expandHomePath(value: string): string {
  if (value === '~') {
    return homedir();
  }

  if (value.startsWith('~/')) {
    return join(homedir(), value.slice(2));
  }

  return value;
}

// This helper falls back to the default model when the requested one is not in the catalogue.
export function resolveSelectedModel(requested: string | undefined, logger?: Logger): string {
  if (!requested || requested === DEFAULT_MODEL) {
    return DEFAULT_MODEL;
  }

  if (!isKnownModel(requested)) {
    logger?.warn(
      { event: 'config_unknown_model', requestedModel: requested, fallbackModel: DEFAULT_MODEL },
      'config_unknown_model'
    );
    return DEFAULT_MODEL;
  }

  return requested;
}

// This function validates the environment and raises startup-fatal errors for unusable settings.
export function loadServerConfig(env: Record<string, string | undefined>, logger?: Logger): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new AppError('invalid_config', `Invalid configuration: ${detail}`, parsed.error.flatten());
  }

  const values = parsed.data;
  if (!values.GEMINI_API_KEY || values.GEMINI_API_KEY === API_KEY_PLACEHOLDER) {
    throw new AppError('missing_api_key',
      'Please set your Gemini API key in the GEMINI_API_KEY environment variable'
    );
  }

  return Object.freeze({
    apiKey: values.GEMINI_API_KEY,
    model: resolveSelectedModel(values.GEMINI_MODEL, logger),
    apiBaseUrl: values.GEMINI_API_BASE_URL ?? DEFAULT_API_BASE_URL,
    systemPromptPath: expandHomePath(values.GEMINI_SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT_PATH),
    requestTimeoutMs: values.GEMINI_TIMEOUT_MS ?? DEFAULT_REQUEST_TIMEOUT_MS,
    maxOutputTokens: values.GEMINI_MAX_OUTPUT_TOKENS ?? DEFAULT_MAX_OUTPUT_TOKENS
  });
}

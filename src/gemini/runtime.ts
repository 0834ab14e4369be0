// This module computes the process-wide model availability and assembles the immutable server runtime.

import type { Logger } from 'pino';
import { loadSystemPrompt } from '../config/system-prompt.js';
import type { ModelAvailability, ModelClient, ServerConfig, ServerRuntime } from '../types/domain.js';
import { errorForLog } from '../utils/logger.js';
import { GeminiClient } from './client.js';

export type ModelClientFactory = (config: ServerConfig, logger: Logger) => ModelClient;

export const createGeminiClient: ModelClientFactory = (config, logger) =>
  new GeminiClient({
    apiKey: config.apiKey,
    apiBaseUrl: config.apiBaseUrl,
    selectedModel: config.model,
    timeoutMs: config.requestTimeoutMs,
    logger: logger.child({ component: 'gemini' })
  });

// This function initializes the model client and records the failure detail instead of aborting startup.
export function resolveModelAvailability(
  config: ServerConfig,
  logger: Logger,
  createClient: ModelClientFactory = createGeminiClient
): ModelAvailability {
  try {
    const client = createClient(config, logger);
    logger.info({ event: 'model_client_ready', model: client.selectedModel }, 'model_client_ready');
    const availability: ModelAvailability = { status: 'available', model: client.selectedModel, client };
    return Object.freeze(availability);
  } catch (error) {
    logger.error({ event: 'model_client_init_failed', error: errorForLog(error) }, 'model_client_init_failed');
    const availability: ModelAvailability = {
      status: 'unavailable',
      error: error instanceof Error ? error.message : String(error)
    };
    return Object.freeze(availability);
  }
}

export function createServerRuntime(
  config: ServerConfig,
  logger: Logger,
  createClient: ModelClientFactory = createGeminiClient
): ServerRuntime {
  return Object.freeze({
    availability: resolveModelAvailability(config, logger, createClient),
    systemPrompt: loadSystemPrompt(config.systemPromptPath, logger),
    maxOutputTokens: config.maxOutputTokens
  });
}

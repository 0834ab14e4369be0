// This module holds the fixed prompt templates and result texts used by the Gemini tools.

import { basename } from 'node:path';
import { DEFAULT_MODEL, KNOWN_MODELS } from '../gemini/models.js';
import type { ServerRuntime, SystemPrompt } from '../types/domain.js';
import { MCP_SERVER_VERSION } from '../version.js';

export const RESPONSE_MARKER = '🤖 GEMINI RESPONSE:';

export const CODE_REVIEW_TEMPERATURE = 0.2;
export const BRAINSTORM_TEMPERATURE = 0.7;

export function applySystemPrompt(prompt: string, systemPrompt: SystemPrompt | null, include: boolean): string {
  if (!include || !systemPrompt) {
    return prompt;
  }

  return `${systemPrompt.text}\n\n---\n\nUser Request:\n${prompt}`;
}

export function buildCodeReviewPrompt(code: string, focus: string): string {
  return [
    `Please review this code with a focus on ${focus}:`,
    '',
    '```',
    code,
    '```',
    '',
    'Provide specific, actionable feedback on:',
    '1. Potential issues or bugs',
    '2. Security concerns',
    '3. Performance optimizations',
    '4. Best practices',
    '5. Code clarity and maintainability'
  ].join('\n');
}

export function buildBrainstormPrompt(topic: string, context: string): string {
  let prompt = `Let's brainstorm about: ${topic}`;
  if (context) {
    prompt += `\n\nContext: ${context}`;
  }
  return `${prompt}\n\nProvide creative ideas, alternatives, and considerations.`;
}

// Completions from a non-default model carry a banner naming the model.
export function formatCompletionText(text: string, model: string): string {
  return model === DEFAULT_MODEL ? text : `✨ Using ${model}\n\n${text}`;
}

export function formatUnknownModelText(requestedModel: string): string {
  const options = KNOWN_MODELS.map((model) => `• ${model.name} - ${model.description}`).join('\n');
  return `❌ Unknown model '${requestedModel}'\n\nTry one of these:\n${options}`;
}

export function formatUnavailableText(error: string): string {
  return `Gemini not available: ${error}`;
}

export function buildStatusText(runtime: ServerRuntime): string {
  const { availability, systemPrompt } = runtime;
  if (availability.status === 'unavailable') {
    return `Server v${MCP_SERVER_VERSION} - Gemini error: ${availability.error}`;
  }

  const lines = [`Server v${MCP_SERVER_VERSION} - Gemini connected and ready!`];
  if (availability.model !== DEFAULT_MODEL) {
    lines.push(`✨ Using model: ${availability.model}`);
  }
  if (systemPrompt) {
    lines.push(`📝 System prompt loaded from ${basename(systemPrompt.sourcePath)}`);
  }
  return lines.join('\n');
}

export function wrapToolResponse(text: string): string {
  return `${RESPONSE_MARKER}\n\n${text}`;
}

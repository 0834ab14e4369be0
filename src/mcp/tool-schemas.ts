// This module defines the Gemini tool contracts and exports the discovery list for the current availability.

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { knownModelNames } from '../gemini/models.js';
import type { ModelAvailability } from '../types/domain.js';
import type { McpTool } from '../types/mcp.js';

export const TOOL_NAMES = ['ask_gemini', 'gemini_code_review', 'gemini_brainstorm', 'server_info'] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export const FUNCTIONAL_TOOLS: readonly ToolName[] = ['ask_gemini', 'gemini_code_review', 'gemini_brainstorm'];
export const DEGRADED_TOOLS: readonly ToolName[] = ['server_info'];

export function isToolName(value: string): value is ToolName {
  return TOOL_NAMES.some((name) => name === value);
}

// Empty strings and null ask for the default just like an omitted value.
function absentToUndefined(value: unknown): unknown {
  if (value === null) {
    return undefined;
  }
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

// The ask schema depends on the selected model because it publishes it as the default.
export function createAskGeminiSchema(selectedModel: string) {
  return z.object({
    prompt: z.string().describe('The question or prompt for Gemini'),
    temperature: z.number().min(0).max(1).default(0.5).describe('Temperature for response (0.0-1.0)'),
    model: z
      .preprocess(absentToUndefined, z.string().trim().min(1).default(selectedModel))
      .describe(`Model to use. Available: ${knownModelNames().join(', ')}. Default: ${selectedModel}`),
    include_system_prompt: z
      .boolean()
      .default(true)
      .describe('Include system prompt from GEMINI.md. Default: true')
  });
}

export const codeReviewSchema = z.object({
  code: z.string().describe('The code to review'),
  focus: z.string().default('general').describe('Specific focus area (security, performance, etc.)')
});

export const brainstormSchema = z.object({
  topic: z.string().describe('The topic to brainstorm about'),
  context: z.string().default('').describe('Additional context')
});

export const serverInfoSchema = z.object({});

const TOOL_DESCRIPTIONS: Record<ToolName, string> = {
  ask_gemini: "Ask Gemini a question and get the response directly in the calling agent's context",
  gemini_code_review: 'Have Gemini review code and return feedback directly to the calling agent',
  gemini_brainstorm: 'Brainstorm solutions with Gemini, response visible to the calling agent',
  server_info: 'Get server status and error information'
};

function toInputSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  const { $schema: _draft, ...inputSchema } = zodToJsonSchema(schema, { $refStrategy: 'none' }) as Record<
    string,
    unknown
  >;
  return inputSchema;
}

// This helper resolves the zod schema that validates arguments for one tool.
export function schemaForTool(name: ToolName, selectedModel: string): z.ZodTypeAny {
  switch (name) {
    case 'ask_gemini':
      return createAskGeminiSchema(selectedModel);
    case 'gemini_code_review':
      return codeReviewSchema;
    case 'gemini_brainstorm':
      return brainstormSchema;
    case 'server_info':
      return serverInfoSchema;
  }
}

// This helper exports MCP tool metadata so discovery never mixes degraded and functional tools.
export function buildToolList(availability: ModelAvailability): McpTool[] {
  const names = availability.status === 'available' ? FUNCTIONAL_TOOLS : DEGRADED_TOOLS;
  const selectedModel = availability.status === 'available' ? availability.model : '';

  return names.map((name) => ({
    name,
    description: TOOL_DESCRIPTIONS[name],
    inputSchema: toInputSchema(schemaForTool(name, selectedModel))
  }));
}

// This module implements the MCP tool handlers with argument validation and upstream result mapping.

import type { Logger } from 'pino';
import type { z } from 'zod';
import type { ModelAvailability, ServerRuntime } from '../types/domain.js';
import type { ToolCallResult } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import {
  BRAINSTORM_TEMPERATURE,
  CODE_REVIEW_TEMPERATURE,
  applySystemPrompt,
  buildBrainstormPrompt,
  buildCodeReviewPrompt,
  buildStatusText,
  formatCompletionText,
  formatUnavailableText,
  formatUnknownModelText,
  wrapToolResponse
} from './prompts.js';
import { brainstormSchema, codeReviewSchema, createAskGeminiSchema, isToolName, type ToolName } from './tool-schemas.js';

export interface ToolRuntimeContext {
  runtime: ServerRuntime;
  logger: Logger;
}

type AvailableModel = Extract<ModelAvailability, { status: 'available' }>;

type ToolHandler = (args: unknown, context: ToolRuntimeContext) => Promise<string>;

// This helper validates tool arguments and reports every zod issue in one readable message.
export function parseToolArguments<T extends z.ZodTypeAny>(toolName: ToolName, schema: T, args: unknown): z.output<T> {
  const parsed = schema.safeParse(args);
  if (parsed.success) {
    return parsed.data;
  }

  const detail = parsed.error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(arguments)'}: ${issue.message}`)
    .join('; ');
  throw new AppError('validation_error', `Invalid arguments for ${toolName}: ${detail}`, parsed.error.flatten());
}

// This helper sends one prompt upstream and turns the typed outcome into tool text or an error.
async function runCompletion(
  model: AvailableModel,
  context: ToolRuntimeContext,
  request: { prompt: string; temperature: number; model: string }
): Promise<string> {
  const result = await model.client.complete({
    prompt: request.prompt,
    temperature: request.temperature,
    model: request.model,
    maxOutputTokens: context.runtime.maxOutputTokens
  });

  if (result.ok) {
    return formatCompletionText(result.text, result.model);
  }

  const { failure } = result;
  switch (failure.kind) {
    case 'unknown_model':
      // Reported as tool text so the agent can retry with a listed model.
      context.logger.info(
        { event: 'tool_unknown_model_requested', requestedModel: failure.requestedModel },
        'tool_unknown_model_requested'
      );
      return formatUnknownModelText(failure.requestedModel);
    case 'upstream_error':
      throw new AppError('upstream_error', `Error calling Gemini: ${failure.message}`, {
        status: failure.status
      });
  }
}

// This helper gates model-backed handlers on startup availability.
function modelTool(
  run: (model: AvailableModel, args: unknown, context: ToolRuntimeContext) => Promise<string>
): ToolHandler {
  return async (args, context) => {
    const { availability } = context.runtime;
    if (availability.status === 'unavailable') {
      return formatUnavailableText(availability.error);
    }
    return run(availability, args, context);
  };
}

const toolHandlers: { [K in ToolName]: ToolHandler } = {
  ask_gemini: modelTool(async (model, args, context) => {
    const input = parseToolArguments('ask_gemini', createAskGeminiSchema(model.model), args);
    return runCompletion(model, context, {
      prompt: applySystemPrompt(input.prompt, context.runtime.systemPrompt, input.include_system_prompt),
      temperature: input.temperature,
      model: input.model
    });
  }),

  gemini_code_review: modelTool(async (model, args, context) => {
    const input = parseToolArguments('gemini_code_review', codeReviewSchema, args);
    return runCompletion(model, context, {
      prompt: applySystemPrompt(buildCodeReviewPrompt(input.code, input.focus), context.runtime.systemPrompt, true),
      temperature: CODE_REVIEW_TEMPERATURE,
      model: model.model
    });
  }),

  gemini_brainstorm: modelTool(async (model, args, context) => {
    const input = parseToolArguments('gemini_brainstorm', brainstormSchema, args);
    return runCompletion(model, context, {
      prompt: applySystemPrompt(
        buildBrainstormPrompt(input.topic, input.context),
        context.runtime.systemPrompt,
        true
      ),
      temperature: BRAINSTORM_TEMPERATURE,
      model: model.model
    });
  }),

  // Listed only in degraded mode but always callable.
  server_info: async (_args, context) => buildStatusText(context.runtime)
};

// This function resolves and executes one tool call and wraps the text in the MCP content envelope.
export async function executeTool(toolName: string, args: unknown, context: ToolRuntimeContext): Promise<ToolCallResult> {
  const startedAt = Date.now();
  context.logger.info(
    {
      event: 'mcp_tool_execution_started',
      toolName,
      args: sanitizeForLog(args)
    },
    'mcp_tool_execution_started'
  );

  if (!isToolName(toolName)) {
    context.logger.warn({ event: 'mcp_tool_not_found', toolName }, 'mcp_tool_not_found');
    throw new AppError('tool_not_found', `Unknown tool: ${toolName}`);
  }

  try {
    const text = await toolHandlers[toolName](args, context);

    context.logger.info(
      {
        event: 'mcp_tool_execution_completed',
        toolName,
        durationMs: Date.now() - startedAt,
        textLength: text.length
      },
      'mcp_tool_execution_completed'
    );

    return {
      content: [{ type: 'text', text: wrapToolResponse(text) }]
    };
  } catch (error) {
    context.logger.error(
      {
        event: 'mcp_tool_execution_failed',
        toolName,
        durationMs: Date.now() - startedAt,
        error: errorForLog(error)
      },
      'mcp_tool_execution_failed'
    );
    throw error;
  }
}

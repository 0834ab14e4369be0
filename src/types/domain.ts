// This file defines domain models shared by configuration, the Gemini adapter, and MCP tool handlers.

export interface ServerConfig {
  apiKey: string;
  model: string;
  apiBaseUrl: string;
  systemPromptPath: string;
  requestTimeoutMs: number;
  maxOutputTokens: number;
}

export interface CompletionRequest {
  prompt: string;
  temperature: number;
  model: string;
  maxOutputTokens: number;
}

export type ModelFailure =
  | { kind: 'unknown_model'; requestedModel: string }
  | { kind: 'upstream_error'; message: string; status?: number };

export type CompletionResult = { ok: true; text: string; model: string } | { ok: false; failure: ModelFailure };

// This contract isolates the upstream model so handlers never see transport exceptions.
export interface ModelClient {
  readonly selectedModel: string;
  complete(request: CompletionRequest): Promise<CompletionResult>;
}

export type ModelAvailability =
  | { status: 'available'; model: string; client: ModelClient }
  | { status: 'unavailable'; error: string };

export interface SystemPrompt {
  text: string;
  sourcePath: string;
}

// This value is built once before the transport starts and never mutated afterwards.
export interface ServerRuntime {
  readonly availability: ModelAvailability;
  readonly systemPrompt: SystemPrompt | null;
  readonly maxOutputTokens: number;
}

// This module lists the Gemini models the tools accept by name.

export const DEFAULT_MODEL = 'gemini-2.0-flash';

export const KNOWN_MODELS: ReadonlyArray<{ name: string; description: string }> = [
  { name: 'gemini-2.5-flash', description: 'Latest, best price-performance ratio' },
  { name: 'gemini-2.0-flash', description: 'Newest multimodal with next-gen features' },
  { name: 'gemini-2.0-flash-lite', description: 'Cost-efficient with low latency' },
  { name: 'gemini-1.5-pro-latest', description: 'Powerful with long context (up to 1M tokens)' },
  { name: 'gemini-1.5-flash', description: 'Fast and versatile multimodal' },
  { name: 'gemini-1.5-flash-8b', description: 'Small model for simple tasks' },
  { name: 'gemini-1.0-pro-latest', description: 'Legacy model with 32k context' }
];

export function isKnownModel(name: string): boolean {
  return KNOWN_MODELS.some((model) => model.name === name);
}

export function knownModelNames(): string[] {
  return KNOWN_MODELS.map((model) => model.name);
}

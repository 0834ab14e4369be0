// This module loads the optional persona prompt that is prepended to user requests.

import { readFileSync } from 'node:fs';
import type { Logger } from 'pino';
import type { SystemPrompt } from '../types/domain.js';
import { errorForLog } from '../utils/logger.js';

// This function reads the prompt file once; any read failure simply means no prompt is loaded.
export function loadSystemPrompt(path: string, logger?: Logger): SystemPrompt | null {
  let text: string;
  try {
    text = readFileSync(path, 'utf8').trim();
  } catch (error) {
    logger?.debug({ event: 'system_prompt_unavailable', path, error: errorForLog(error) }, 'system_prompt_unavailable');
    return null;
  }

  if (text.length === 0) {
    return null;
  }

  logger?.info({ event: 'system_prompt_loaded', path, length: text.length }, 'system_prompt_loaded');
  return Object.freeze({ text, sourcePath: path });
}

/**
 * Request Descriptor Service
 *
 * Reads `model` and the prompt text from a request body without touching
 * the bytes that get forwarded. Anything unreadable yields empty fields.
 *
 * Prompt sources, first present wins:
 * - `prompt` (Ollama generate, OpenAI completions)
 * - `messages`, flattened to `role: content` lines
 * - `input` (embeddings / responses style)
 */

import { OLLAMA_GENERATION_PATHS } from '../constants/endpoints.js';
import { logger } from '../logging/index.js';
import { isBoolean, isRecord, isString } from '../utils/typeGuards.js';
import { stripQuery } from '../utils/url/index.js';

import type { RequestDescriptorService } from './contracts.js';
import type { RequestDescriptor } from '../types/index.js';

/** Text of one message `content`: a string, or the `text` parts of an array */
const contentToText = (content: unknown): string => {
  if (isString(content)) {
    return content;
  }
  if (!Array.isArray(content)) {
    return '';
  }
  return content
    .filter(isRecord)
    .map((part) => part['text'])
    .filter(isString)
    .join('\n');
};

export const flattenMessages = (messages: unknown[]): string =>
  messages
    .filter(isRecord)
    .map((message) => {
      const role = isString(message['role']) ? message['role'] : '';
      return `${role}: ${contentToText(message['content'])}`;
    })
    .join('\n');

const extractPrompt = (body: Record<string, unknown>): string => {
  const { prompt, messages, input } = body;
  if (isString(prompt)) {
    return prompt;
  }
  if (Array.isArray(messages)) {
    return flattenMessages(messages);
  }
  if (isString(input)) {
    return input;
  }
  return '';
};

/** Cuts at a code point boundary */
export const limitPrompt = (prompt: string, maxChars: number): string => {
  if (maxChars <= 0 || prompt.length <= maxChars) {
    return prompt;
  }
  return Array.from(prompt).slice(0, maxChars).join('');
};

const defaultStreamFlag = (upstreamPath: string): boolean =>
  OLLAMA_GENERATION_PATHS.includes(stripQuery(upstreamPath));

class RequestDescriptorServiceImpl implements RequestDescriptorService {
  extractDescriptor(body: Buffer, upstreamPath: string, maxPromptChars: number = 0): RequestDescriptor {
    const empty: RequestDescriptor = {
      model: '',
      prompt: '',
      streamRequested: defaultStreamFlag(upstreamPath),
    };

    if (body.length === 0) {
      return empty;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body.toString('utf8'));
    } catch (error: unknown) {
      logger.debug(`[DESCRIPTOR] Request body is not JSON (${error instanceof Error ? error.message : 'unknown error'}), forwarding without descriptor`);
      return empty;
    }

    if (!isRecord(parsed)) {
      logger.debug('[DESCRIPTOR] Request body is not a JSON object, forwarding without descriptor');
      return empty;
    }

    return {
      model: isString(parsed['model']) ? parsed['model'] : '',
      prompt: limitPrompt(extractPrompt(parsed), maxPromptChars),
      streamRequested: isBoolean(parsed['stream']) ? parsed['stream'] : empty.streamRequested,
    };
  }
}

export const requestDescriptorService = new RequestDescriptorServiceImpl();

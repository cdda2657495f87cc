/**
 * Format Detection Service Implementation
 *
 * SSOT for choosing how a response is parsed. Pure: the same path, headers
 * and content type always give the same selection.
 *
 * 1. API family: `x-api-format` request header, else the upstream path
 * 2. Parser: response content type, with the family deciding plain JSON
 */

import { API_FORMAT_HEADER, OLLAMA_GENERATION_PATHS, OPENAI_ENDPOINTS } from '../constants/endpoints.js';
import { logger } from '../logging/index.js';
import { stripQuery } from '../utils/url/index.js';

import type { FormatDetectionService } from './contracts.js';
import type { ApiFamily, ParserSelection } from '../types/index.js';

const PASSTHROUGH: ParserSelection = { variant: 'passthrough' };

/** `Text/Event-Stream; charset=utf-8` -> `text/event-stream` */
export const toMediaType = (contentType: string | undefined): string =>
  (contentType?.split(';')[0] ?? '').trim().toLowerCase();

const headerValue = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

class FormatDetectionServiceImpl implements FormatDetectionService {
  detectApiFamily(
    upstreamPath: string,
    headers: Record<string, string | string[] | undefined>
  ): ApiFamily | null {
    // 1. Explicit header wins
    const explicitFormat = headerValue(headers[API_FORMAT_HEADER])?.trim().toLowerCase();
    if (explicitFormat === 'ollama' || explicitFormat === 'openai') {
      logger.debug(`[FORMAT] API family from header: ${explicitFormat}`);
      return explicitFormat;
    }

    // 2. Path-based detection
    const path = stripQuery(upstreamPath);
    if (OLLAMA_GENERATION_PATHS.includes(path)) {
      logger.debug(`[FORMAT] API family from path ${path}: ollama`);
      return 'ollama';
    }

    if (path.startsWith(OPENAI_ENDPOINTS.PREFIX)) {
      logger.debug(`[FORMAT] API family from path ${path}: openai`);
      return 'openai';
    }

    logger.debug(`[FORMAT] No API family for path ${path}`);
    return null;
  }

  detectParserSelection(contentType: string | undefined, family: ApiFamily | null): ParserSelection {
    const mediaType = toMediaType(contentType);

    switch (mediaType) {
      case 'text/event-stream':
        return { variant: 'openai', framing: 'sse' };
      case 'application/x-ndjson':
        return { variant: 'ollama' };
      case 'application/json':
      case '':
        if (family === 'ollama') {
          return { variant: 'ollama' };
        }
        if (family === 'openai') {
          return { variant: 'openai', framing: 'document' };
        }
        return PASSTHROUGH;
      default:
        return PASSTHROUGH;
    }
  }
}

export const formatDetectionService = new FormatDetectionServiceImpl();

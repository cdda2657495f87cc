/**
 * Mock LLM Servers
 *
 * Runs the test backends on their usual ports so the proxy can be tried by
 * hand:
 *
 *   curl -N localhost:3000/proxy/11434/api/generate -d '{"model":"llama3","prompt":"hi"}'
 *   curl -N localhost:3000/proxy/8080/v1/chat/completions \
 *     -d '{"model":"gpt-4o-mini","stream":true,"messages":[{"role":"user","content":"hi"}]}'
 *
 * Ports: MOCK_OLLAMA_PORT (11434), MOCK_OPENAI_PORT (8080).
 */

import { createServer } from 'http';

import { logger } from '../src/logging/index.js';
import { createMockOllamaApp, createMockOpenAIApp } from '../src/test/utils/mockBackends.js';

const OLLAMA_PORT = Number(process.env['MOCK_OLLAMA_PORT'] ?? 11434);
const OPENAI_PORT = Number(process.env['MOCK_OPENAI_PORT'] ?? 8080);

const behaviour = { chunkSize: 24, delayMs: 40 };

const ollamaServer = createServer(createMockOllamaApp(behaviour));
const openaiServer = createServer(createMockOpenAIApp(behaviour));

ollamaServer.listen(OLLAMA_PORT, '127.0.0.1', () => {
  logger.info(`[Mock Ollama] Listening on http://127.0.0.1:${OLLAMA_PORT}`);
});

openaiServer.listen(OPENAI_PORT, '127.0.0.1', () => {
  logger.info(`[Mock OpenAI] Listening on http://127.0.0.1:${OPENAI_PORT}`);
});

for (const server of [ollamaServer, openaiServer]) {
  server.on('error', (error: NodeJS.ErrnoException) => {
    logger.error(`[Mock] ${error.code ?? 'ERROR'}: ${error.message}`);
    process.exit(1);
  });
}

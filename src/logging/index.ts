/**
 * Logging Module
 *
 * Centralized logging for the entire application.
 * All logging MUST go through this module.
 */

export { default as logger } from './logger.js';
export { createLogger as createConfigLogger, isLogLevel, LOG_LEVELS } from './configLogger.js';
export type { Logger, LogLevel } from './configLogger.js';
export { logRequest, logResponse } from './requestLogger.js';
export type { ProxiedRequestLog, ProxiedResponseLog } from './requestLogger.js';

// src/logger.ts
// Shared structured logger (pino)

import { pino, type Logger } from 'pino';
import { getSettings } from './config.js';

let _logger: Logger | null = null;

function rootLogger(): Logger {
  if (!_logger) {
    _logger = pino({ name: 'graphloom', level: getSettings().logLevel });
  }
  return _logger;
}

/**
 * Get the library logger, or a child bound to `component`.
 */
export function getLogger(component?: string): Logger {
  const root = rootLogger();
  return component ? root.child({ component }) : root;
}

/**
 * Replace the library logger, e.g. with an application's Fastify logger.
 */
export function setLogger(logger: Logger): void {
  _logger = logger;
}

export function resetLogger(): void {
  _logger = null;
}

export type { Logger };

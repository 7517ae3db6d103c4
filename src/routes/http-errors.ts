import type { Response } from 'express';
import { AppError } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'http' });

const STATUS_BY_CODE: Record<string, number> = {
  VALIDATION_ERROR: 400,
  AGENT_NOT_FOUND: 404,
  CREW_NOT_FOUND: 404,
  TASK_NOT_FOUND: 404,
  EMPTY_CREW: 409,
  TASK_ALREADY_TERMINAL: 409,
  INVALID_TASK_TRANSITION: 409,
};

/**
 * Send an error as JSON. Known AppErrors keep their code and message;
 * anything else is logged and reported as a generic 500.
 */
export function sendError(res: Response, error: unknown, operation: string): void {
  if (error instanceof AppError && STATUS_BY_CODE[error.code]) {
    res.status(STATUS_BY_CODE[error.code]).json({ error: error.message, code: error.code });
    return;
  }
  logger.error('request_failed', {
    operation,
    error: error instanceof Error ? error.message : String(error),
  });
  res.status(500).json({ error: `Failed to ${operation}`, code: 'INTERNAL_ERROR' });
}

export function badRequest(res: Response, message: string): void {
  res.status(400).json({ error: message, code: 'VALIDATION_ERROR' });
}

function field(body: unknown, key: string): unknown {
  if (typeof body !== 'object' || body === null || !(key in body)) return undefined;
  return Object.getOwnPropertyDescriptor(body, key)?.value;
}

export function stringField(body: unknown, key: string): string | undefined {
  const value = field(body, key);
  return typeof value === 'string' ? value : undefined;
}

export function numberField(body: unknown, key: string): number | undefined {
  const value = field(body, key);
  return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
}

export function booleanField(body: unknown, key: string): boolean | undefined {
  const value = field(body, key);
  return typeof value === 'boolean' ? value : undefined;
}

export function arrayField(body: unknown, key: string): unknown[] | undefined {
  const value = field(body, key);
  return Array.isArray(value) ? value : undefined;
}

export function hasField(body: unknown, key: string): boolean {
  return field(body, key) !== undefined;
}

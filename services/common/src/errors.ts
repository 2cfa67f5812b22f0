import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';

import { getLogger } from './logger.js';
import type { ErrorResponse } from './types.js';

export interface ServiceErrorOptions {
  statusCode?: number;
  code?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ServiceError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, { statusCode = 500, code = 'internal', details, cause }: ServiceErrorOptions = {}) {
    super(message);
    this.name = 'ServiceError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

type ErrorFactory = (message: string, details?: Record<string, unknown>) => ServiceError;

function errorFactory(statusCode: number, code: string): ErrorFactory {
  return (message: string, details?: Record<string, unknown>) => new ServiceError(message, { statusCode, code, details });
}

export const badRequestError = errorFactory(400, 'bad_request');
export const notFoundError = errorFactory(404, 'not_found');
export const serviceUnavailableError = errorFactory(503, 'service_unavailable');
export const circuitOpenError = errorFactory(503, 'circuit_open');

export const GENERIC_ERROR_MESSAGE = 'An unexpected error occurred.';

export interface SanitizedError {
  statusCode: number;
  payload: ErrorResponse;
}

function frameworkClientStatus(err: Error): number | null {
  if ('statusCode' in err && typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500) {
    return err.statusCode;
  }
  return null;
}

const GENERIC_PAYLOAD: ErrorResponse = { code: 'internal', message: GENERIC_ERROR_MESSAGE };

/**
 * Maps an error to the payload sent to callers. Server-side failures other
 * than 503 keep their detail in the log only.
 */
export function sanitizeError(err: unknown): SanitizedError {
  if (err instanceof ServiceError && err.statusCode >= 500 && err.statusCode !== 503) {
    return { statusCode: err.statusCode, payload: { ...GENERIC_PAYLOAD } };
  }

  if (err instanceof ServiceError) {
    return {
      statusCode: err.statusCode,
      payload: {
        code: err.code,
        message: err.message,
        details: err.details
      }
    };
  }

  const clientStatus = err instanceof Error ? frameworkClientStatus(err) : null;
  if (clientStatus !== null && err instanceof Error) {
    return {
      statusCode: clientStatus,
      payload: {
        code: 'bad_request',
        message: err.message
      }
    };
  }

  return { statusCode: 500, payload: { ...GENERIC_PAYLOAD } };
}

export const errorHandlerPlugin: FastifyPluginAsync = fp(async (fastify) => {
  const logger = getLogger({ module: 'error-handler' });

  fastify.setErrorHandler(async (err: unknown, request: FastifyRequest, reply: FastifyReply) => {
    const sanitized = sanitizeError(err);
    const requestId = request.requestContext?.requestId;

    if (sanitized.statusCode >= 500) {
      logger.error({ err, requestId, path: request.url }, 'Request failed with server error.');
    } else {
      logger.warn({ err, requestId, path: request.url }, 'Request failed with client error.');
    }

    if (!reply.sent) {
      return reply.status(sanitized.statusCode).send(sanitized.payload);
    }

    return reply;
  });
});

export interface CircuitBreakerOptions {
  failureThreshold: number;
  successThreshold: number;
  timeoutMs: number;
}

export type CircuitBreakerState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export class CircuitBreaker {
  private state: CircuitBreakerState = 'CLOSED';
  private failureCount = 0;
  private successCount = 0;
  private nextAttempt = Date.now();

  constructor(private readonly options: CircuitBreakerOptions) {}

  public async exec<T>(action: () => Promise<T>): Promise<T> {
    if (this.state === 'OPEN') {
      if (Date.now() >= this.nextAttempt) {
        this.state = 'HALF_OPEN';
      } else {
        throw circuitOpenError('Circuit breaker is open.', { retryAt: new Date(this.nextAttempt).toISOString() });
      }
    }

    try {
      const result = await action();
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    }
  }

  public getState(): CircuitBreakerState {
    if (this.state === 'OPEN' && Date.now() >= this.nextAttempt) {
      return 'HALF_OPEN';
    }
    return this.state;
  }

  public getFailureCount(): number {
    return this.failureCount;
  }

  private onSuccess(): void {
    if (this.state === 'HALF_OPEN') {
      this.successCount += 1;
      if (this.successCount >= this.options.successThreshold) {
        this.reset();
      }
    } else {
      this.reset();
    }
  }

  private onFailure(): void {
    this.failureCount += 1;

    if (this.state === 'HALF_OPEN' || this.failureCount >= this.options.failureThreshold) {
      this.trip();
    }
  }

  private reset(): void {
    this.failureCount = 0;
    this.successCount = 0;
    this.state = 'CLOSED';
  }

  private trip(): void {
    this.state = 'OPEN';
    this.successCount = 0;
    this.nextAttempt = Date.now() + this.options.timeoutMs;
  }
}

export function isCircuitOpenError(error: unknown): boolean {
  return error instanceof ServiceError && error.code === 'circuit_open';
}

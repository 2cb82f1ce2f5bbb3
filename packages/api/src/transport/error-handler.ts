// packages/api/src/transport/error-handler.ts
//
// Centralized error handling for Fastify.
// Maps pipeline errors to structured responses and logs them without leaking internals.
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';

import {
  ArtifactNotFoundError,
  JobNotFoundError,
  ValidationError,
} from '@spatial-audio/contracts';

import { logger } from '../infrastructure/logger.js';

export interface ErrorResponse {
  error: string;
  message: string;
  code?: string;
  timestamp: string;
  requestId: string;
}

export enum ErrorType {
  VALIDATION_ERROR = 'validation_error',
  NOT_FOUND = 'not_found',
  PAYLOAD_TOO_LARGE = 'payload_too_large',
  CLIENT_ERROR = 'client_error',
  SERVER_ERROR = 'server_error',
}

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error) {
    return typeof error.statusCode === 'number' ? error.statusCode : undefined;
  }
  return undefined;
}

function stringField(error: unknown, field: 'code' | 'message' | 'name'): string | undefined {
  if (typeof error === 'object' && error !== null && field in error) {
    const value: unknown = Reflect.get(error, field);
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}

export function classifyError(error: unknown): ErrorType {
  if (error instanceof ValidationError || error instanceof ZodError) {
    return ErrorType.VALIDATION_ERROR;
  }
  if (error instanceof JobNotFoundError || error instanceof ArtifactNotFoundError) {
    return ErrorType.NOT_FOUND;
  }
  const statusCode = statusCodeOf(error);
  if (statusCode === 413) {
    return ErrorType.PAYLOAD_TOO_LARGE;
  }
  if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
    return ErrorType.CLIENT_ERROR;
  }
  return ErrorType.SERVER_ERROR;
}

export function getHttpStatus(errorType: ErrorType, originalError?: unknown): number {
  switch (errorType) {
    case ErrorType.VALIDATION_ERROR: {
      return 400;
    }
    case ErrorType.NOT_FOUND: {
      return 404;
    }
    case ErrorType.PAYLOAD_TOO_LARGE: {
      return 413;
    }
    case ErrorType.CLIENT_ERROR: {
      return statusCodeOf(originalError) ?? 400;
    }
    default: {
      return 500;
    }
  }
}

function getErrorCode(errorType: ErrorType): string {
  switch (errorType) {
    case ErrorType.VALIDATION_ERROR: {
      return 'validation_failed';
    }
    case ErrorType.NOT_FOUND: {
      return 'not_found';
    }
    case ErrorType.PAYLOAD_TOO_LARGE: {
      return 'payload_too_large';
    }
    case ErrorType.CLIENT_ERROR: {
      return 'client_error';
    }
    default: {
      return 'internal_error';
    }
  }
}

function getSafeErrorMessage(error: unknown, errorType: ErrorType): string {
  if (errorType === ErrorType.SERVER_ERROR) {
    return 'An internal server error occurred';
  }
  if (error instanceof ZodError && error.issues.length > 0) {
    const issue = error.issues[0];
    if (issue) {
      return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
    }
  }
  const message = stringField(error, 'message');
  if (message && message.length < 200) {
    return message;
  }
  return errorType === ErrorType.VALIDATION_ERROR ? 'Validation failed' : 'An error occurred';
}

export function createErrorResponse(
  error: unknown,
  request: FastifyRequest,
  errorType: ErrorType,
): ErrorResponse {
  const response: ErrorResponse = {
    error: getErrorCode(errorType),
    message: getSafeErrorMessage(error, errorType),
    timestamp: new Date().toISOString(),
    requestId: request.id,
  };

  if (error instanceof ZodError) {
    response.code = error.issues[0]?.code ?? 'validation_failed';
  } else if (errorType !== ErrorType.SERVER_ERROR) {
    const code = stringField(error, 'code') ?? stringField(error, 'name');
    if (code) {
      response.code = code;
    }
  }

  return response;
}

function logError(error: unknown, request: FastifyRequest, errorType: ErrorType): void {
  const context = {
    event: 'http_error',
    errorType,
    method: request.method,
    url: request.url,
    requestId: request.id,
    error:
      error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack }
        : String(error),
  };

  if (errorType === ErrorType.SERVER_ERROR) {
    logger.error('HTTP request failed with server error', context);
  } else {
    logger.warn('HTTP request failed with client error', context);
  }
}

export function errorHandler(error: unknown, request: FastifyRequest, reply: FastifyReply): void {
  const errorType = classifyError(error);
  logError(error, request, errorType);
  reply.code(getHttpStatus(errorType, error)).send(createErrorResponse(error, request, errorType));
}

export function generateRequestId(): string {
  return `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler(errorHandler);
}

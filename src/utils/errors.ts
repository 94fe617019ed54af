// Standardized error handling utilities

import type { FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';

export enum ErrorCode {
  NOT_FOUND = 'not_found',
  CONFLICT = 'conflict',
  VALIDATION_ERROR = 'validation_error',
  STORAGE_ERROR = 'storage_error',
  INTERNAL_ERROR = 'internal_error',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  static notFound(message: string = 'Resource not found', details?: unknown): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404, details);
  }

  static conflict(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.CONFLICT, message, 409, details);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 422, details);
  }

  static storage(message: string = 'Database unavailable', cause?: unknown): AppError {
    const error = new AppError(ErrorCode.STORAGE_ERROR, message, 500);
    error.cause = cause;
    return error;
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
}

export function formatErrorResponse(error: AppError, includeDetails: boolean = true): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };

  if (includeDetails && error.details) {
    response.details = error.details;
  }

  return response;
}

export function fromZodError(error: ZodError, message: string = 'Invalid request body'): AppError {
  const details = error.issues.map(issue => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
  return AppError.validationError(message, details);
}

// Maps anything a handler throws onto a JSON error reply
export function sendError(request: FastifyRequest, reply: FastifyReply, err: unknown) {
  const error = err instanceof AppError ? err : AppError.internal();

  if (error.statusCode >= 500) {
    request.log.error({ err: error.cause ?? err, code: error.code }, error.message);
  }

  return reply.code(error.statusCode).send(formatErrorResponse(error));
}

export async function guardRoute<T>(
  request: FastifyRequest,
  reply: FastifyReply,
  run: () => T | Promise<T>,
): Promise<T | FastifyReply> {
  try {
    return await run();
  } catch (err) {
    return sendError(request, reply, err);
  }
}

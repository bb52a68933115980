/**
 * ApiResponse
 *
 * Response helpers for the chat API.
 *
 * Usage:
 *   import { ApiResponse } from '../utils/ApiResponse';
 *
 *   ApiResponse.success(res, data);
 *   ApiResponse.notFound(res, 'Session');
 *
 * Standard Response Format:
 *   Success: { success: true, data: T, message?: string }
 *   Error:   { success: false, error: string, code?: string, details?: unknown }
 *
 * The pipeline endpoints (webhook, research, code job) answer with their own
 * plain bodies and do not use these helpers.
 */

import { Response } from 'express';

export interface SuccessResponse<T> {
  success: true;
  data: T;
  message?: string;
}

export interface ErrorResponse {
  success: false;
  error: string;
  code?: string;
  details?: unknown;
  timestamp?: string;
}

export const HttpStatus = {
  OK: 200,
  CREATED: 201,
  ACCEPTED: 202,
  NO_CONTENT: 204,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_SERVER_ERROR: 500,
} as const;

export const ErrorCodes = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_INPUT: 'INVALID_INPUT',
  NOT_FOUND: 'NOT_FOUND',
  RATE_LIMITED: 'RATE_LIMITED',
  EXTERNAL_SERVICE_ERROR: 'EXTERNAL_SERVICE_ERROR',
  CONFIG_ERROR: 'CONFIG_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class ApiResponse {
  static success<T>(res: Response, data: T, message?: string, status: number = HttpStatus.OK): Response {
    const response: SuccessResponse<T> = {
      success: true,
      data,
    };

    if (message) {
      response.message = message;
    }

    return res.status(status).json(response);
  }

  static created<T>(res: Response, data: T, message?: string): Response {
    return this.success(res, data, message, HttpStatus.CREATED);
  }

  static noContent(res: Response): Response {
    return res.status(HttpStatus.NO_CONTENT).send();
  }

  /**
   * Send an error response
   *
   * @param code - Error code for categorization
   * @param details - Additional error details
   */
  static error(
    res: Response,
    error: string | Error,
    status: number = HttpStatus.INTERNAL_SERVER_ERROR,
    code?: ErrorCode,
    details?: unknown
  ): Response {
    const message = error instanceof Error ? error.message : error;

    const response: ErrorResponse = {
      success: false,
      error: message,
      timestamp: new Date().toISOString(),
    };

    if (code) {
      response.code = code;
    }

    if (details !== undefined) {
      response.details = details;
    }

    return res.status(status).json(response);
  }

  static badRequest(res: Response, message: string = 'Bad request', details?: unknown): Response {
    return this.error(res, message, HttpStatus.BAD_REQUEST, ErrorCodes.INVALID_INPUT, details);
  }

  static notFound(res: Response, resource: string = 'Resource'): Response {
    return this.error(res, `${resource} not found`, HttpStatus.NOT_FOUND, ErrorCodes.NOT_FOUND);
  }
}

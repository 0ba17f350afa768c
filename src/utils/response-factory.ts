import { ApiSuccessResponse, ApiErrorResponse, PaginatedResponse, PaginatedResult } from '../types/api.types';

/**
 * Create a standardized success response
 */
export function createSuccessResponse<T>(data: T, message?: string): ApiSuccessResponse<T> {
  return message ? { data, message } : { data };
}

/**
 * Page of rows with the limit and offset the caller asked for
 */
export function createPaginatedResponse<T>(
  page: PaginatedResult<T>,
  window: { limit: number; offset: number }
): PaginatedResponse<T> {
  return {
    data: page.rows,
    pagination: { limit: window.limit, offset: window.offset, total: page.total },
  };
}

/**
 * Create a standardized error response
 */
export function createErrorResponse(
  code: string,
  message: string,
  details?: Record<string, unknown>
): ApiErrorResponse {
  return {
    error: {
      code,
      message,
      ...(details && { details }),
    },
  };
}

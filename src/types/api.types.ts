/**
 * API request and response types
 */

// Success response wrapper
export interface ApiSuccessResponse<T> {
  data: T;
  message?: string;
}

// Error response wrapper
export interface ApiErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

// Health check response
export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
}

export interface Pagination {
  limit: number;
  offset: number;
  total: number;
}

// Page of rows plus the total of rows matching the filter
export interface PaginatedResult<T> {
  rows: T[];
  total: number;
}

// Paginated response
export interface PaginatedResponse<T> {
  data: T[];
  pagination: Pagination;
}

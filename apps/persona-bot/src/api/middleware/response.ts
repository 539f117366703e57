/**
 * API Response Middleware
 *
 * Standardized response formatting for all API endpoints.
 */

import { ApiResponse } from './error-handler';

export const API_VERSION = '1.0.0';

/**
 * Create a standardized success response
 */
export function apiResponse<T>(data: T): ApiResponse<T> {
  return {
    success: true,
    data,
    error: null,
    timestamp: new Date().toISOString(),
  };
}

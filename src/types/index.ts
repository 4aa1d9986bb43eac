// Re-export all types from a single entry point
export * from './user.types';
export * from './patient.types';
export * from './appointment.types';

import { Request } from 'express';
import { TokenClaims } from './user.types';

/**
 * Standard API response wrapper
 * All our endpoints return this shape for consistency
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  message?: string;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
}

/**
 * Pagination block attached to every list response
 */
export interface Pagination {
  page: number;
  per_page: number;
  total: number;
  pages: number;
  has_next: boolean;
  has_prev: boolean;
}

export interface Page<T> {
  items: T[];
  pagination: Pagination;
}

/**
 * Express Request with authenticated user
 * After auth middleware runs, request will have this shape
 */
export interface AuthenticatedRequest extends Request {
  user?: TokenClaims;
  requestId?: string;
}

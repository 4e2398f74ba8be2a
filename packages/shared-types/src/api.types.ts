// =====================================================
// API Types - Request/Response Contracts
// =====================================================

// Standard API response envelope
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
  meta?: ResponseMeta;
}

export interface ApiError {
  code: string;
  message: string;
  details?: unknown;
}

export interface ResponseMeta {
  timestamp: string;
  requestId: string;
  degraded?: string[];
}

// Error codes
export const ERROR_CODES = {
  // Player errors
  PLAYER_NOT_FOUND: 'PLAYER_001',

  // Store errors
  STORE_UNAVAILABLE: 'STORE_001',
  STORE_DEGRADED: 'STORE_002',

  // Request errors
  REQUEST_CANCELLED: 'REQUEST_001',

  // Generic errors
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_001',
  INTERNAL_ERROR: 'INTERNAL_001',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

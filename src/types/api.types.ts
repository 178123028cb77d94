export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'VALIDATION_ERROR'
  | 'INTERNAL_SERVER_ERROR';

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  path?: string;
  details?: { path: string; message: string }[];
}

export interface MessageResponse {
  message: string;
}

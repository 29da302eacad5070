import type { Response } from 'express';
import type { ApiFailure, ApiSuccess, ErrorCode } from '@bmad-dashboard/shared';

export const ERROR_STATUS: Record<ErrorCode, number> = {
  INVALID_REQUEST: 400,
  INVALID_ACTION: 400,
  INVALID_INPUT: 400,
  NOT_A_BMAD_PROJECT: 400,
  ALREADY_EXISTS: 400,
  UNAUTHORIZED: 401,
  PERMISSION_DENIED: 403,
  PROJECT_NOT_FOUND: 404,
  FILE_NOT_FOUND: 404,
  NOT_FOUND: 404,
  NO_ACTIVE_PROJECT: 404,
  PARSE_ERROR: 500,
  CREATE_FAILED: 500,
  SAVE_ERROR: 500,
  LAUNCH_FAILED: 500,
  SEND_FAILED: 500,
  INTERNAL_ERROR: 500,
};

export function ok<T>(res: Response, data: T, status = 200): void {
  const body: ApiSuccess<T> = { success: true, data };
  res.status(status).json(body);
}

export function fail(res: Response, error: ErrorCode, message: string): void {
  const body: ApiFailure = { success: false, error, message };
  res.status(ERROR_STATUS[error]).json(body);
}

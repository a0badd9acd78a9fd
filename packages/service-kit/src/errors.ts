// SPDX-License-Identifier: Apache-2.0
/**
 * Shared error response helpers.
 *
 * Every endpoint reports failures in the same envelope:
 *   { error: string }
 *
 * Services return a ServiceResult instead of throwing; the route maps a
 * failed result onto the envelope with the carried status.
 */

export interface ApiError {
  error: string;
}

export type ServiceResult<T> =
  | { ok: true; data: T }
  | { ok: false; status: 400 | 404 | 413 | 500 | 502 | 503; code: string; message: string };

export function apiError(message: string): ApiError {
  return { error: message };
}

// UI HTTP error helpers.
// Purpose: centralize the canonical API error payload shape for viewer routes.
// Assumes API failures respond with { ok: false, error: { code, message, details? } }.
// Usage: buildApiErrorPayload({ code, message }) and resolveApiError(err).

import { TaskBusyError, UserFacingError } from "../../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ApiErrorCode =
  | "not_found"
  | "bad_request"
  | "method_not_allowed"
  | "conflict"
  | "internal_error";

export type ApiErrorDetails = Record<string, string>;

export type ApiErrorPayload = {
  ok: false;
  error: {
    code: ApiErrorCode;
    message: string;
    details?: ApiErrorDetails;
  };
};

export type ResolvedApiError = {
  status: number;
  payload: ApiErrorPayload;
};

// =============================================================================
// ERROR BUILDERS
// =============================================================================

export function buildApiErrorPayload(params: {
  code: ApiErrorCode;
  message: string;
  details?: ApiErrorDetails;
}): ApiErrorPayload {
  const error = {
    code: params.code,
    message: params.message,
    ...(params.details ? { details: params.details } : {}),
  };

  return { ok: false, error };
}

/** Maps errors thrown by session calls onto HTTP status + payload. */
export function resolveApiError(err: unknown): ResolvedApiError {
  if (err instanceof TaskBusyError) {
    return {
      status: 409,
      payload: buildApiErrorPayload({
        code: "conflict",
        message: err.message,
        details: { task_id: err.activeTaskId },
      }),
    };
  }

  if (err instanceof UserFacingError) {
    const details = err.hint ? { hint: err.hint } : undefined;
    return {
      status: 400,
      payload: buildApiErrorPayload({ code: "bad_request", message: err.message, details }),
    };
  }

  return {
    status: 500,
    payload: buildApiErrorPayload({
      code: "internal_error",
      message: "Unexpected server error.",
      details: buildInternalErrorDetails(err),
    }),
  };
}

function buildInternalErrorDetails(cause: unknown): ApiErrorDetails {
  const details: ApiErrorDetails = { reason: "unexpected_error" };

  if (!cause || typeof cause !== "object" || !("code" in cause)) {
    return details;
  }

  const errorCode = cause.code;
  if (typeof errorCode === "string" && errorCode.trim()) {
    details.error_code = errorCode;
  }

  return details;
}

/**
 * Mapping from thrown errors to HTTP responses.
 */

import { InvalidAnchorError, UnknownTermError } from "../anchors/index.js";

export type ErrorCode = "unknown_term" | "invalid_anchors" | "invalid_request" | "not_found" | "internal";

export interface ErrorBody {
  error: {
    code: ErrorCode;
    message: string;
    term?: string;
  };
}

export interface ErrorResponse {
  status: number;
  body: ErrorBody;
}

function hasStatusCode(err: Error): err is Error & { statusCode: number } {
  return "statusCode" in err && typeof err.statusCode === "number";
}

/**
 * Status and body for an error raised while handling a request.
 * Anchor errors are the client's; malformed request bodies rejected by the
 * framework keep their 4xx status; everything else is a 500.
 */
export function toErrorResponse(err: unknown): ErrorResponse {
  if (err instanceof UnknownTermError) {
    return { status: 400, body: { error: { code: "unknown_term", message: err.message, term: err.term } } };
  }
  if (err instanceof InvalidAnchorError) {
    return { status: 400, body: { error: { code: "invalid_anchors", message: err.message } } };
  }
  if (err instanceof Error && hasStatusCode(err) && err.statusCode >= 400 && err.statusCode < 500) {
    return { status: err.statusCode, body: { error: { code: "invalid_request", message: err.message } } };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { status: 500, body: { error: { code: "internal", message } } };
}

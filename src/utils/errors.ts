/** User text that does not fit the current stage; the session is left as it was. */
export class InputValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputValidationError";
  }
}

/** The current sub-item already holds the maximum number of photos. */
export class CapacityError extends Error {
  constructor(readonly subItem: string, readonly limit: number) {
    super(`${subItem} already has ${limit} photos`);
    this.name = "CapacityError";
  }
}

export type BackendErrorKind = "transient" | "permission";

/** A single folder or transfer call failed; the batch keeps going. */
export class TransientBackendError extends Error {
  constructor(
    message: string,
    readonly kind: BackendErrorKind = "transient",
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TransientBackendError";
  }
}

/** The storage client cannot be used at all (credentials missing, unparsable or rejected). */
export class FatalAuthError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FatalAuthError";
  }
}

export interface ErrorDetails {
  status?: number;
  statusText?: string;
  message: string;
  reason?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === "string" ? value : undefined;
}

function readNumber(source: Record<string, unknown>, key: string): number | undefined {
  const value = source[key];
  if (typeof value === "number") return value;
  if (typeof value === "string" && /^\d+$/.test(value)) return Number(value);
  return undefined;
}

/**
 * Extracts status and message from axios and googleapis (gaxios) errors,
 * which both carry a `response` with `status`, `statusText` and `data`.
 */
export function extractErrorDetails(error: unknown): ErrorDetails {
  if (!isRecord(error)) {
    return { message: String(error) };
  }

  const details: ErrorDetails = {
    message: readString(error, "message") ?? "Unknown error",
  };

  const response = error.response;
  if (isRecord(response)) {
    details.status = readNumber(response, "status");
    details.statusText = readString(response, "statusText");

    const data = response.data;
    if (isRecord(data) && isRecord(data.error)) {
      // Google and Graph API both wrap the failure in `error`
      const apiError = data.error;
      details.message = readString(apiError, "message") ?? details.message;
      const errors = apiError.errors;
      if (Array.isArray(errors) && isRecord(errors[0])) {
        details.reason = readString(errors[0], "reason");
      }
      if (!details.reason) details.reason = readString(apiError, "type");
    } else if (isRecord(data)) {
      // OAuth token endpoint: { error: "invalid_grant", error_description: "..." }
      details.reason = readString(data, "error");
      details.message = readString(data, "error_description") ?? details.message;
    }
  }

  if (details.status === undefined) {
    details.status = readNumber(error, "status") ?? readNumber(error, "code");
  }

  return details;
}

/** One-line diagnostic suitable for an UploadOutcome or a log message. */
export function describeError(error: unknown): string {
  if (error instanceof TransientBackendError || error instanceof FatalAuthError) return error.message;
  const details = extractErrorDetails(error);
  return details.status !== undefined ? `${details.status} ${details.message}` : details.message;
}

/**
 * Maps a Drive call failure onto the error taxonomy: rejected credentials are
 * fatal, 403/404 mean the service account cannot see the target, everything
 * else is transient.
 */
export function classifyDriveError(error: unknown, operation: string): TransientBackendError | FatalAuthError {
  if (error instanceof TransientBackendError || error instanceof FatalAuthError) return error;

  const details = extractErrorDetails(error);
  const summary = `${operation} failed: ${describeError(error)}`;

  if (details.status === 401 || details.reason === "invalid_grant" || details.reason === "unauthorized_client") {
    return new FatalAuthError(summary, { cause: error });
  }
  if (details.status === 403 || details.status === 404) {
    return new TransientBackendError(summary, "permission", details.status, { cause: error });
  }
  return new TransientBackendError(summary, "transient", details.status, { cause: error });
}

/**
 * Error taxonomy shared by the server routes and the browser screens.
 *
 * Every failure a caller can see is one of four kinds: the session is not
 * (or no longer) valid, a service could not be reached, a call ran past its
 * timeout, or a service answered with an error of its own. Errors cross the
 * server/browser boundary as an `ErrorPayload` and are rebuilt on the other
 * side with `fromErrorPayload`.
 */

export type ClientErrorKind = "auth" | "network" | "timeout" | "api";

export abstract class ClientError extends Error {
  abstract readonly kind: ClientErrorKind;
}

export class AuthError extends ClientError {
  readonly kind = "auth" as const;

  constructor(message = "Authentication required.") {
    super(message);
    this.name = "AuthError";
  }
}

export class NetworkError extends ClientError {
  readonly kind = "network" as const;

  constructor(message: string) {
    super(message);
    this.name = "NetworkError";
  }
}

export class TimeoutError extends ClientError {
  readonly kind = "timeout" as const;

  constructor(
    readonly timeoutMs: number,
    message = `The request did not complete within ${formatSeconds(timeoutMs)}.`
  ) {
    super(message);
    this.name = "TimeoutError";
  }
}

export class ApiError extends ClientError {
  readonly kind = "api" as const;

  constructor(
    message: string,
    readonly status: number,
    readonly code?: string
  ) {
    super(message);
    this.name = "ApiError";
  }

  override toString(): string {
    const prefix = `[${this.status}] `;
    return this.code ? `${prefix}${this.code}: ${this.message}` : `${prefix}${this.message}`;
  }
}

export interface ErrorPayload {
  kind: ClientErrorKind;
  message: string;
  status?: number;
  code?: string;
  timeoutMs?: number;
}

export function isAuthError(error: unknown): error is AuthError {
  return error instanceof AuthError;
}

/**
 * Failures worth another attempt: the service may answer next time.
 */
export function isTransientError(error: unknown): boolean {
  return error instanceof NetworkError || error instanceof TimeoutError;
}

export function toErrorPayload(error: ClientError): ErrorPayload {
  if (error instanceof TimeoutError) {
    return { kind: "timeout", message: error.message, timeoutMs: error.timeoutMs };
  }
  if (error instanceof ApiError) {
    return { kind: "api", message: error.message, status: error.status, code: error.code };
  }
  return { kind: error.kind, message: error.message };
}

export function fromErrorPayload(payload: ErrorPayload): ClientError {
  switch (payload.kind) {
    case "auth":
      return new AuthError(payload.message);
    case "network":
      return new NetworkError(payload.message);
    case "timeout":
      return new TimeoutError(payload.timeoutMs ?? 0, payload.message);
    case "api":
      return new ApiError(payload.message, payload.status ?? 500, payload.code);
  }
}

/**
 * HTTP status the app's own routes answer with for a given error.
 */
export function httpStatusFor(error: ClientError): number {
  if (error instanceof AuthError) return 401;
  if (error instanceof NetworkError) return 502;
  if (error instanceof TimeoutError) return 504;
  if (error instanceof ApiError && error.status >= 400 && error.status < 600) return error.status;
  return 502;
}

/**
 * Recognizes `{ error: ErrorPayload }` bodies sent by the app's routes.
 */
export function readErrorPayload(body: unknown): ErrorPayload | null {
  if (!isRecord(body) || !isRecord(body.error)) return null;
  const { kind, message, status, code, timeoutMs } = body.error;
  if (kind !== "auth" && kind !== "network" && kind !== "timeout" && kind !== "api") return null;
  if (typeof message !== "string") return null;
  return {
    kind,
    message,
    status: typeof status === "number" ? status : undefined,
    code: typeof code === "string" ? code : undefined,
    timeoutMs: typeof timeoutMs === "number" ? timeoutMs : undefined,
  };
}

/**
 * Pull a human-readable message out of a backend error body. Handles the
 * FastAPI shapes (`{detail: "..."}`, `{detail: {message}}`, validation
 * arrays) and the common `{error}` / `{message}` forms.
 */
export function extractMessageFromResponseBody(body: unknown): string | null {
  if (typeof body === "string") {
    const text = body.trim();
    return text ? text.slice(0, 400) : null;
  }
  if (!isRecord(body)) return null;

  const detail = body.detail;
  if (typeof detail === "string" && detail) return detail;
  if (Array.isArray(detail)) {
    return detail
      .map((entry: unknown) => {
        if (typeof entry === "string") return entry;
        if (isRecord(entry)) {
          const text = entry.msg ?? entry.message;
          return typeof text === "string" ? text : JSON.stringify(entry);
        }
        return String(entry);
      })
      .join("; ");
  }
  if (isRecord(detail)) {
    if (typeof detail.message === "string") return detail.message;
    if (typeof detail.msg === "string") return detail.msg;
    return JSON.stringify(detail);
  }

  if (typeof body.error === "string") return body.error;
  if (typeof body.message === "string") return body.message;
  if (typeof body.msg === "string") return body.msg;
  return null;
}

export function extractCodeFromResponseBody(body: unknown): string | undefined {
  if (!isRecord(body)) return undefined;
  const code = body.code ?? (isRecord(body.detail) ? body.detail.code : undefined);
  if (typeof code === "string" || typeof code === "number") return String(code);
  return undefined;
}

function formatSeconds(ms: number): string {
  const seconds = ms / 1000;
  return `${Number.isInteger(seconds) ? seconds : seconds.toFixed(1)}s`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

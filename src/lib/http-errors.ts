import axios from "axios";
import {
  ApiError,
  AuthError,
  ClientError,
  NetworkError,
  TimeoutError,
  extractCodeFromResponseBody,
  extractMessageFromResponseBody,
  fromErrorPayload,
  readErrorPayload,
} from "./errors";
import { errorMessage } from "./utils";

export interface ErrorMappingOptions {
  /** Service name used in connection failure messages. */
  service: string;
  /** Timeout the failed request ran with. */
  timeoutMs: number;
}

/**
 * Turn whatever an axios call threw into one of the four client errors.
 * Bodies produced by the app's own routes are rebuilt as they were raised on
 * the server; anything else is read as a backend error response.
 */
export function toClientError(error: unknown, options: ErrorMappingOptions): ClientError {
  if (error instanceof ClientError) return error;

  if (axios.isCancel(error)) {
    return new NetworkError("The request was cancelled.");
  }

  if (!axios.isAxiosError(error)) {
    return new ApiError(`Unexpected error: ${errorMessage(error)}`, 500);
  }

  const response = error.response;
  if (!response) {
    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
      return new TimeoutError(options.timeoutMs);
    }
    return new NetworkError(
      `Could not reach ${options.service}. Check the URL and that the service is running.`
    );
  }

  const payload = readErrorPayload(response.data);
  if (payload) return fromErrorPayload(payload);

  const message = extractMessageFromResponseBody(response.data) ?? `HTTP ${response.status}`;
  if (response.status === 401) {
    return new AuthError(message);
  }
  return new ApiError(message, response.status, extractCodeFromResponseBody(response.data));
}

import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from "axios";
import type { z } from "zod";
import { ApiError } from "@/lib/errors";
import { toClientError } from "@/lib/http-errors";
import { logBackendError } from "@/lib/logger";

export const USER_AGENT = "gme-app/0.1.0";

export interface ServiceHttpOptions {
  /** Name used in error messages and logs. */
  service: string;
  baseUrl: string;
  timeoutMs: number;
  sessionCookieName: string;
  /** Session token sent as a cookie, when signed in. */
  token?: string | null;
  headers?: Record<string, string>;
}

/**
 * One backend service as seen from the server side: an axios instance with
 * the base URL, timeout and session cookie applied, and error mapping into
 * the client error taxonomy.
 */
export class ServiceHttp {
  readonly http: AxiosInstance;

  constructor(private readonly options: ServiceHttpOptions) {
    const headers: Record<string, string> = {
      Accept: "application/json",
      "User-Agent": USER_AGENT,
      ...options.headers,
    };
    if (options.token) {
      headers.Cookie = `${options.sessionCookieName}=${options.token}`;
    }
    this.http = axios.create({
      baseURL: `${options.baseUrl.replace(/\/+$/, "")}/`,
      timeout: options.timeoutMs,
      headers,
    });
  }

  get service(): string {
    return this.options.service;
  }

  /**
   * Perform a call and return the raw response. Fails with `AuthError`,
   * `NetworkError`, `TimeoutError` or `ApiError`.
   */
  async send(config: AxiosRequestConfig): Promise<AxiosResponse<unknown>> {
    const url = stripLeadingSlash(config.url ?? "");
    try {
      return await this.http.request<unknown>({ ...config, url });
    } catch (error: unknown) {
      const clientError = toClientError(error, {
        service: this.options.service,
        timeoutMs: config.timeout ?? this.options.timeoutMs,
      });
      logBackendError(`${config.method ?? "GET"} ${this.options.service}/${url}`, clientError, {
        kind: clientError.kind,
      });
      throw clientError;
    }
  }

  /**
   * Perform a call and decode its JSON body with `schema`.
   */
  async request<S extends z.ZodTypeAny>(config: AxiosRequestConfig, schema: S): Promise<z.output<S>> {
    const response = await this.send(config);
    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .slice(0, 3)
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      const error = new ApiError(`Unexpected response from ${this.options.service}: ${detail}`, 502);
      logBackendError(`${config.method ?? "GET"} ${this.options.service}/${stripLeadingSlash(config.url ?? "")}`, error);
      throw error;
    }
    return parsed.data;
  }
}

function stripLeadingSlash(path: string): string {
  return path.replace(/^\/+/, "");
}

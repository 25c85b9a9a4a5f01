import type { AxiosInstance, AxiosRequestConfig } from "axios";
import { api } from "@/app/api/client";
import { ApiError } from "./errors";
import { toClientError } from "./http-errors";
import type {
  ClientSession,
  ClientSettings,
  Credentials,
  Dashboard,
  Page,
  ProcessingOptions,
  Project,
  Registration,
  Run,
  StartRunOptions,
} from "./types";

/** Added to the server's timeouts so that the server reports a backend timeout first. */
export const BROWSER_TIMEOUT_MARGIN_MS = 2000;

/**
 * Backend calls a route makes one after another, each under its own server
 * timeout. Routes not listed make one.
 */
export const SEQUENTIAL_BACKEND_CALLS = {
  login: 2,
  register: 3,
  dashboard: 2,
} as const;

export const APP_SERVER = "the GME app server";

export interface SignIn extends Credentials {
  remember: boolean;
}

export interface NewProject {
  name: string;
  description: string;
  video: File | null;
  startProcessing: boolean;
}

export interface PageParams {
  limit?: number;
  offset?: number;
}

/**
 * Everything the screens can ask of the server. Controllers depend on this
 * shape only, so tests can hand them an in-memory implementation.
 */
export interface GmeService {
  getSession(signal?: AbortSignal): Promise<ClientSession | null>;
  login(input: SignIn, signal?: AbortSignal): Promise<ClientSession>;
  register(input: Registration, signal?: AbortSignal): Promise<ClientSession>;
  logout(signal?: AbortSignal): Promise<void>;
  getDashboard(signal?: AbortSignal): Promise<Dashboard>;
  listProjects(params?: PageParams & { q?: string }, signal?: AbortSignal): Promise<Page<Project>>;
  getProject(projectId: string, signal?: AbortSignal): Promise<Project>;
  createProject(input: NewProject, signal?: AbortSignal): Promise<Project>;
  deleteProject(projectId: string, signal?: AbortSignal): Promise<void>;
  listRuns(projectId: string, params?: PageParams, signal?: AbortSignal): Promise<Page<Run>>;
  startRun(projectId: string, options: StartRunOptions, signal?: AbortSignal): Promise<Run>;
  cancelRun(projectId: string, runId: string, signal?: AbortSignal): Promise<Run>;
  getProcessingOptions(signal?: AbortSignal): Promise<ProcessingOptions>;
}

interface SessionBody {
  session: ClientSession | null;
}

/**
 * Browser client of the `/api` routes. Error payloads from the routes come
 * back as the same `ClientError` subclasses the server raised.
 */
export class GmeApi implements GmeService {
  constructor(
    private readonly settings: ClientSettings,
    private readonly http: AxiosInstance = api
  ) {}

  async getSession(signal?: AbortSignal): Promise<ClientSession | null> {
    return (await this.call<SessionBody>({ method: "GET", url: "/session", signal })).session;
  }

  async login({ login, password, remember }: SignIn, signal?: AbortSignal): Promise<ClientSession> {
    const body = await this.call<SessionBody>({
      method: "POST",
      url: "/session",
      data: { login, password, remember },
      timeout: this.routeTimeout(SEQUENTIAL_BACKEND_CALLS.login),
      signal,
    });
    return requireSession(body);
  }

  async register(input: Registration, signal?: AbortSignal): Promise<ClientSession> {
    const body = await this.call<SessionBody>({
      method: "POST",
      url: "/register",
      data: input,
      timeout: this.routeTimeout(SEQUENTIAL_BACKEND_CALLS.register),
      signal,
    });
    return requireSession(body);
  }

  async logout(signal?: AbortSignal): Promise<void> {
    await this.call<SessionBody>({ method: "DELETE", url: "/session", signal });
  }

  getDashboard(signal?: AbortSignal): Promise<Dashboard> {
    return this.call<Dashboard>({
      method: "GET",
      url: "/dashboard",
      timeout: this.routeTimeout(SEQUENTIAL_BACKEND_CALLS.dashboard),
      signal,
    });
  }

  listProjects(params: PageParams & { q?: string } = {}, signal?: AbortSignal): Promise<Page<Project>> {
    return this.call<Page<Project>>({ method: "GET", url: "/projects", params, signal });
  }

  getProject(projectId: string, signal?: AbortSignal): Promise<Project> {
    return this.call<Project>({ method: "GET", url: `/projects/${encodeURIComponent(projectId)}`, signal });
  }

  /**
   * Multipart upload; with a video attached the upload timeout applies.
   */
  createProject(input: NewProject, signal?: AbortSignal): Promise<Project> {
    const form = new FormData();
    form.append("title", input.name);
    form.append("description", input.description);
    form.append("start_processing", input.startProcessing ? "true" : "false");
    if (input.video) form.append("video", input.video, input.video.name);
    const timeout = (input.video ? this.settings.uploadTimeoutMs : this.settings.requestTimeoutMs) + BROWSER_TIMEOUT_MARGIN_MS;
    return this.call<Project>({ method: "POST", url: "/projects", data: form, timeout, signal });
  }

  async deleteProject(projectId: string, signal?: AbortSignal): Promise<void> {
    await this.call<unknown>({ method: "DELETE", url: `/projects/${encodeURIComponent(projectId)}`, signal });
  }

  listRuns(projectId: string, params: PageParams = {}, signal?: AbortSignal): Promise<Page<Run>> {
    return this.call<Page<Run>>({
      method: "GET",
      url: `/projects/${encodeURIComponent(projectId)}/runs`,
      params,
      signal,
    });
  }

  startRun(projectId: string, options: StartRunOptions, signal?: AbortSignal): Promise<Run> {
    return this.call<Run>({
      method: "POST",
      url: `/projects/${encodeURIComponent(projectId)}/runs`,
      data: options,
      signal,
    });
  }

  cancelRun(projectId: string, runId: string, signal?: AbortSignal): Promise<Run> {
    return this.call<Run>({
      method: "POST",
      url: `/projects/${encodeURIComponent(projectId)}/runs/${encodeURIComponent(runId)}/cancel`,
      signal,
    });
  }

  getProcessingOptions(signal?: AbortSignal): Promise<ProcessingOptions> {
    return this.call<ProcessingOptions>({ method: "GET", url: "/processing-options", signal });
  }

  private routeTimeout(backendCalls: number): number {
    return backendCalls * this.settings.requestTimeoutMs + BROWSER_TIMEOUT_MARGIN_MS;
  }

  private async call<T>(config: AxiosRequestConfig): Promise<T> {
    const timeout = config.timeout ?? this.routeTimeout(1);
    try {
      const response = await this.http.request<T>({ ...config, timeout });
      return response.data;
    } catch (error: unknown) {
      throw toClientError(error, { service: APP_SERVER, timeoutMs: timeout });
    }
  }
}

function requireSession(body: SessionBody): ClientSession {
  if (!body.session) throw new ApiError("The server answered without a session.", 502);
  return body.session;
}

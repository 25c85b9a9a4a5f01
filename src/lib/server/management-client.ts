import { z } from "zod";
import { ApiError, AuthError } from "@/lib/errors";
import {
  loginResponseSchema,
  projectSchema,
  projectsPageSchema,
  runSchema,
  runsPageSchema,
  userProfileSchema,
} from "@/lib/schemas";
import type {
  Credentials,
  Page,
  Project,
  Registration,
  Run,
  StartRunOptions,
  UserProfile,
} from "@/lib/types";
import type { AppConfig } from "./config";
import { ServiceHttp } from "./service-http";

export const MANAGEMENT_SERVICE = "gme-management";

export interface VideoUpload {
  name: string;
  type: string;
  data: Blob;
}

export interface CreateProjectInput {
  title: string;
  description?: string | null;
  video?: VideoUpload | null;
  startProcessing?: boolean;
}

export interface ListProjectsParams {
  q?: string;
  limit?: number;
  offset?: number;
}

export interface ListRunsParams {
  limit?: number;
  offset?: number;
}

export interface LoginResult {
  token: string;
  login: string;
}

/**
 * Anything that can trade credentials for a session token.
 */
export interface Authenticator {
  login(credentials: Credentials): Promise<LoginResult>;
}

/** Some endpoints answer with the record itself, some wrap it. */
const createdProjectSchema = z.union([
  projectSchema,
  z.object({ project: projectSchema }).transform((wire) => wire.project),
]);

const runResponseSchema = z.union([
  runSchema,
  z.object({ run: runSchema }).transform((wire) => wire.run),
]);

/**
 * Client for the gme-management REST API. One instance serves one request
 * context: it carries at most one session token, sent as the configured
 * session cookie.
 */
export class ManagementClient implements Authenticator {
  private readonly service: ServiceHttp;

  constructor(
    private readonly config: AppConfig,
    token?: string | null
  ) {
    this.service = new ServiceHttp({
      service: MANAGEMENT_SERVICE,
      baseUrl: config.managementUrl,
      timeoutMs: config.requestTimeoutMs,
      sessionCookieName: config.sessionCookieName,
      token,
    });
  }

  async register(registration: Registration): Promise<void> {
    const payload: Record<string, string> = {
      login: registration.login,
      password: registration.password,
    };
    if (registration.email) payload.email = registration.email;
    await this.service.send({ method: "POST", url: "/auth/register", data: payload });
  }

  /**
   * Sign in and pick the session token out of the `Set-Cookie` header.
   */
  async login(credentials: Credentials): Promise<LoginResult> {
    const response = await this.service.send({
      method: "POST",
      url: "/auth/login",
      data: { login: credentials.login, password: credentials.password },
    });
    const body = loginResponseSchema.safeParse(response.data);
    const token = readCookie(response.headers["set-cookie"], this.config.sessionCookieName);
    if (!token) {
      throw new ApiError(
        `Sign-in succeeded but ${MANAGEMENT_SERVICE} did not set the "${this.config.sessionCookieName}" cookie.`,
        502
      );
    }
    return { token, login: body.success ? body.data.user.login : credentials.login };
  }

  /**
   * End the backend session. A session the backend already forgot is not an
   * error here.
   */
  async logout(): Promise<void> {
    try {
      await this.service.send({ method: "POST", url: "/auth/logout" });
    } catch (error: unknown) {
      if (error instanceof AuthError) return;
      if (error instanceof ApiError && error.status === 403) return;
      throw error;
    }
  }

  getMe(): Promise<UserProfile> {
    return this.service.request({ method: "GET", url: "/users/me" }, userProfileSchema);
  }

  listProjects({ q, limit = 100, offset = 0 }: ListProjectsParams = {}): Promise<Page<Project>> {
    const params: Record<string, string | number> = { limit, offset };
    if (q) params.q = q;
    return this.service.request({ method: "GET", url: "/projects", params }, projectsPageSchema);
  }

  getProject(projectId: string): Promise<Project> {
    return this.service.request(
      { method: "GET", url: `/projects/${encodeURIComponent(projectId)}` },
      projectSchema
    );
  }

  /**
   * Create a project as a multipart form. The video part is optional; when it
   * is present the upload timeout applies instead of the request timeout.
   */
  createProject(input: CreateProjectInput): Promise<Project> {
    const form = new FormData();
    form.append("title", input.title);
    form.append("description", input.description ?? "");
    form.append("start_processing", input.startProcessing && input.video ? "true" : "false");
    form.append("launch_mode", "immediate");
    if (input.video) {
      form.append("video", input.video.data, input.video.name);
    }
    return this.service.request(
      {
        method: "POST",
        url: "/projects",
        data: form,
        timeout: input.video ? this.config.uploadTimeoutMs : this.config.requestTimeoutMs,
      },
      createdProjectSchema
    );
  }

  async deleteProject(projectId: string): Promise<void> {
    await this.service.send({ method: "DELETE", url: `/projects/${encodeURIComponent(projectId)}` });
  }

  startProcessing(projectId: string, options: StartRunOptions = {}): Promise<Run> {
    const payload: Record<string, string> = { launch_mode: options.launchMode ?? "immediate" };
    if (options.model) payload.model = options.model;
    if (options.detector) payload.detector = options.detector;
    if (options.processingMode) payload.processing_mode = options.processingMode;
    if (options.audioProvider) payload.audio_provider = options.audioProvider;
    return this.service.request(
      {
        method: "POST",
        url: `/projects/${encodeURIComponent(projectId)}/processing/start`,
        data: payload,
      },
      runResponseSchema
    );
  }

  listProcessingRuns(projectId: string, { limit = 20, offset = 0 }: ListRunsParams = {}): Promise<Page<Run>> {
    return this.service.request(
      {
        method: "GET",
        url: `/projects/${encodeURIComponent(projectId)}/processing`,
        params: { limit, offset },
      },
      runsPageSchema
    );
  }

  cancelProcessing(projectId: string, runId: string): Promise<Run> {
    return this.service.request(
      {
        method: "POST",
        url: `/projects/${encodeURIComponent(projectId)}/processing/${encodeURIComponent(runId)}/cancel`,
      },
      runResponseSchema
    );
  }
}

/**
 * Find the value of cookie `name` among `Set-Cookie` header lines.
 */
export function readCookie(setCookie: unknown, name: string): string | null {
  const lines = Array.isArray(setCookie) ? setCookie : typeof setCookie === "string" ? [setCookie] : [];
  for (const line of lines) {
    if (typeof line !== "string") continue;
    const [pair = ""] = line.split(";");
    const eq = pair.indexOf("=");
    if (eq < 0) continue;
    if (pair.slice(0, eq).trim() !== name) continue;
    const value = pair.slice(eq + 1).trim();
    return value || null;
  }
  return null;
}

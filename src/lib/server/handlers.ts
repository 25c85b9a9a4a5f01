import { z } from "zod";
import { ApiError, AuthError } from "@/lib/errors";
import { logWarning } from "@/lib/logger";
import type { ClientSession, Dashboard, ProcessingOptions, Run, UserProfile } from "@/lib/types";
import { errorMessage } from "@/lib/utils";
import type { AppConfig } from "./config";
import { ManagementClient, type VideoUpload } from "./management-client";
import { type DepsLoader, type SessionContext, handle, intParam, json, readJson, withSession } from "./route-support";
import type { Session } from "./session-store";

/** Projects whose latest run the dashboard looks up. */
export const DASHBOARD_RUN_LOOKUPS = 30;

const credentialsBody = z.object({
  login: z.string().trim().min(1),
  password: z.string().min(1),
  remember: z.boolean().optional().default(false),
});

const registrationBody = z.object({
  login: z.string().trim().min(1),
  password: z.string().min(1),
  email: z
    .string()
    .trim()
    .optional()
    .transform((value) => value || undefined),
});

const startRunBody = z.object({
  launchMode: z.string().optional(),
  model: z.string().optional(),
  detector: z.string().optional(),
  processingMode: z.enum(["video_only", "audio_only", "audio_and_video"]).optional(),
  audioProvider: z.string().optional(),
});

async function clientSession(config: AppConfig, session: Session): Promise<ClientSession> {
  const user: UserProfile = await new ManagementClient(config, session.token).getMe();
  return { user, remembered: session.remembered };
}

export function getSession(loadDeps: DepsLoader): Promise<Response> {
  return handle("GET /api/session", loadDeps, async (store, { config }) => {
    const session = store.restore();
    if (!session) return json({ session: null });
    return json({ session: await clientSession(config, session) });
  });
}

export function postSession(loadDeps: DepsLoader, request: Request): Promise<Response> {
  return handle("POST /api/session", loadDeps, async (store, { config }) => {
    const { login, password, remember } = await readJson(request, credentialsBody);
    const session = await store.login({ login, password }, remember);
    return json({ session: await clientSession(config, session) });
  });
}

export function deleteSession(loadDeps: DepsLoader): Promise<Response> {
  return handle("DELETE /api/session", loadDeps, async (store, { config }) => {
    const session = store.restore();
    if (session) {
      try {
        await new ManagementClient(config, session.token).logout();
      } catch (error: unknown) {
        logWarning(`Backend logout failed: ${errorMessage(error)}`);
      }
    }
    store.logout();
    return json({ session: null });
  });
}

/**
 * Register, then sign the new account in with "remember me" on.
 */
export function postRegister(loadDeps: DepsLoader, request: Request): Promise<Response> {
  return handle("POST /api/register", loadDeps, async (store, { config }) => {
    const registration = await readJson(request, registrationBody);
    await new ManagementClient(config).register(registration);
    const session = await store.login({ login: registration.login, password: registration.password }, true);
    return json({ session: await clientSession(config, session) }, 201);
  });
}

/**
 * Projects plus the latest run of the first few of them. A run lookup that
 * fails for any reason but authentication leaves that project without one.
 */
export function getDashboard(loadDeps: DepsLoader): Promise<Response> {
  return withSession("GET /api/dashboard", loadDeps, async ({ management }) => {
    const page = await management.listProjects();
    const latestRuns: Record<string, Run | null> = {};
    await Promise.all(
      page.items.slice(0, DASHBOARD_RUN_LOOKUPS).map(async (project) => {
        try {
          const runs = await management.listProcessingRuns(project.id, { limit: 1 });
          latestRuns[project.id] = runs.items[0] ?? null;
        } catch (error: unknown) {
          if (error instanceof AuthError) throw error;
          logWarning(`Latest run of project ${project.id} unavailable`, {
            projectId: project.id,
            reason: errorMessage(error),
          });
          latestRuns[project.id] = null;
        }
      })
    );
    const dashboard: Dashboard = { projects: page.items, latestRuns };
    return json(dashboard);
  });
}

export function getProjects(loadDeps: DepsLoader, request: Request): Promise<Response> {
  return withSession("GET /api/projects", loadDeps, async ({ management }) => {
    const url = new URL(request.url);
    const page = await management.listProjects({
      q: url.searchParams.get("q")?.trim() || undefined,
      limit: intParam(url, "limit", 100),
      offset: intParam(url, "offset", 0),
    });
    return json(page);
  });
}

export function postProject(loadDeps: DepsLoader, request: Request): Promise<Response> {
  return withSession("POST /api/projects", loadDeps, async ({ management }) => {
    let form: FormData;
    try {
      form = await request.formData();
    } catch {
      throw new ApiError("Request body must be multipart form data.", 400);
    }
    const title = textField(form, "title").trim();
    if (!title) throw new ApiError("Invalid request: title: Required", 400);
    const project = await management.createProject({
      title,
      description: textField(form, "description").trim() || null,
      startProcessing: textField(form, "start_processing") === "true",
      video: videoField(form),
    });
    return json(project, 201);
  });
}

export function getProject(loadDeps: DepsLoader, projectId: string): Promise<Response> {
  return withSession(`GET /api/projects/${projectId}`, loadDeps, async ({ management }) =>
    json(await management.getProject(projectId))
  );
}

export function deleteProject(loadDeps: DepsLoader, projectId: string): Promise<Response> {
  return withSession(`DELETE /api/projects/${projectId}`, loadDeps, async ({ management }) => {
    await management.deleteProject(projectId);
    return new Response(null, { status: 204 });
  });
}

export function getRuns(loadDeps: DepsLoader, projectId: string, request: Request): Promise<Response> {
  return withSession(`GET /api/projects/${projectId}/runs`, loadDeps, async ({ management }) => {
    const url = new URL(request.url);
    const page = await management.listProcessingRuns(projectId, {
      limit: intParam(url, "limit", 20),
      offset: intParam(url, "offset", 0),
    });
    return json(page);
  });
}

export function postRun(loadDeps: DepsLoader, projectId: string, request: Request): Promise<Response> {
  return withSession(`POST /api/projects/${projectId}/runs`, loadDeps, async ({ management }) => {
    const options = await readJson(request, startRunBody);
    return json(await management.startProcessing(projectId, options), 202);
  });
}

export function postCancelRun(loadDeps: DepsLoader, projectId: string, runId: string): Promise<Response> {
  return withSession(`POST /api/projects/${projectId}/runs/${runId}/cancel`, loadDeps, async ({ management }) =>
    json(await management.cancelProcessing(projectId, runId))
  );
}

/**
 * Models, detectors and audio providers. A service that is down contributes
 * an empty list so the rest can still be offered.
 */
export function getProcessingOptions(loadDeps: DepsLoader): Promise<Response> {
  return withSession("GET /api/processing-options", loadDeps, async (context: SessionContext) => {
    const [models, detectors, audioProviders] = await Promise.all([
      optionalList("models", () => context.video.listModels()),
      optionalList("detectors", () => context.video.listDetectors()),
      optionalList("audio providers", () => context.audio.listProviders()),
    ]);
    const options: ProcessingOptions = { models, detectors, audioProviders };
    return json(options);
  });
}

async function optionalList<T>(what: string, load: () => Promise<T[]>): Promise<T[]> {
  try {
    return await load();
  } catch (error: unknown) {
    if (error instanceof AuthError) throw error;
    logWarning(`Could not load ${what}: ${errorMessage(error)}`);
    return [];
  }
}

function textField(form: FormData, name: string): string {
  const value = form.get(name);
  return typeof value === "string" ? value : "";
}

function videoField(form: FormData): VideoUpload | null {
  const value = form.get("video");
  if (!(value instanceof Blob) || value.size === 0) return null;
  return {
    name: value instanceof File ? value.name : "video",
    type: value.type,
    data: value,
  };
}

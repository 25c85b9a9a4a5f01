import { NextResponse } from "next/server";
import type { z } from "zod";
import { ApiError, AuthError, httpStatusFor, toErrorPayload } from "@/lib/errors";
import { toClientError } from "@/lib/http-errors";
import { logBackendError } from "@/lib/logger";
import { AudioServiceClient } from "./audio-service-client";
import { type AppConfig, loadConfig } from "./config";
import { type CookieJar, requestCookieJar } from "./cookie-jar";
import { ManagementClient } from "./management-client";
import { type Session, SessionStore } from "./session-store";
import { VideoServiceClient } from "./video-service-client";

export const APP_SERVICE = "gme-app";

/** What a route handler needs from its environment. */
export interface RouteDeps {
  config: AppConfig;
  jar: CookieJar;
}

/** The signed-in view of a request: session plus service clients. */
export interface SessionContext {
  config: AppConfig;
  store: SessionStore;
  session: Session;
  management: ManagementClient;
  video: VideoServiceClient;
  audio: AudioServiceClient;
}

/** Builds the deps of the request being served; called inside `handle`. */
export type DepsLoader = () => RouteDeps;

export function routeDeps(): RouteDeps {
  return { config: loadConfig(), jar: requestCookieJar() };
}

export function openSessionStore(deps: RouteDeps): SessionStore {
  return new SessionStore(deps.jar, deps.config, new ManagementClient(deps.config));
}

export function json(body: unknown, status = 200): NextResponse {
  return NextResponse.json(body, { status });
}

/**
 * Run a handler and answer with an error payload when it throws, including
 * when the configuration itself cannot be loaded. An `AuthError` also drops
 * the persisted session.
 */
export async function handle(
  endpoint: string,
  loadDeps: DepsLoader,
  handler: (store: SessionStore, deps: RouteDeps) => Promise<Response>
): Promise<Response> {
  let deps: RouteDeps | null = null;
  let store: SessionStore | null = null;
  try {
    deps = loadDeps();
    store = openSessionStore(deps);
    return await handler(store, deps);
  } catch (error: unknown) {
    const clientError = toClientError(error, {
      service: APP_SERVICE,
      timeoutMs: deps?.config.requestTimeoutMs ?? 0,
    });
    if (clientError instanceof AuthError) {
      store?.logout();
    }
    logBackendError(endpoint, clientError, { kind: clientError.kind });
    return json({ error: toErrorPayload(clientError) }, httpStatusFor(clientError));
  }
}

/**
 * Like `handle`, for routes that need a signed-in user.
 */
export function withSession(
  endpoint: string,
  loadDeps: DepsLoader,
  handler: (context: SessionContext) => Promise<Response>
): Promise<Response> {
  return handle(endpoint, loadDeps, async (store, deps) => {
    const session = store.restore();
    if (!session) throw new AuthError("Not signed in.");
    return handler({
      config: deps.config,
      store,
      session,
      management: new ManagementClient(deps.config, session.token),
      video: new VideoServiceClient(deps.config, session.token),
      audio: new AudioServiceClient(deps.config, session.token),
    });
  });
}

/**
 * Decode a JSON request body; a malformed one is a 400.
 */
export async function readJson<S extends z.ZodTypeAny>(request: Request, schema: S): Promise<z.output<S>> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    throw new ApiError("Request body must be JSON.", 400);
  }
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
    throw new ApiError(`Invalid request: ${detail}`, 400);
  }
  return parsed.data;
}

/**
 * Non-negative integer query parameter, or `fallback` when absent or unusable.
 */
export function intParam(url: URL, name: string, fallback: number): number {
  const raw = url.searchParams.get(name);
  if (raw === null || raw.trim() === "") return fallback;
  const value = Number(raw);
  return Number.isInteger(value) && value >= 0 ? value : fallback;
}

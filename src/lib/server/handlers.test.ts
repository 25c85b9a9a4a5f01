// @vitest-environment node
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FakeBackend, jsonBody, sendJson, wait } from "@/test/fake-backend";
import { MemoryCookieJar } from "@/test/memory-cookie-jar";
import { type AppConfig, loadConfig } from "./config";
import {
  deleteSession,
  getDashboard,
  getProcessingOptions,
  getProject,
  getProjects,
  getSession,
  postProject,
  postRun,
  postSession,
} from "./handlers";
import type { DepsLoader } from "./route-support";

const ME = { id: 1, login: "alice", role: "user", email: "alice@example.com", display_name: "Alice Doe" };

function project(id: number, title: string) {
  return { id, title, status: "draft", created_at: "2024-05-01T10:00:00Z", updated_at: "2024-05-01T10:00:00Z" };
}

describe("route handlers", () => {
  let backend: FakeBackend;
  let config: AppConfig;
  let jar: MemoryCookieJar;
  let deps: DepsLoader;

  beforeEach(async () => {
    backend = new FakeBackend();
    const url = await backend.start();
    config = loadConfig({
      GME_MANAGEMENT_URL: `${url}/api/v1`,
      GME_VIDEO_SERVICE_URL: "http://127.0.0.1:1",
      GME_AUDIO_SERVICE_URL: url,
      GME_REQUEST_TIMEOUT: "0.1",
    });
    jar = new MemoryCookieJar();
    deps = () => ({ config, jar });
  });

  afterEach(async () => {
    await backend.stop();
  });

  function signedIn(): void {
    jar.set("session_token", "test-token", {});
    jar.set(
      "session_token_meta",
      JSON.stringify({ remembered: false, login: "alice", apiBaseUrl: config.managementUrl }),
      {}
    );
  }

  it("signs in, stores the session cookies and answers with the profile", async () => {
    backend
      .on("POST", "/api/v1/auth/login", (_req, res) =>
        sendJson(res, 200, { user: { id: 1, login: "alice", role: "user" } }, { "Set-Cookie": "session_token=test-token" })
      )
      .on("GET", "/api/v1/users/me", (_req, res) => sendJson(res, 200, ME));

    const response = await postSession(
      deps,
      new Request("http://app.test/api/session", {
        method: "POST",
        body: JSON.stringify({ login: "alice", password: "test-password", remember: true }),
      })
    );

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ session: { remembered: true, user: { displayName: "Alice Doe" } } });
    expect(jar.names()).toEqual(["session_token", "session_token_meta"]);
    expect(jar.get("session_token")).toBe("test-token");
    expect(backend.last("GET", "/api/v1/users/me")?.headers.cookie).toBe("session_token=test-token");
  });

  it("rejects a sign-in body without a password", async () => {
    const response = await postSession(
      deps,
      new Request("http://app.test/api/session", { method: "POST", body: JSON.stringify({ login: "alice" }) })
    );

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ error: { kind: "api", status: 400 } });
    expect(backend.requests).toHaveLength(0);
  });

  it("answers a null session when nothing is persisted", async () => {
    const response = await getSession(deps);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ session: null });
  });

  it("drops the cookies when the backend no longer accepts the token", async () => {
    signedIn();
    backend.on("GET", "/api/v1/users/me", (_req, res) => sendJson(res, 401, { detail: "Token expired" }));

    const response = await getSession(deps);

    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({ error: { kind: "auth", message: "Token expired" } });
    expect(jar.names()).toEqual([]);
  });

  it("refuses signed-in routes without a session", async () => {
    const response = await getProjects(deps, new Request("http://app.test/api/projects"));

    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({ error: { kind: "auth", message: "Not signed in." } });
  });

  it("signs out even when the backend logout fails", async () => {
    signedIn();
    backend.on("POST", "/api/v1/auth/logout", (_req, res) => sendJson(res, 500, { detail: "boom" }));

    const response = await deleteSession(deps);

    expect(await response.json()).toEqual({ session: null });
    expect(jar.names()).toEqual([]);
  });

  it("builds the dashboard and tolerates a failed run lookup", async () => {
    signedIn();
    backend
      .on("GET", "/api/v1/projects", (_req, res) =>
        sendJson(res, 200, { items: [project(5, "Lecture"), project(6, "Demo")], total: 2, limit: 100, offset: 0 })
      )
      .on("GET", "/api/v1/projects/5/processing", (_req, res) =>
        sendJson(res, 200, { items: [{ id: 9, project_id: 5, status: "completed" }], limit: 1, offset: 0 })
      )
      .on("GET", "/api/v1/projects/6/processing", (_req, res) => sendJson(res, 500, { detail: "boom" }));

    const response = await getDashboard(deps);
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.projects.map((item: { name: string }) => item.name)).toEqual(["Lecture", "Demo"]);
    expect(body.latestRuns["5"]).toMatchObject({ id: "9", status: "completed" });
    expect(body.latestRuns["6"]).toBeNull();
  });

  it("answers 504 with the timeout when the backend is too slow", async () => {
    signedIn();
    backend.on("GET", "/api/v1/projects/5", async (_req, res) => {
      await wait(300);
      sendJson(res, 200, project(5, "Lecture"));
    });

    const response = await getProject(deps, "5");

    expect(response.status).toBe(504);
    expect(await response.json()).toEqual({
      error: { kind: "timeout", message: "The request did not complete within 0.1s.", timeoutMs: 100 },
    });
    expect(jar.names()).toEqual(["session_token", "session_token_meta"]);
  });

  it("requires a project title", async () => {
    signedIn();
    const form = new FormData();
    form.set("description", "no title");

    const response = await postProject(deps, new Request("http://app.test/api/projects", { method: "POST", body: form }));

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ error: { message: "Invalid request: title: Required" } });
  });

  it("forwards a new project with its video", async () => {
    signedIn();
    backend.on("POST", "/api/v1/projects", (_req, res) => sendJson(res, 201, project(7, "Lecture")));
    const form = new FormData();
    form.set("title", "  Lecture ");
    form.set("start_processing", "true");
    form.set("video", new File(["frames"], "clip.mp4", { type: "video/mp4" }));

    const response = await postProject(deps, new Request("http://app.test/api/projects", { method: "POST", body: form }));

    expect(response.status).toBe(201);
    expect(await response.json()).toMatchObject({ id: "7", name: "Lecture" });
    const body = backend.last("POST", "/api/v1/projects")?.body.toString("utf8") ?? "";
    expect(body).toContain('name="title"\r\n\r\nLecture\r\n');
    expect(body).toContain('name="start_processing"\r\n\r\ntrue\r\n');
    expect(body).toContain('filename="clip.mp4"');
  });

  it("starts a run with the chosen options", async () => {
    signedIn();
    backend.on("POST", "/api/v1/projects/5/processing/start", (_req, res) =>
      sendJson(res, 202, { id: 9, project_id: 5, status: "pending" })
    );

    const response = await postRun(
      deps,
      "5",
      new Request("http://app.test/api/projects/5/runs", {
        method: "POST",
        body: JSON.stringify({ launchMode: "immediate", processingMode: "video_only", model: "base", detector: "mtcnn" }),
      })
    );

    expect(response.status).toBe(202);
    expect(jsonBody(backend.last("POST", "/api/v1/projects/5/processing/start"))).toEqual({
      launch_mode: "immediate",
      processing_mode: "video_only",
      model: "base",
      detector: "mtcnn",
    });
  });

  it("offers what the reachable services list", async () => {
    signedIn();
    backend.on("GET", "/providers", (_req, res) =>
      sendJson(res, 200, [{ code: "Whisper", supports_audio: true }])
    );

    const response = await getProcessingOptions(deps);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      models: [],
      detectors: [],
      audioProviders: [
        { code: "whisper", title: "whisper", supportsAudio: true, supportsVideo: false, isVideoProvider: false },
      ],
    });
  });

  it("keeps the session when the audio service rejects its API key", async () => {
    signedIn();
    config = loadConfig({
      GME_MANAGEMENT_URL: config.managementUrl,
      GME_VIDEO_SERVICE_URL: "http://127.0.0.1:1",
      GME_AUDIO_SERVICE_URL: config.audioServiceUrl,
      GME_AUDIO_SERVICE_API_KEY: "test-key",
      GME_REQUEST_TIMEOUT: "0.1",
    });
    backend.on("GET", "/providers", (_req, res) => sendJson(res, 401, { detail: "Invalid API key" }));

    const response = await getProcessingOptions(deps);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ models: [], detectors: [], audioProviders: [] });
    expect(jar.names()).toEqual(["session_token", "session_token_meta"]);
  });

  it("answers a 500 payload when the configuration cannot be loaded", async () => {
    const broken: DepsLoader = () => ({ config: loadConfig({ GME_REQUEST_TIMEOUT: "soon" }), jar });

    const response = await getSession(broken);

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      error: { kind: "api", status: 500, message: expect.stringContaining("Invalid configuration") },
    });
    expect(jar.names()).toEqual([]);
  });
});

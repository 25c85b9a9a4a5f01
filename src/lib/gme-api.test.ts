import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import { describe, expect, it } from "vitest";
import { AuthError, NetworkError, TimeoutError } from "./errors";
import { GmeApi } from "./gme-api";
import type { ClientSettings } from "./types";

const settings: ClientSettings = { requestTimeoutMs: 15000, uploadTimeoutMs: 600000, retryAttempts: 0, retryDelayMs: 0 };

interface Reply {
  status: number;
  data?: unknown;
}

/** An axios instance answered in process, recording each request. */
function stubHttp(reply: (config: InternalAxiosRequestConfig) => Reply) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    baseURL: "/api",
    adapter: async (config) => {
      requests.push(config);
      const { status, data } = reply(config);
      const response: AxiosResponse = { data, status, statusText: "", headers: {}, config };
      if (status >= 400) {
        throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
      }
      return response;
    },
  });
  return { http, requests };
}

function sentJson(config: InternalAxiosRequestConfig | undefined): unknown {
  return typeof config?.data === "string" ? JSON.parse(config.data) : undefined;
}

const session = {
  user: { id: "1", login: "alice", email: null, role: "user", isActive: true, displayName: null, createdAt: null },
  remembered: false,
};

describe("GmeApi", () => {
  it("signs in through the session route", async () => {
    const { http, requests } = stubHttp(() => ({ status: 200, data: { session } }));

    const result = await new GmeApi(settings, http).login({ login: "alice", password: "test-password", remember: false });

    expect(result).toEqual(session);
    expect(requests[0]?.method).toBe("post");
    expect(requests[0]?.url).toBe("/session");
    expect(sentJson(requests[0])).toEqual({ login: "alice", password: "test-password", remember: false });
  });

  it("refuses a sign-in answer without a session", async () => {
    const { http } = stubHttp(() => ({ status: 200, data: { session: null } }));

    await expect(
      new GmeApi(settings, http).login({ login: "alice", password: "test-password", remember: false })
    ).rejects.toMatchObject({ kind: "api", status: 502, message: "The server answered without a session." });
  });

  it("rebuilds the error the server raised", async () => {
    const { http } = stubHttp(() => ({ status: 401, data: { error: { kind: "auth", message: "Not signed in." } } }));

    const attempt = new GmeApi(settings, http).getDashboard();

    await expect(attempt).rejects.toBeInstanceOf(AuthError);
    await expect(attempt).rejects.toThrow("Not signed in.");
  });

  it("keeps the backend timeout reported by the server", async () => {
    const { http } = stubHttp(() => ({
      status: 504,
      data: { error: { kind: "timeout", message: "The request did not complete within 15s.", timeoutMs: 15000 } },
    }));

    const attempt = new GmeApi(settings, http).getProject("p1");

    await expect(attempt).rejects.toBeInstanceOf(TimeoutError);
    await expect(attempt).rejects.toMatchObject({ timeoutMs: 15000 });
  });

  it("reports its own timeout with the margin included", async () => {
    const { http } = stubHttp((config) => {
      throw new AxiosError("timeout exceeded", "ECONNABORTED", config);
    });

    await expect(new GmeApi(settings, http).listRuns("p1")).rejects.toMatchObject({
      kind: "timeout",
      timeoutMs: 17000,
      message: "The request did not complete within 17s.",
    });
  });

  it("reports an unreachable server as a network error", async () => {
    const { http } = stubHttp((config) => {
      throw new AxiosError("Network Error", AxiosError.ERR_NETWORK, config);
    });

    const attempt = new GmeApi(settings, http).getSession();

    await expect(attempt).rejects.toBeInstanceOf(NetworkError);
    await expect(attempt).rejects.toThrow("Could not reach the GME app server.");
  });

  it("allows one server timeout per chained backend call", async () => {
    const { http, requests } = stubHttp(() => ({ status: 200, data: { session, projects: [], latestRuns: {} } }));
    const client = new GmeApi(settings, http);

    await client.getSession();
    await client.login({ login: "alice", password: "test-password", remember: false });
    await client.register({ login: "alice", password: "test-password" });
    await client.getDashboard();

    expect(requests.map((request) => `${request.url} ${request.timeout}`)).toEqual([
      "/session 17000",
      "/session 32000",
      "/register 47000",
      "/dashboard 32000",
    ]);
  });

  it("uses the upload timeout only when a video is attached", async () => {
    const { http, requests } = stubHttp(() => ({ status: 201, data: { id: "p1" } }));
    const client = new GmeApi(settings, http);

    await client.createProject({ name: "Lecture", description: "", video: null, startProcessing: false });
    await client.createProject({
      name: "Lecture",
      description: "",
      video: new File(["frames"], "clip.mp4", { type: "video/mp4" }),
      startProcessing: true,
    });

    expect(requests.map((request) => request.timeout)).toEqual([17000, 602000]);
    const form = requests[1]?.data;
    expect(form).toBeInstanceOf(FormData);
    if (form instanceof FormData) {
      expect(form.get("title")).toBe("Lecture");
      expect(form.get("start_processing")).toBe("true");
    }
  });

  it("passes search and paging as query parameters", async () => {
    const { http, requests } = stubHttp(() => ({ status: 200, data: { items: [], total: 0, limit: 10, offset: 20 } }));

    await new GmeApi(settings, http).listProjects({ q: "lec", limit: 10, offset: 20 });

    expect(requests[0]?.params).toEqual({ q: "lec", limit: 10, offset: 20 });
  });
});

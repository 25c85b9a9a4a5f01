// @vitest-environment node
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ApiError, AuthError } from "@/lib/errors";
import { FakeBackend, sendJson } from "@/test/fake-backend";
import { AudioServiceClient } from "./audio-service-client";
import { loadConfig } from "./config";
import { VideoServiceClient } from "./video-service-client";

describe("video and audio service clients", () => {
  let backend: FakeBackend;
  let url: string;

  beforeEach(async () => {
    backend = new FakeBackend();
    url = await backend.start();
  });

  afterEach(async () => {
    await backend.stop();
  });

  it("lists models and detectors in either response shape", async () => {
    backend
      .on("GET", "/models", (_req, res) => sendJson(res, 200, ["base", " large ", ""]))
      .on("GET", "/detectors", (_req, res) => sendJson(res, 200, { items: ["retinaface", "mtcnn"] }));
    const client = new VideoServiceClient(loadConfig({ GME_VIDEO_SERVICE_URL: url }), "test-token");

    expect(await client.listModels()).toEqual(["base", "large"]);
    expect(await client.listDetectors()).toEqual(["retinaface", "mtcnn"]);
    expect(backend.requests[0]?.headers.cookie).toBe("session_token=test-token");
  });

  it("authenticates provider listing with the API key when one is set", async () => {
    backend.on("GET", "/providers", (_req, res) =>
      sendJson(res, 200, [{ code: "whisper", title: "Whisper", supports_audio: true }])
    );
    const config = loadConfig({ GME_AUDIO_SERVICE_URL: url, GME_AUDIO_SERVICE_API_KEY: "test-key" });

    const providers = await new AudioServiceClient(config, "test-token").listProviders();

    expect(providers.map((provider) => provider.code)).toEqual(["whisper"]);
    expect(backend.requests[0]?.headers["x-api-key"]).toBe("test-key");
    expect(backend.requests[0]?.headers.cookie).toBeUndefined();
  });

  it("falls back to the session cookie without an API key", async () => {
    backend.on("GET", "/providers", (_req, res) => sendJson(res, 200, { items: [] }));

    await new AudioServiceClient(loadConfig({ GME_AUDIO_SERVICE_URL: url }), "test-token").listProviders();

    expect(backend.requests[0]?.headers["x-api-key"]).toBeUndefined();
    expect(backend.requests[0]?.headers.cookie).toBe("session_token=test-token");
  });

  it("reports a rejected API key as an ApiError, not a lost session", async () => {
    backend.on("GET", "/providers", (_req, res) => sendJson(res, 401, { detail: "Invalid API key" }));
    const config = loadConfig({ GME_AUDIO_SERVICE_URL: url, GME_AUDIO_SERVICE_API_KEY: "test-key" });

    const failure = new AudioServiceClient(config, "test-token").listProviders();

    await expect(failure).rejects.toBeInstanceOf(ApiError);
    await expect(failure).rejects.toMatchObject({ status: 401, code: "invalid_api_key" });
  });

  it("maps 401 from the audio service to AuthError", async () => {
    backend.on("GET", "/providers", (_req, res) => sendJson(res, 401, { detail: "Invalid API key" }));

    await expect(
      new AudioServiceClient(loadConfig({ GME_AUDIO_SERVICE_URL: url }), "test-token").listProviders()
    ).rejects.toBeInstanceOf(AuthError);
  });
});

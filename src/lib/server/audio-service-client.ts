import { ApiError, AuthError } from "@/lib/errors";
import { audioProvidersSchema } from "@/lib/schemas";
import type { AudioProvider } from "@/lib/types";
import type { AppConfig } from "./config";
import { ServiceHttp } from "./service-http";

export const AUDIO_SERVICE = "gme-audio";

/**
 * Provider catalogue of the audio service. With an API key configured the
 * key is sent as `X-API-Key` and the session cookie is left out; the service
 * refusing that key says nothing about the user's session, so it surfaces as
 * an `ApiError` rather than an `AuthError`.
 */
export class AudioServiceClient {
  private readonly service: ServiceHttp;
  private readonly usesApiKey: boolean;

  constructor(config: AppConfig, token?: string | null) {
    const apiKey = config.audioServiceApiKey;
    this.usesApiKey = apiKey !== null;
    this.service = new ServiceHttp({
      service: AUDIO_SERVICE,
      baseUrl: config.audioServiceUrl,
      timeoutMs: config.requestTimeoutMs,
      sessionCookieName: config.sessionCookieName,
      token: apiKey ? null : token,
      headers: apiKey ? { "X-API-Key": apiKey } : undefined,
    });
  }

  async listProviders(): Promise<AudioProvider[]> {
    try {
      return await this.service.request({ method: "GET", url: "/providers" }, audioProvidersSchema);
    } catch (error: unknown) {
      if (this.usesApiKey && error instanceof AuthError) {
        throw new ApiError(`${AUDIO_SERVICE} rejected the configured API key: ${error.message}`, 401, "invalid_api_key");
      }
      throw error;
    }
  }
}

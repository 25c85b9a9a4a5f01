import { nameListSchema } from "@/lib/schemas";
import type { AppConfig } from "./config";
import { ServiceHttp } from "./service-http";

export const VIDEO_SERVICE = "gme-video";

/** Lists the models and detectors the video service can run. */
export class VideoServiceClient {
  private readonly service: ServiceHttp;

  constructor(config: AppConfig, token?: string | null) {
    this.service = new ServiceHttp({
      service: VIDEO_SERVICE,
      baseUrl: config.videoServiceUrl,
      timeoutMs: config.requestTimeoutMs,
      sessionCookieName: config.sessionCookieName,
      token,
    });
  }

  listModels(): Promise<string[]> {
    return this.service.request({ method: "GET", url: "/models" }, nameListSchema);
  }

  listDetectors(): Promise<string[]> {
    return this.service.request({ method: "GET", url: "/detectors" }, nameListSchema);
  }
}

import { z } from "zod";
import type { ClientSettings } from "@/lib/types";

export const DEFAULT_MANAGEMENT_URL = "http://localhost:8000/api/v1";
export const DEFAULT_VIDEO_SERVICE_URL = "http://localhost:8100";
export const DEFAULT_AUDIO_SERVICE_URL = "http://localhost:8200";

export interface AppConfig {
  managementUrl: string;
  videoServiceUrl: string;
  audioServiceUrl: string;
  audioServiceApiKey: string | null;
  requestTimeoutMs: number;
  uploadTimeoutMs: number;
  sessionCookieName: string;
  rememberMaxAgeSeconds: number;
  retryAttempts: number;
  retryDelayMs: number;
}

type Env = Record<string, string | undefined>;

function numberVar(name: string, fallback: number, schema: z.ZodNumber, expected: string) {
  return z
    .string()
    .optional()
    .transform((raw, ctx) => {
      const text = raw?.trim();
      if (!text) return fallback;
      const parsed = schema.safeParse(Number(text));
      if (!parsed.success) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be ${expected}, got "${text}"` });
        return z.NEVER;
      }
      return parsed.data;
    });
}

const envSchema = z.object({
  GME_MANAGEMENT_URL: z.string().optional(),
  GME_VIDEO_SERVICE_URL: z.string().optional(),
  GME_AUDIO_SERVICE_URL: z.string().optional(),
  GME_AUDIO_SERVICE_API_KEY: z.string().optional(),
  GME_REQUEST_TIMEOUT: numberVar("GME_REQUEST_TIMEOUT", 15, z.number().positive(), "a positive number"),
  GME_UPLOAD_TIMEOUT: numberVar("GME_UPLOAD_TIMEOUT", 600, z.number().positive(), "a positive number"),
  GME_SESSION_COOKIE_NAME: z.string().optional(),
  GME_REMEMBER_DAYS: numberVar("GME_REMEMBER_DAYS", 30, z.number().int().positive(), "a positive integer"),
  GME_RETRY_ATTEMPTS: numberVar("GME_RETRY_ATTEMPTS", 0, z.number().int().min(0), "a non-negative integer"),
  GME_RETRY_DELAY_MS: numberVar("GME_RETRY_DELAY_MS", 500, z.number().int().min(0), "a non-negative integer"),
});

/**
 * Read the `GME_*` environment variables. Throws with the offending variable
 * named when a numeric value is out of range.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`);
  }
  const vars = parsed.data;

  return Object.freeze({
    managementUrl: normalizeManagementUrl(vars.GME_MANAGEMENT_URL),
    videoServiceUrl: normalizeServiceUrl(vars.GME_VIDEO_SERVICE_URL, DEFAULT_VIDEO_SERVICE_URL),
    audioServiceUrl: normalizeServiceUrl(vars.GME_AUDIO_SERVICE_URL, DEFAULT_AUDIO_SERVICE_URL),
    audioServiceApiKey: vars.GME_AUDIO_SERVICE_API_KEY?.trim() || null,
    requestTimeoutMs: Math.round(vars.GME_REQUEST_TIMEOUT * 1000),
    uploadTimeoutMs: Math.round(vars.GME_UPLOAD_TIMEOUT * 1000),
    sessionCookieName: vars.GME_SESSION_COOKIE_NAME?.trim() || "session_token",
    rememberMaxAgeSeconds: vars.GME_REMEMBER_DAYS * 24 * 60 * 60,
    retryAttempts: vars.GME_RETRY_ATTEMPTS,
    retryDelayMs: vars.GME_RETRY_DELAY_MS,
  });
}

/**
 * The management API lives under `/api/v1`. A bare host (with or without a
 * scheme) gets that path appended; any other path is kept as given.
 */
export function normalizeManagementUrl(raw: string | undefined): string {
  const value = withScheme(raw);
  if (!value) return DEFAULT_MANAGEMENT_URL;
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new Error(`Invalid configuration: GME_MANAGEMENT_URL is not a valid URL, got "${raw}"`);
  }
  if (url.pathname === "" || url.pathname === "/") {
    return `${value}/api/v1`;
  }
  return value;
}

export function normalizeServiceUrl(raw: string | undefined, fallback: string): string {
  return withScheme(raw) || fallback;
}

function withScheme(raw: string | undefined): string {
  const value = (raw ?? "").trim().replace(/\/+$/, "");
  if (!value) return "";
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(value) ? value : `http://${value}`;
}

export function clientSettingsFrom(config: AppConfig): ClientSettings {
  return {
    requestTimeoutMs: config.requestTimeoutMs,
    uploadTimeoutMs: config.uploadTimeoutMs,
    retryAttempts: config.retryAttempts,
    retryDelayMs: config.retryDelayMs,
  };
}

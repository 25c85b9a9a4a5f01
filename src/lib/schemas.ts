import { z } from "zod";
import type { AudioProvider, Page, Project, Run, UserProfile } from "./types";

/**
 * Wire schemas for the backend payloads. Each one validates the snake_case
 * JSON a service sends and transforms it into the camelCase record the
 * screens work with. Optional fields default to null.
 */

const id = z.union([z.string(), z.number()]).transform((value) => String(value));
const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? null);
const timestamp = z
  .string()
  .nullish()
  .transform((value) => (value ? value : null));

export const userSummarySchema = z.object({
  id,
  login: z.string(),
  role: z.string(),
  must_change_password: z.boolean().optional().default(false),
});

export const userProfileSchema = z
  .object({
    id,
    login: z.string(),
    email: optionalText,
    role: z.string(),
    is_active: z.boolean().optional().default(true),
    display_name: optionalText,
    created_at: timestamp,
  })
  .transform(
    (wire): UserProfile => ({
      id: wire.id,
      login: wire.login,
      email: wire.email,
      role: wire.role,
      isActive: wire.is_active,
      displayName: wire.display_name,
      createdAt: wire.created_at,
    })
  );

export const projectSchema = z
  .object({
    id,
    creator_id: id.optional(),
    title: z.string(),
    description: optionalText,
    status: z.string(),
    video_path: optionalText,
    created_at: timestamp,
    updated_at: timestamp,
  })
  .transform(
    (wire): Project => ({
      id: wire.id,
      creatorId: wire.creator_id ?? "",
      name: wire.title,
      description: wire.description,
      status: wire.status,
      videoReference: wire.video_path,
      createdAt: wire.created_at,
      updatedAt: wire.updated_at,
    })
  );

export const runSchema = z
  .object({
    id,
    project_id: id,
    status: z.string(),
    started_at: timestamp,
    created_at: timestamp,
    result_summary: optionalText,
    provider: optionalText,
    launch_mode: optionalText,
    video_task_id: z
      .union([z.string(), z.number()])
      .nullish()
      .transform((value) => (value === null || value === undefined ? null : String(value))),
    updated_at: timestamp,
    completed_at: timestamp,
  })
  .transform(
    (wire): Run => ({
      id: wire.id,
      projectId: wire.project_id,
      startedAt: wire.started_at ?? wire.created_at,
      status: wire.status,
      resultSummary: wire.result_summary,
      provider: wire.provider,
      launchMode: wire.launch_mode,
      videoTaskId: wire.video_task_id,
      updatedAt: wire.updated_at,
      completedAt: wire.completed_at,
    })
  );

const pageFields = {
  total: z.number().int().nonnegative().optional(),
  limit: z.number().int().nonnegative().optional().default(0),
  offset: z.number().int().nonnegative().optional().default(0),
};

function toPage<T>(wire: { items: T[]; total?: number; limit: number; offset: number }): Page<T> {
  return {
    items: wire.items,
    total: wire.total ?? wire.items.length,
    limit: wire.limit,
    offset: wire.offset,
  };
}

export const projectsPageSchema = z
  .object({ items: z.array(projectSchema).optional().default([]), ...pageFields })
  .transform(toPage);

export const runsPageSchema = z
  .object({ items: z.array(runSchema).optional().default([]), ...pageFields })
  .transform(toPage);

export const loginResponseSchema = z.object({ user: userSummarySchema });

/**
 * The video service lists models and detectors either as a bare array or
 * wrapped in `{items}`. Blank entries are dropped.
 */
export const nameListSchema = z
  .union([z.array(z.string()), z.object({ items: z.array(z.string()) })])
  .transform((wire) => (Array.isArray(wire) ? wire : wire.items))
  .transform((names) => names.map((name) => name.trim()).filter((name) => name.length > 0));

const audioProviderSchema = z.object({
  code: z.string().nullish(),
  title: z.string().nullish(),
  supports_audio: z.boolean().optional().default(false),
  supports_video: z.boolean().optional().default(false),
  is_video_provider: z.boolean().optional().default(false),
});

export const audioProvidersSchema = z
  .union([z.array(audioProviderSchema), z.object({ items: z.array(audioProviderSchema) })])
  .transform((wire) => (Array.isArray(wire) ? wire : wire.items))
  .transform((providers) =>
    providers.flatMap((provider): AudioProvider[] => {
      const code = provider.code?.trim().toLowerCase();
      if (!code) return [];
      return [
        {
          code,
          title: provider.title?.trim() || code,
          supportsAudio: provider.supports_audio,
          supportsVideo: provider.supports_video,
          isVideoProvider: provider.is_video_provider,
        },
      ];
    })
  );

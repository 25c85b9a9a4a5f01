/**
 * Records shared between the server routes and the browser screens. They
 * mirror what the management, video and audio services return, renamed to
 * camelCase by the schemas in `schemas.ts`. The backend owns every one of
 * them; the client only reads and displays.
 */
export type UserRole = "admin" | "user" | (string & {});

export interface UserProfile {
  id: string;
  login: string;
  email: string | null;
  role: UserRole;
  isActive: boolean;
  displayName: string | null;
  createdAt: string | null;
}

export type ProjectStatus = "draft" | "in_progress" | "done" | "archived" | (string & {});

export interface Project {
  id: string;
  creatorId: string;
  name: string;
  description: string | null;
  status: ProjectStatus;
  videoReference: string | null;
  createdAt: string | null;
  updatedAt: string | null;
}

export type RunStatus =
  | "scheduled"
  | "pending"
  | "started"
  | "running"
  | "completed"
  | "failed"
  | "cancelled"
  | (string & {});

export type LaunchMode = "immediate" | "scheduled" | (string & {});

export type ProcessingMode = "video_only" | "audio_only" | "audio_and_video";

export interface Run {
  id: string;
  projectId: string;
  startedAt: string | null;
  status: RunStatus;
  resultSummary: string | null;
  provider: string | null;
  launchMode: LaunchMode | null;
  videoTaskId: string | null;
  updatedAt: string | null;
  completedAt: string | null;
}

export interface Page<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
}

export interface AudioProvider {
  code: string;
  title: string;
  supportsAudio: boolean;
  supportsVideo: boolean;
  isVideoProvider: boolean;
}

export interface ProcessingOptions {
  models: string[];
  detectors: string[];
  audioProviders: AudioProvider[];
}

export interface Dashboard {
  projects: Project[];
  latestRuns: Record<string, Run | null>;
}

export interface Credentials {
  login: string;
  password: string;
}

export interface Registration extends Credentials {
  email?: string;
}

export interface StartRunOptions {
  launchMode?: LaunchMode;
  model?: string;
  detector?: string;
  processingMode?: ProcessingMode;
  audioProvider?: string;
}

/**
 * What the browser knows about the signed-in user. The session token itself
 * stays in an httpOnly cookie and never reaches this shape.
 */
export interface ClientSession {
  user: UserProfile;
  remembered: boolean;
}

/**
 * Timeouts and retry policy handed from the server page to the browser shell.
 */
export interface ClientSettings {
  requestTimeoutMs: number;
  uploadTimeoutMs: number;
  retryAttempts: number;
  retryDelayMs: number;
}

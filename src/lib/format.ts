import type { ProjectStatus, RunStatus, UserProfile } from "./types";

const PROJECT_STATUS_LABELS: Record<string, string> = {
  draft: "Draft",
  in_progress: "In progress",
  done: "Done",
  archived: "Archived",
};

const RUN_STATUS_LABELS: Record<string, string> = {
  scheduled: "Scheduled",
  pending: "Queued",
  started: "Started",
  running: "Running",
  completed: "Completed",
  failed: "Failed",
  cancelled: "Cancelled",
};

const ACTIVE_RUN_STATUSES: ReadonlySet<string> = new Set(["scheduled", "pending", "started", "running"]);

/** Unknown statuses are shown as the backend sent them. */
export function projectStatusLabel(status: ProjectStatus): string {
  return PROJECT_STATUS_LABELS[status] ?? status;
}

export function runStatusLabel(status: RunStatus): string {
  return RUN_STATUS_LABELS[status] ?? status;
}

export function isRunActive(status: RunStatus): boolean {
  return ACTIVE_RUN_STATUSES.has(status);
}

export function userDisplayName(user: UserProfile): string {
  return (user.displayName || user.login || "User").trim();
}

/**
 * `dd.MM.yyyy HH:mm` in local time; `-` when the value is missing or
 * unparseable.
 */
export function formatDateTime(value: string | null | undefined): string {
  if (!value) return "-";
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) return "-";
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${pad(date.getDate())}.${pad(date.getMonth() + 1)}.${date.getFullYear()} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function timestampOf(value: string | null | undefined): number {
  if (!value) return 0;
  const time = new Date(value).getTime();
  return Number.isNaN(time) ? 0 : time;
}

"use client";

import { Badge, type BadgeTone } from "@/components/ui/badge";
import { projectStatusLabel, runStatusLabel } from "@/lib/format";
import type { ProjectStatus, RunStatus } from "@/lib/types";

const PROJECT_TONES: Record<string, BadgeTone> = {
  draft: "neutral",
  in_progress: "info",
  done: "success",
  archived: "warning",
};

const RUN_TONES: Record<string, BadgeTone> = {
  scheduled: "neutral",
  pending: "neutral",
  started: "info",
  running: "info",
  completed: "success",
  failed: "danger",
  cancelled: "warning",
};

export function ProjectStatusBadge({ status }: { status: ProjectStatus }) {
  return <Badge tone={PROJECT_TONES[status] ?? "neutral"}>{projectStatusLabel(status)}</Badge>;
}

export function RunStatusBadge({ status }: { status: RunStatus }) {
  return <Badge tone={RUN_TONES[status] ?? "neutral"}>{runStatusLabel(status)}</Badge>;
}

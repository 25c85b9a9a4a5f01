import { timestampOf } from "./format";
import type { Dashboard, Project, Run } from "./types";

export const RECENT_RUNS_LIMIT = 20;

export interface ProjectMetrics {
  total: number;
  /** Draft or in progress. */
  active: number;
  done: number;
  withRuns: number;
}

export interface RecentRun {
  project: Project;
  run: Run | null;
}

/** Case-insensitive match on name and description; blank shows everything. */
export function filterProjects(projects: Project[], query: string): Project[] {
  const needle = query.trim().toLowerCase();
  if (!needle) return projects;
  return projects.filter(
    (project) =>
      project.name.toLowerCase().includes(needle) || (project.description ?? "").toLowerCase().includes(needle)
  );
}

export function summarizeProjects(dashboard: Dashboard): ProjectMetrics {
  const { projects, latestRuns } = dashboard;
  return {
    total: projects.length,
    active: projects.filter((project) => project.status === "draft" || project.status === "in_progress").length,
    done: projects.filter((project) => project.status === "done").length,
    withRuns: projects.filter((project) => latestRuns[project.id]).length,
  };
}

/**
 * One row per project with its latest run, newest first. A project without
 * a run sorts by its own update time.
 */
export function buildRecentRuns(dashboard: Dashboard, limit = RECENT_RUNS_LIMIT): RecentRun[] {
  return dashboard.projects
    .map((project) => ({ project, run: dashboard.latestRuns[project.id] ?? null }))
    .sort((a, b) => sortTime(b) - sortTime(a))
    .slice(0, limit);
}

function sortTime({ project, run }: RecentRun): number {
  return run?.startedAt ? timestampOf(run.startedAt) : timestampOf(project.updatedAt);
}

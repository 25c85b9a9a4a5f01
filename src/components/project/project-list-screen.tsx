"use client";

import { useStore } from "zustand";
import DeleteProjectButton from "@/components/project/delete-project-button";
import RecentRunsTable from "@/components/project/recent-runs-table";
import { ProjectStatusBadge } from "@/components/project/status-badge";
import ScreenStatus from "@/components/shell/screen-status";
import { useServices } from "@/components/shell/services";
import { useScreenController } from "@/components/shell/use-screen-controller";
import { Button } from "@/components/ui/button";
import { Input } from "@/components/ui/input";
import { ProjectListController } from "@/lib/controllers/project-list-controller";
import { buildRecentRuns, filterProjects, summarizeProjects } from "@/lib/dashboard";
import { formatDateTime } from "@/lib/format";

function Metric({ label, value }: { label: string; value: number }) {
  return (
    <div className="rounded-lg border border-gray-200 bg-white p-4">
      <div className="text-xs uppercase text-gray-500">{label}</div>
      <div className="text-2xl font-semibold" aria-label={label}>
        {value}
      </div>
    </div>
  );
}

/**
 * The signed-in user's projects: metrics, search, project cards and the
 * recent runs table.
 */
export default function ProjectListScreen() {
  const { shell, controllerDeps } = useServices();
  const controller = useScreenController(() => new ProjectListController(controllerDeps), [controllerDeps]);
  const state = useStore(controller.store);
  const query = useStore(controller.filter, (s) => s.query);

  const dashboard = state.data;
  const metrics = dashboard ? summarizeProjects(dashboard) : null;
  const busy = state.status === "loading";
  const openProject = (projectId: string) => shell.navigate({ name: "run-history", projectId });

  return (
    <div className="container mx-auto px-4 py-8">
      <div className="mb-6 flex items-center justify-between">
        <h1 className="text-2xl font-semibold">Projects</h1>
        <div className="flex gap-2">
          <Button variant="secondary" onClick={() => controller.refresh()} disabled={busy}>
            Refresh
          </Button>
          <Button onClick={() => shell.navigate({ name: "project-create" })}>New project</Button>
        </div>
      </div>

      <ScreenStatus state={state} onRetry={() => controller.retry()} loadingText="Loading projects..." />

      {dashboard && metrics && (
        <>
          <div className="mb-6 grid gap-4 sm:grid-cols-2 lg:grid-cols-4">
            <Metric label="Projects" value={metrics.total} />
            <Metric label="Active" value={metrics.active} />
            <Metric label="Done" value={metrics.done} />
            <Metric label="With runs" value={metrics.withRuns} />
          </div>

          <Input
            className="mb-4"
            placeholder="Search projects"
            aria-label="Search projects"
            value={query}
            onChange={(e) => controller.setQuery(e.target.value)}
          />

          {dashboard.projects.length === 0 ? (
            <p className="text-gray-500">No projects yet. Create one to get started.</p>
          ) : (
            <div className="mb-8 grid gap-4 sm:grid-cols-2 lg:grid-cols-3">
              {filterProjects(dashboard.projects, query).map((project) => (
                <div
                  key={project.id}
                  className="p-4 border border-gray-200 rounded-lg bg-white hover:shadow-md transition"
                  data-testid="project-card"
                >
                  <div className="flex items-start justify-between gap-2">
                    <div className="min-w-0">
                      <div className="text-lg font-medium truncate">{project.name}</div>
                      {project.description && (
                        <p className="text-sm text-gray-500 line-clamp-2">{project.description}</p>
                      )}
                    </div>
                    <ProjectStatusBadge status={project.status} />
                  </div>
                  <div className="mt-2 text-xs text-gray-500">Updated {formatDateTime(project.updatedAt)}</div>
                  <div className="mt-3 flex gap-2">
                    <Button size="sm" onClick={() => openProject(project.id)}>
                      Open
                    </Button>
                    <Button size="sm" variant="secondary" onClick={() => openProject(project.id)}>
                      Start processing
                    </Button>
                    <DeleteProjectButton
                      projectName={project.name}
                      disabled={busy}
                      onConfirm={() => controller.deleteProject(project.id)}
                    />
                  </div>
                </div>
              ))}
            </div>
          )}

          <RecentRunsTable rows={buildRecentRuns(dashboard)} onOpen={openProject} />
        </>
      )}
    </div>
  );
}

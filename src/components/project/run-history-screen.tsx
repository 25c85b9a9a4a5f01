"use client";

import { useStore } from "zustand";
import RunsTable from "@/components/project/runs-table";
import StartRunPanel from "@/components/project/start-run-panel";
import { ProjectStatusBadge } from "@/components/project/status-badge";
import ScreenStatus from "@/components/shell/screen-status";
import { useServices } from "@/components/shell/services";
import { useScreenController } from "@/components/shell/use-screen-controller";
import { Button } from "@/components/ui/button";
import { RunHistoryController } from "@/lib/controllers/run-history-controller";
import { formatDateTime } from "@/lib/format";

/**
 * One project: header, start-run panel and its processing runs.
 */
export default function RunHistoryScreen({ projectId }: { projectId: string }) {
  const { shell, controllerDeps } = useServices();
  const controller = useScreenController(
    () => new RunHistoryController(controllerDeps, projectId),
    [controllerDeps, projectId]
  );
  const state = useStore(controller.store);
  const formError = useStore(controller.form, (s) => s.formError);

  const history = state.data;
  const busy = state.status === "loading";

  return (
    <div className="container mx-auto px-4 py-8 space-y-6">
      <div className="flex items-center justify-between">
        <div className="min-w-0">
          <h1 className="text-2xl font-semibold truncate">{history?.project.name ?? "Project"}</h1>
          {history && (
            <div className="mt-1 flex items-center gap-2 text-xs text-gray-500">
              <ProjectStatusBadge status={history.project.status} />
              <span>Created {formatDateTime(history.project.createdAt)}</span>
            </div>
          )}
        </div>
        <div className="flex gap-2">
          <Button variant="secondary" onClick={() => shell.navigate({ name: "projects" })}>
            Back
          </Button>
          <Button variant="secondary" onClick={() => controller.refresh()} disabled={busy}>
            Refresh
          </Button>
        </div>
      </div>

      <ScreenStatus state={state} onRetry={() => controller.retry()} loadingText="Loading runs..." />

      {history && (
        <>
          {history.project.description && <p className="text-sm text-gray-700">{history.project.description}</p>}
          <StartRunPanel
            options={history.options}
            busy={busy}
            error={formError}
            onStart={(request) => controller.startRun(request)}
          />
          <RunsTable
            runs={history.runs.items}
            total={history.runs.total}
            busy={busy}
            onCancel={(runId) => controller.cancelRun(runId)}
          />
        </>
      )}
    </div>
  );
}

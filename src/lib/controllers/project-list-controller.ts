import { type StoreApi, createStore } from "zustand/vanilla";
import { type ControllerDeps, ScreenController } from "@/lib/screen-controller";
import type { Dashboard } from "@/lib/types";

export interface ProjectListFilter {
  query: string;
}

/**
 * Dashboard of the signed-in user's projects. Loaded on every activation.
 */
export class ProjectListController extends ScreenController<Dashboard> {
  readonly filter: StoreApi<ProjectListFilter>;

  constructor(deps: ControllerDeps) {
    super("projects", deps);
    this.filter = createStore<ProjectListFilter>(() => ({ query: "" }));
  }

  refresh(): void {
    this.load((api, signal) => api.getDashboard(signal), ["dashboard"]);
  }

  setQuery(query: string): void {
    this.filter.setState({ query });
  }

  deleteProject(projectId: string): void {
    this.mutate(
      (api, signal) => api.deleteProject(projectId, signal),
      () => this.refresh()
    );
  }

  protected override onActivate(): void {
    this.refresh();
  }

  protected override onDeactivate(): void {
    this.filter.setState({ query: "" });
  }
}

import { type StoreApi, createStore } from "zustand/vanilla";
import { firstIssue, projectForm } from "@/lib/forms";
import type { Route } from "@/lib/navigation";
import { type ControllerDeps, ScreenController } from "@/lib/screen-controller";
import type { Project } from "@/lib/types";

export interface ProjectDraft {
  name: string;
  description: string;
  video: File | null;
  startProcessing: boolean;
}

export interface ProjectCreateForm {
  formError: string | null;
}

export interface ProjectCreateDeps extends ControllerDeps {
  navigate: (route: Route) => void;
}

export class ProjectCreateController extends ScreenController<Project> {
  readonly form: StoreApi<ProjectCreateForm>;

  constructor(private readonly createDeps: ProjectCreateDeps) {
    super("project-create", createDeps);
    this.form = createStore<ProjectCreateForm>(() => ({ formError: null }));
  }

  /**
   * Validate and upload. On success the new project's run history opens.
   */
  submit(draft: ProjectDraft): void {
    const parsed = projectForm.safeParse(draft);
    if (!parsed.success) {
      this.form.setState({ formError: firstIssue(parsed.error) });
      return;
    }
    this.form.setState({ formError: null });
    this.mutate(
      (api, signal) => api.createProject(parsed.data, signal),
      (project, requestId) => {
        this.settle(requestId, project);
        this.createDeps.navigate(project.id ? { name: "run-history", projectId: project.id } : { name: "projects" });
      }
    );
  }

  cancel(): void {
    this.createDeps.navigate({ name: "projects" });
  }

  protected override onDeactivate(): void {
    this.form.setState({ formError: null });
  }
}

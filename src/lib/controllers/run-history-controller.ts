import { type StoreApi, createStore } from "zustand/vanilla";
import { type ControllerDeps, ScreenController } from "@/lib/screen-controller";
import type { AudioProvider, Page, ProcessingMode, ProcessingOptions, Project, Run, StartRunOptions } from "@/lib/types";

export interface RunHistory {
  project: Project;
  runs: Page<Run>;
  options: ProcessingOptions;
}

export interface RunRequest {
  processingMode: ProcessingMode;
  model: string;
  detector: string;
  audioProvider: string;
}

export interface RunHistoryForm {
  formError: string | null;
}

export const RUN_HISTORY_PAGE_SIZE = 20;

export function usesVideo(mode: ProcessingMode): boolean {
  return mode === "video_only" || mode === "audio_and_video";
}

export function usesAudio(mode: ProcessingMode): boolean {
  return mode === "audio_only" || mode === "audio_and_video";
}

/**
 * Audio providers offered for a processing mode. Combined runs prefer
 * providers marked as video providers, falling back to any that support
 * video.
 */
export function providersFor(mode: ProcessingMode, providers: AudioProvider[]): AudioProvider[] {
  switch (mode) {
    case "audio_and_video": {
      const marked = providers.filter((provider) => provider.isVideoProvider);
      return marked.length > 0 ? marked : providers.filter((provider) => provider.supportsVideo);
    }
    case "audio_only":
      return providers.filter((provider) => provider.supportsAudio);
    case "video_only":
      return providers.filter((provider) => provider.supportsAudio || provider.supportsVideo);
  }
}

/**
 * Check a run request against the loaded options and build what is sent.
 * Returns an error message instead when something required is missing.
 */
export function buildStartOptions(
  request: RunRequest,
  providers: AudioProvider[]
): { options: StartRunOptions } | { error: string } {
  const mode = request.processingMode;
  const model = request.model.trim();
  const detector = request.detector.trim().toLowerCase();
  const audioProvider = request.audioProvider.trim().toLowerCase();

  if (usesVideo(mode) && !model) return { error: "Choose a model to start processing." };
  if (usesVideo(mode) && !detector) return { error: "Choose a face detector to start processing." };
  if (usesAudio(mode)) {
    const compatible = providersFor(mode, providers);
    if (!audioProvider || !compatible.some((provider) => provider.code === audioProvider)) {
      return { error: "No compatible audio provider for the selected mode." };
    }
  }

  const options: StartRunOptions = { launchMode: "immediate", processingMode: mode };
  if (usesVideo(mode)) {
    options.model = model;
    options.detector = detector;
  }
  if (usesAudio(mode)) options.audioProvider = audioProvider;
  return { options };
}

/**
 * One project's processing runs, with start and cancel.
 */
export class RunHistoryController extends ScreenController<RunHistory> {
  readonly form: StoreApi<RunHistoryForm>;

  constructor(
    deps: ControllerDeps,
    readonly projectId: string
  ) {
    super("run-history", deps);
    this.form = createStore<RunHistoryForm>(() => ({ formError: null }));
  }

  refresh(): void {
    const projectId = this.projectId;
    this.load(
      async (api, signal) => {
        const [project, runs, options] = await Promise.all([
          api.getProject(projectId, signal),
          api.listRuns(projectId, { limit: RUN_HISTORY_PAGE_SIZE }, signal),
          api.getProcessingOptions(signal),
        ]);
        return { project, runs, options };
      },
      ["run-history", projectId]
    );
  }

  startRun(request: RunRequest): void {
    const providers = this.state.data?.options.audioProviders ?? [];
    const built = buildStartOptions(request, providers);
    if ("error" in built) {
      this.form.setState({ formError: built.error });
      return;
    }
    this.form.setState({ formError: null });
    this.mutate(
      (api, signal) => api.startRun(this.projectId, built.options, signal),
      () => this.refresh()
    );
  }

  cancelRun(runId: string): void {
    this.mutate(
      (api, signal) => api.cancelRun(this.projectId, runId, signal),
      () => this.refresh()
    );
  }

  protected override onActivate(): void {
    this.refresh();
  }

  protected override onDeactivate(): void {
    this.form.setState({ formError: null });
  }
}

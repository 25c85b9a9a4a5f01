import { AuthError, type ClientError } from "@/lib/errors";
import type { GmeService, NewProject, PageParams, SignIn } from "@/lib/gme-api";
import type {
  ClientSession,
  Dashboard,
  Page,
  ProcessingOptions,
  Project,
  Registration,
  Run,
  StartRunOptions,
  UserProfile,
} from "@/lib/types";

type Method = keyof GmeService;

export const TEST_USER: UserProfile = {
  id: "1",
  login: "alice",
  email: "alice@example.com",
  role: "user",
  isActive: true,
  displayName: "Alice Doe",
  createdAt: "2024-01-01T10:00:00Z",
};

export const TEST_PASSWORD = "test-password";

export function makeProject(overrides: Partial<Project> = {}): Project {
  return {
    id: "p1",
    creatorId: "1",
    name: "Interview",
    description: null,
    status: "draft",
    videoReference: null,
    createdAt: "2024-03-01T09:00:00Z",
    updatedAt: "2024-03-01T09:00:00Z",
    ...overrides,
  };
}

export function makeRun(overrides: Partial<Run> = {}): Run {
  return {
    id: "r1",
    projectId: "p1",
    startedAt: "2024-03-02T09:00:00Z",
    status: "completed",
    resultSummary: null,
    provider: null,
    launchMode: "immediate",
    videoTaskId: null,
    updatedAt: null,
    completedAt: null,
    ...overrides,
  };
}

/**
 * In-memory stand-in for the app server. Keeps projects and runs, accepts
 * one login, and can be told to fail or stall a given method.
 */
export class FakeGmeService implements GmeService {
  session: ClientSession | null = null;
  projects: Project[] = [];
  runs: Run[] = [];
  options: ProcessingOptions = {
    models: ["base-model"],
    detectors: ["retinaface"],
    audioProviders: [
      { code: "whisper", title: "Whisper", supportsAudio: true, supportsVideo: false, isVideoProvider: false },
    ],
  };
  readonly calls: { method: Method; args: unknown[] }[] = [];
  private readonly failures = new Map<Method, ClientError[]>();
  private readonly stalls = new Set<Method>();
  private counter = 0;

  /** Make the next call(s) of `method` fail with `error`. */
  failNext(method: Method, error: ClientError, times = 1): void {
    const queue = this.failures.get(method) ?? [];
    for (let i = 0; i < times; i++) queue.push(error);
    this.failures.set(method, queue);
  }

  /** Calls of `method` never settle until aborted. */
  stall(method: Method): void {
    this.stalls.add(method);
  }

  callsOf(method: Method): unknown[][] {
    return this.calls.filter((call) => call.method === method).map((call) => call.args);
  }

  getSession(signal?: AbortSignal): Promise<ClientSession | null> {
    return this.answer("getSession", [], signal, () => this.session);
  }

  login(input: SignIn, signal?: AbortSignal): Promise<ClientSession> {
    return this.answer("login", [input], signal, () => {
      if (input.login !== TEST_USER.login || input.password !== TEST_PASSWORD) {
        throw new AuthError("Invalid login or password");
      }
      this.session = { user: TEST_USER, remembered: input.remember };
      return this.session;
    });
  }

  register(input: Registration, signal?: AbortSignal): Promise<ClientSession> {
    return this.answer("register", [input], signal, () => {
      this.session = { user: { ...TEST_USER, login: input.login, displayName: null }, remembered: true };
      return this.session;
    });
  }

  logout(signal?: AbortSignal): Promise<void> {
    return this.answer("logout", [], signal, () => {
      this.session = null;
    });
  }

  getDashboard(signal?: AbortSignal): Promise<Dashboard> {
    return this.answer("getDashboard", [], signal, () => {
      const latestRuns: Record<string, Run | null> = {};
      for (const project of this.projects) {
        latestRuns[project.id] = this.runs.find((run) => run.projectId === project.id) ?? null;
      }
      return { projects: [...this.projects], latestRuns };
    });
  }

  listProjects(params: PageParams & { q?: string } = {}, signal?: AbortSignal): Promise<Page<Project>> {
    return this.answer("listProjects", [params], signal, () => page(this.projects, params));
  }

  getProject(projectId: string, signal?: AbortSignal): Promise<Project> {
    return this.answer("getProject", [projectId], signal, () => this.project(projectId));
  }

  createProject(input: NewProject, signal?: AbortSignal): Promise<Project> {
    return this.answer("createProject", [input], signal, () => {
      const project = makeProject({
        id: `p${++this.counter + 100}`,
        name: input.name.trim(),
        description: input.description.trim() || null,
        videoReference: input.video ? `uploads/${input.video.name}` : null,
      });
      this.projects.unshift(project);
      return project;
    });
  }

  deleteProject(projectId: string, signal?: AbortSignal): Promise<void> {
    return this.answer("deleteProject", [projectId], signal, () => {
      this.projects = this.projects.filter((project) => project.id !== projectId);
    });
  }

  listRuns(projectId: string, params: PageParams = {}, signal?: AbortSignal): Promise<Page<Run>> {
    return this.answer("listRuns", [projectId, params], signal, () =>
      page(
        this.runs.filter((run) => run.projectId === projectId),
        params
      )
    );
  }

  startRun(projectId: string, options: StartRunOptions, signal?: AbortSignal): Promise<Run> {
    return this.answer("startRun", [projectId, options], signal, () => {
      const run = makeRun({
        id: `r${++this.counter + 100}`,
        projectId,
        status: "started",
        provider: options.audioProvider ?? null,
        launchMode: options.launchMode ?? "immediate",
      });
      this.runs.unshift(run);
      return run;
    });
  }

  cancelRun(projectId: string, runId: string, signal?: AbortSignal): Promise<Run> {
    return this.answer("cancelRun", [projectId, runId], signal, () => {
      const run = this.runs.find((item) => item.id === runId && item.projectId === projectId);
      if (!run) throw new Error(`unknown run ${runId}`);
      run.status = "cancelled";
      return run;
    });
  }

  getProcessingOptions(signal?: AbortSignal): Promise<ProcessingOptions> {
    return this.answer("getProcessingOptions", [], signal, () => this.options);
  }

  private project(projectId: string): Project {
    const project = this.projects.find((item) => item.id === projectId);
    if (!project) throw new Error(`unknown project ${projectId}`);
    return project;
  }

  private answer<T>(method: Method, args: unknown[], signal: AbortSignal | undefined, produce: () => T): Promise<T> {
    this.calls.push({ method, args });
    const failure = this.failures.get(method)?.shift();
    if (failure) return Promise.reject(failure);
    if (this.stalls.has(method)) {
      return new Promise<T>((_resolve, reject) => {
        signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });
    }
    return new Promise<T>((resolve, reject) => {
      setTimeout(() => {
        try {
          resolve(produce());
        } catch (error: unknown) {
          reject(error);
        }
      }, 0);
    });
  }
}

function page<T>(items: T[], { limit = 100, offset = 0 }: PageParams): Page<T> {
  return { items: items.slice(offset, offset + limit), total: items.length, limit, offset };
}

import { type StoreApi, createStore } from "zustand/vanilla";
import type { DispatchMessage, RequestDispatcher, RequestKind, ScreenScope } from "./dispatcher";
import { type ClientError, isAuthError } from "./errors";
import type { GmeService } from "./gme-api";
import { logStateTransition } from "./logger";

export type ScreenStatus = "idle" | "loading" | "loaded" | "error";

export interface ScreenState<D> {
  status: ScreenStatus;
  /** Last loaded data; kept while reloading and after a failure. */
  data: D | null;
  error: ClientError | null;
  /** Request whose answer the screen is waiting for. */
  pendingRequestId: number | null;
}

export type ScreenEvent<D> =
  | { type: "start"; requestId: number }
  | { type: "resolved"; requestId: number; data: D }
  | { type: "failed"; requestId: number; error: ClientError };

export function initialScreenState<D>(): ScreenState<D> {
  return { status: "idle", data: null, error: null, pendingRequestId: null };
}

/**
 * idle/loaded/error -> loading on start; loading -> loaded or error on the
 * answer to the pending request. Answers to any other request are ignored.
 */
export function screenReducer<D>(state: ScreenState<D>, event: ScreenEvent<D>): ScreenState<D> {
  switch (event.type) {
    case "start":
      return { ...state, status: "loading", error: null, pendingRequestId: event.requestId };
    case "resolved":
      if (state.status !== "loading" || state.pendingRequestId !== event.requestId) return state;
      return { status: "loaded", data: event.data, error: null, pendingRequestId: null };
    case "failed":
      if (state.status !== "loading" || state.pendingRequestId !== event.requestId) return state;
      return { ...state, status: "error", error: event.error, pendingRequestId: null };
  }
}

export interface ControllerDeps {
  api: GmeService;
  dispatcher: RequestDispatcher;
  /** Called on any `AuthError`; the shell signs the user out. */
  onAuthFailure: () => void;
}

type Operation<T> = (api: GmeService, signal: AbortSignal | undefined) => Promise<T>;

/**
 * Base of every screen controller: one state machine in a zustand store,
 * one dispatcher scope per activation, and the last load kept for `retry()`.
 * Writes are not repeated by `retry()`; it reloads instead.
 */
export abstract class ScreenController<D> {
  readonly store: StoreApi<ScreenState<D>>;
  private scope: ScreenScope | null = null;
  private lastLoad: (() => void) | null = null;

  constructor(
    readonly screen: string,
    protected readonly deps: ControllerDeps
  ) {
    this.store = createStore<ScreenState<D>>(() => initialScreenState<D>());
  }

  get state(): ScreenState<D> {
    return this.store.getState();
  }

  get isActive(): boolean {
    return this.scope?.isActive ?? false;
  }

  activate(): void {
    if (this.isActive) return;
    this.scope = this.deps.dispatcher.openScope(this.screen);
    this.onActivate();
  }

  /**
   * Close the scope; anything still in flight is dropped. The screen's state
   * is reset so nothing carries over into the next activation.
   */
  deactivate(): void {
    this.scope?.close();
    this.scope = null;
    this.lastLoad = null;
    this.store.setState(initialScreenState<D>(), true);
    this.onDeactivate();
  }

  retry(): void {
    this.lastLoad?.();
  }

  protected onActivate(): void {}

  protected onDeactivate(): void {}

  protected transition(event: ScreenEvent<D>): void {
    const before = this.store.getState();
    const after = screenReducer(before, event);
    if (after === before) return;
    this.store.setState(after, true);
    logStateTransition(this.screen, before.status, after.status);
  }

  /**
   * Load the screen's data. Remembered for `retry()`.
   */
  protected load(operation: Operation<D>, key: readonly unknown[] = []): void {
    this.lastLoad = () => this.load(operation, key);
    this.start("read", operation, key, (data, requestId) => this.settle(requestId, data));
  }

  /**
   * Send a write, then hand its result to `onSuccess`, which usually reloads.
   */
  protected mutate<T>(operation: Operation<T>, onSuccess: (value: T, requestId: number) => void): number | null {
    return this.start("write", operation, [], onSuccess);
  }

  /** Resolve the pending request with freshly built data. */
  protected settle(requestId: number, data: D): void {
    this.transition({ type: "resolved", requestId, data });
  }

  private start<T>(
    kind: RequestKind,
    operation: Operation<T>,
    key: readonly unknown[],
    onSuccess: (value: T, requestId: number) => void
  ): number | null {
    const scope = this.scope;
    if (!scope) return null;
    const requestId = this.deps.dispatcher.dispatch(
      scope,
      (signal) => operation(this.deps.api, signal),
      (message: DispatchMessage<T>) => {
        if (message.type === "resolved") {
          onSuccess(message.value, message.requestId);
        } else {
          this.fail(message.requestId, message.error);
        }
      },
      { kind, key }
    );
    if (requestId !== null) this.transition({ type: "start", requestId });
    return requestId;
  }

  private fail(requestId: number, error: ClientError): void {
    this.transition({ type: "failed", requestId, error });
    if (isAuthError(error)) this.deps.onAuthFailure();
  }
}

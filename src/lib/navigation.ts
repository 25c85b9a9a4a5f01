import { type StoreApi, createStore } from "zustand/vanilla";
import { isAuthError } from "./errors";
import type { GmeService } from "./gme-api";
import { logInfo, logWarning } from "./logger";
import type { ClientSession } from "./types";
import { errorMessage } from "./utils";

export type Route =
  | { name: "login" }
  | { name: "projects" }
  | { name: "project-create" }
  | { name: "run-history"; projectId: string };

export interface ShellState {
  phase: "restoring" | "ready";
  session: ClientSession | null;
  route: Route;
  /** One-off message for the login screen. */
  notice: string | null;
}

export const SESSION_EXPIRED_NOTICE = "Session expired. Please sign in again.";
export const SIGNED_OUT_NOTICE = "You have signed out.";
export const SESSION_ENDED_NOTICE = "Session ended. Please sign in again.";

/**
 * Where a request for `requested` actually lands: nobody signed in always
 * sees the login screen, and a signed-in user is never sent there.
 */
export function resolveRoute(session: ClientSession | null, requested: Route): Route {
  if (!session) return { name: "login" };
  if (requested.name === "login") return { name: "projects" };
  return requested;
}

/**
 * Owns the single client session and decides which screen is showing.
 */
export class NavigationShell {
  readonly store: StoreApi<ShellState>;

  constructor(private readonly api: GmeService) {
    this.store = createStore<ShellState>(() => ({
      phase: "restoring",
      session: null,
      route: { name: "login" },
      notice: null,
    }));
  }

  get state(): ShellState {
    return this.store.getState();
  }

  /**
   * Restore a persisted session, if any, and show the first screen.
   */
  async bootstrap(): Promise<void> {
    this.store.setState({ phase: "restoring" });
    try {
      const session = await this.api.getSession();
      if (session) logInfo("Session restored", { login: session.user.login });
      this.show(session, { name: "projects" }, null);
    } catch (error: unknown) {
      const notice = isAuthError(error) ? SESSION_EXPIRED_NOTICE : errorMessage(error);
      this.show(null, { name: "login" }, notice);
    }
  }

  signedIn(session: ClientSession): void {
    this.show(session, { name: "projects" }, null);
  }

  navigate(route: Route): void {
    const { session } = this.store.getState();
    this.store.setState({ route: resolveRoute(session, route), notice: null });
  }

  async logout(): Promise<void> {
    try {
      await this.api.logout();
    } catch (error: unknown) {
      logWarning(`Sign-out request failed: ${errorMessage(error)}`);
    }
    this.show(null, { name: "login" }, SIGNED_OUT_NOTICE);
  }

  /**
   * The server has already dropped the session cookies by the time an
   * `AuthError` arrives; the shell forgets the user and shows login.
   */
  handleAuthFailure(): void {
    if (!this.store.getState().session) return;
    logWarning("Session rejected by the server; returning to sign-in");
    this.show(null, { name: "login" }, SESSION_ENDED_NOTICE);
  }

  dismissNotice(): void {
    this.store.setState({ notice: null });
  }

  private show(session: ClientSession | null, route: Route, notice: string | null): void {
    this.store.setState({ phase: "ready", session, route: resolveRoute(session, route), notice });
  }
}

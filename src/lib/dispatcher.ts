import type { QueryClient } from "@tanstack/react-query";
import { type ClientError, isTransientError } from "./errors";
import { toClientError } from "./http-errors";
import { logDiscardedResult, logWarning } from "./logger";

export type DispatchMessage<T> =
  | { type: "resolved"; requestId: number; value: T }
  | { type: "rejected"; requestId: number; error: ClientError };

export type RequestKind = "read" | "write";

export interface RetryPolicy {
  retryAttempts: number;
  retryDelayMs: number;
}

/**
 * Cancellation token tied to one activation of a screen.
 */
export interface ScreenScope {
  readonly id: string;
  readonly screen: string;
  readonly isActive: boolean;
  close(): void;
}

export interface DispatchOptions {
  kind: RequestKind;
  /** Extra query key parts, for reads. */
  key?: readonly unknown[];
}

/**
 * Delay before retry number `attempt` (1-based).
 */
export function retryDelay(policy: RetryPolicy, attempt: number): number {
  return policy.retryDelayMs * 2 ** (attempt - 1);
}

/**
 * Runs background requests for the screens and posts exactly one message per
 * request back to the screen that asked, as long as that screen is still
 * open. Reads go through the react-query client so that closing a screen
 * cancels them; writes run to completion but their result is dropped.
 */
export class RequestDispatcher {
  private scopeCounter = 0;
  private requestCounter = 0;

  constructor(
    private readonly queryClient: QueryClient,
    private readonly policy: RetryPolicy
  ) {}

  openScope(screen: string): ScreenScope {
    const id = `${screen}#${++this.scopeCounter}`;
    const queryClient = this.queryClient;
    let active = true;
    return {
      id,
      screen,
      get isActive() {
        return active;
      },
      close() {
        if (!active) return;
        active = false;
        void queryClient.cancelQueries({ queryKey: [id] });
        queryClient.removeQueries({ queryKey: [id] });
      },
    };
  }

  /**
   * Start `request` in the background. Returns the request id the message
   * will carry, or null when the scope is already closed.
   */
  dispatch<T>(
    scope: ScreenScope,
    request: (signal: AbortSignal | undefined) => Promise<T>,
    deliver: (message: DispatchMessage<T>) => void,
    options: DispatchOptions
  ): number | null {
    if (!scope.isActive) {
      logWarning("Request not dispatched: screen already closed", { screen: scope.screen });
      return null;
    }
    const requestId = ++this.requestCounter;
    const pending = options.kind === "read" ? this.read(scope, requestId, request, options.key ?? []) : request(undefined);

    pending.then(
      (value) => {
        if (!scope.isActive) {
          logDiscardedResult(scope.screen, requestId);
          return;
        }
        deliver({ type: "resolved", requestId, value });
      },
      (error: unknown) => {
        if (!scope.isActive) {
          logDiscardedResult(scope.screen, requestId);
          return;
        }
        deliver({
          type: "rejected",
          requestId,
          error: toClientError(error, { service: scope.screen, timeoutMs: 0 }),
        });
      }
    );
    return requestId;
  }

  private read<T>(
    scope: ScreenScope,
    requestId: number,
    request: (signal: AbortSignal | undefined) => Promise<T>,
    key: readonly unknown[]
  ): Promise<T> {
    const { retryAttempts } = this.policy;
    return this.queryClient.fetchQuery({
      queryKey: [scope.id, ...key, requestId],
      queryFn: ({ signal }) => request(signal),
      staleTime: 0,
      gcTime: 0,
      retry: (failureCount, error) => failureCount < retryAttempts && isTransientError(error),
      retryDelay: (failureCount) => retryDelay(this.policy, failureCount + 1),
    });
  }
}

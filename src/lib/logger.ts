/**
 * Targeted logging helpers. Only key events are logged: screen state
 * transitions, failed backend calls, discarded results and the occasional
 * warning. Used on both the server and the browser side.
 */

type LogLevel = "INFO" | "WARN" | "ERROR";

export interface LogContext {
  screen?: string;
  endpoint?: string;
  [key: string]: unknown;
}

export function formatLog(level: LogLevel, message: string, context?: LogContext): string {
  const timestamp = new Date().toISOString();
  const contextStr = context ? ` ${JSON.stringify(context)}` : "";
  return `[${timestamp}] [${level}]${contextStr} ${message}`;
}

export function logInfo(message: string, context?: LogContext): void {
  console.info(formatLog("INFO", message, context));
}

export function logWarning(message: string, context?: LogContext): void {
  console.warn(formatLog("WARN", message, context));
}

/**
 * Log a screen controller moving from one state to another.
 */
export function logStateTransition(screen: string, fromStatus: string, toStatus: string): void {
  if (fromStatus === toStatus) return;
  console.info(
    formatLog("INFO", `${screen} transitioned: ${fromStatus} → ${toStatus}`, {
      screen,
      fromStatus,
      toStatus,
    })
  );
}

/**
 * Log a failed call to one of the backend services (or to the app's own
 * routes, from the browser side).
 */
export function logBackendError(endpoint: string, error: unknown, context?: LogContext): void {
  const errorMessage = error instanceof Error ? error.message : String(error);
  console.error(formatLog("ERROR", `Backend error at ${endpoint}: ${errorMessage}`, { ...context, endpoint }));
}

/**
 * Log a result that arrived after its screen was closed.
 */
export function logDiscardedResult(screen: string, requestId: number): void {
  console.info(formatLog("INFO", `Discarded result of request #${requestId}`, { screen, requestId }));
}

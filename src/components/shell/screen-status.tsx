"use client";

import { Button } from "@/components/ui/button";
import type { ScreenState } from "@/lib/screen-controller";

/**
 * Loading line or error banner for a screen. The banner offers Retry,
 * which reloads the screen.
 */
export default function ScreenStatus<D>({
  state,
  onRetry,
  loadingText = "Loading...",
}: {
  state: ScreenState<D>;
  onRetry: () => void;
  loadingText?: string;
}) {
  if (state.status === "error" && state.error) {
    return (
      <div role="alert" className="mb-4 flex items-center justify-between gap-4 rounded-md border border-red-200 bg-red-50 p-3 text-sm text-red-800">
        <span>{state.error.message}</span>
        <Button size="sm" variant="secondary" onClick={onRetry}>
          Retry
        </Button>
      </div>
    );
  }
  if (state.status === "loading" || (state.status === "idle" && state.data === null)) {
    return <p className="mb-4 text-sm text-gray-500">{loadingText}</p>;
  }
  return null;
}

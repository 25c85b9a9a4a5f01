"use client";

import { cn } from "@/lib/utils";

export function Separator({ className, vertical = false }: { className?: string; vertical?: boolean }) {
  return (
    <div
      role="separator"
      aria-orientation={vertical ? "vertical" : "horizontal"}
      className={cn(vertical ? "mx-2 h-5 w-px bg-gray-600" : "my-4 h-px w-full bg-gray-200", className)}
    />
  );
}

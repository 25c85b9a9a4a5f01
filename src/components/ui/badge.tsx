"use client";

import React from "react";
import { cn } from "@/lib/utils";

export type BadgeTone = "neutral" | "info" | "success" | "warning" | "danger";

export interface BadgeProps extends React.HTMLAttributes<HTMLSpanElement> {
  tone?: BadgeTone;
}

const TONES: Record<BadgeTone, string> = {
  neutral: "bg-gray-200 text-gray-800",
  info: "bg-blue-100 text-blue-800",
  success: "bg-green-100 text-green-800",
  warning: "bg-amber-100 text-amber-800",
  danger: "bg-red-100 text-red-800",
};

/**
 * Small status label.
 */
export const Badge = React.forwardRef<HTMLSpanElement, BadgeProps>(
  function Badge({ className, tone = "neutral", ...props }, ref) {
    return (
      <span
        ref={ref}
        className={cn("inline-block rounded-md px-2 py-1 text-xs font-semibold", TONES[tone], className)}
        {...props}
      />
    );
  }
);

"use client";

import React from "react";
import { cn } from "@/lib/utils";

export type TextareaProps = React.TextareaHTMLAttributes<HTMLTextAreaElement>;

export const Textarea = React.forwardRef<HTMLTextAreaElement, TextareaProps>(
  function Textarea({ className, rows = 3, ...props }, ref) {
    return (
      <textarea
        ref={ref}
        rows={rows}
        className={cn(
          "w-full resize-y rounded-md border border-gray-300 p-2 text-sm",
          "focus:outline-none focus:ring focus:border-blue-500",
          className
        )}
        {...props}
      />
    );
  }
);

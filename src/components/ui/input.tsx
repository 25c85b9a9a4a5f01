"use client";

import React from "react";
import { cn } from "@/lib/utils";

export interface InputProps extends React.InputHTMLAttributes<HTMLInputElement> {
  invalid?: boolean;
}

/**
 * Text input; `invalid` marks it for assistive technology and outlines it
 * in red.
 */
export const Input = React.forwardRef<HTMLInputElement, InputProps>(
  function Input({ className, invalid = false, ...props }, ref) {
    return (
      <input
        ref={ref}
        aria-invalid={invalid || undefined}
        className={cn(
          "w-full rounded-md border p-2 text-sm",
          "focus:outline-none focus:ring focus:border-blue-500",
          invalid ? "border-red-500" : "border-gray-300",
          className
        )}
        {...props}
      />
    );
  }
);

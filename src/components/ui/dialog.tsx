"use client";

import React, { createContext, useContext, useEffect, useId, useState } from "react";
import { cn } from "@/lib/utils";
import { Button, type ButtonProps } from "./button";

interface DialogContextValue {
  open: boolean;
  setOpen: (open: boolean) => void;
  titleId: string;
}

const DialogContext = createContext<DialogContextValue | undefined>(undefined);

function useDialog(component: string): DialogContextValue {
  const context = useContext(DialogContext);
  if (!context) throw new Error(`${component} must be used within Dialog`);
  return context;
}

/**
 * Provides dialog state to its children. With `open` given the dialog
 * follows it; `onOpenChange` fires on every change either way.
 */
export function Dialog({
  open,
  onOpenChange,
  children,
}: {
  open?: boolean;
  onOpenChange?: (open: boolean) => void;
  children: React.ReactNode;
}) {
  const [internalOpen, setInternalOpen] = useState(open ?? false);
  const titleId = useId();

  useEffect(() => {
    if (open !== undefined) setInternalOpen(open);
  }, [open]);

  const setOpen = (next: boolean) => {
    setInternalOpen(next);
    onOpenChange?.(next);
  };

  return <DialogContext.Provider value={{ open: internalOpen, setOpen, titleId }}>{children}</DialogContext.Provider>;
}

/**
 * Button that opens the dialog.
 */
export const DialogTrigger = React.forwardRef<HTMLButtonElement, ButtonProps>(function DialogTrigger(
  { onClick, ...props },
  ref
) {
  const context = useDialog("DialogTrigger");
  return (
    <Button
      ref={ref}
      onClick={(e) => {
        context.setOpen(true);
        onClick?.(e);
      }}
      {...props}
    />
  );
});

/**
 * Modal panel, rendered only while open. A click on the backdrop closes it.
 */
export const DialogContent = React.forwardRef<HTMLDivElement, React.HTMLAttributes<HTMLDivElement>>(
  function DialogContent({ children, className, ...props }, ref) {
    const context = useDialog("DialogContent");
    if (!context.open) return null;
    return (
      <div
        className="fixed inset-0 z-50 flex items-center justify-center bg-black/50"
        onClick={() => context.setOpen(false)}
      >
        <div
          ref={ref}
          role="dialog"
          aria-modal="true"
          aria-labelledby={context.titleId}
          className={cn("w-full max-w-md rounded-md bg-white p-4 shadow-lg", className)}
          onClick={(e) => e.stopPropagation()}
          {...props}
        >
          {children}
        </div>
      </div>
    );
  }
);

export function DialogHeader({ children }: { children: React.ReactNode }) {
  return <div className="mb-3">{children}</div>;
}

export function DialogTitle({ children }: { children: React.ReactNode }) {
  const context = useDialog("DialogTitle");
  return (
    <h2 id={context.titleId} className="text-lg font-semibold">
      {children}
    </h2>
  );
}

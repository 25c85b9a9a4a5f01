"use client";

import React, { createContext, useContext, useState } from "react";
import { cn } from "@/lib/utils";

interface TabsContextValue {
  value: string;
  setValue: (value: string) => void;
}

const TabsContext = createContext<TabsContextValue | undefined>(undefined);

function useTabs(component: string): TabsContextValue {
  const context = useContext(TabsContext);
  if (!context) throw new Error(`${component} must be used within Tabs`);
  return context;
}

/**
 * Root of a tab set. Controlled when `value` is given, otherwise it keeps
 * its own selection starting at `defaultValue`.
 */
export function Tabs({
  value,
  defaultValue = "",
  onValueChange,
  children,
}: {
  value?: string;
  defaultValue?: string;
  onValueChange?: (value: string) => void;
  children: React.ReactNode;
}) {
  const [internalValue, setInternalValue] = useState(defaultValue);
  const current = value ?? internalValue;
  const setValue = (next: string) => {
    setInternalValue(next);
    onValueChange?.(next);
  };
  return <TabsContext.Provider value={{ value: current, setValue }}>{children}</TabsContext.Provider>;
}

export function TabsList({ children, label }: { children: React.ReactNode; label?: string }) {
  return (
    <div role="tablist" aria-label={label} className="mb-4 flex gap-2 border-b border-gray-200">
      {children}
    </div>
  );
}

export function TabsTrigger({ value, children }: { value: string; children: React.ReactNode }) {
  const context = useTabs("TabsTrigger");
  const isActive = context.value === value;
  return (
    <button
      type="button"
      role="tab"
      aria-selected={isActive}
      onClick={() => context.setValue(value)}
      className={cn(
        "px-3 py-1 text-sm font-medium border-b-2",
        isActive ? "border-blue-600 text-blue-700" : "border-transparent text-gray-600"
      )}
    >
      {children}
    </button>
  );
}

/**
 * Renders its children only while its tab is selected.
 */
export function TabsContent({
  value,
  children,
  className,
}: {
  value: string;
  children: React.ReactNode;
  className?: string;
}) {
  const context = useTabs("TabsContent");
  if (context.value !== value) return null;
  return (
    <div role="tabpanel" className={className}>
      {children}
    </div>
  );
}

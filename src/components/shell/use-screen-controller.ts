"use client";

import { type DependencyList, useEffect, useMemo } from "react";

interface Activatable {
  activate(): void;
  deactivate(): void;
}

/**
 * Build a controller for a mounted screen. It is active exactly while the
 * component is mounted, so results arriving after unmount are dropped.
 */
export function useScreenController<C extends Activatable>(create: () => C, deps: DependencyList): C {
  const controller = useMemo(create, deps);
  useEffect(() => {
    controller.activate();
    return () => controller.deactivate();
  }, [controller]);
  return controller;
}

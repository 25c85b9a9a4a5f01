"use client";

import { createContext, useContext } from "react";
import type { QueryClient } from "@tanstack/react-query";
import { RequestDispatcher } from "@/lib/dispatcher";
import { GmeApi, type GmeService } from "@/lib/gme-api";
import { NavigationShell } from "@/lib/navigation";
import type { ControllerDeps } from "@/lib/screen-controller";
import type { ClientSettings } from "@/lib/types";

export interface Services {
  api: GmeService;
  dispatcher: RequestDispatcher;
  shell: NavigationShell;
  /** What every screen controller is built with. */
  controllerDeps: ControllerDeps;
}

export function createServices(settings: ClientSettings, queryClient: QueryClient, api?: GmeService): Services {
  const service = api ?? new GmeApi(settings);
  const dispatcher = new RequestDispatcher(queryClient, settings);
  const shell = new NavigationShell(service);
  return {
    api: service,
    dispatcher,
    shell,
    controllerDeps: { api: service, dispatcher, onAuthFailure: () => shell.handleAuthFailure() },
  };
}

export const ServicesContext = createContext<Services | undefined>(undefined);

export function useServices(): Services {
  const services = useContext(ServicesContext);
  if (!services) throw new Error("useServices must be used within AppShell");
  return services;
}

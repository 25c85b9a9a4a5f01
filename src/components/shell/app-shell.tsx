"use client";

import { useEffect, useState } from "react";
import { useQueryClient } from "@tanstack/react-query";
import { useStore } from "zustand";
import AuthScreen from "@/components/auth/auth-screen";
import TopBar from "@/components/nav/topbar";
import ProjectCreateScreen from "@/components/project/project-create-screen";
import ProjectListScreen from "@/components/project/project-list-screen";
import RunHistoryScreen from "@/components/project/run-history-screen";
import type { GmeService } from "@/lib/gme-api";
import type { Route } from "@/lib/navigation";
import type { ClientSettings } from "@/lib/types";
import { ServicesContext, createServices } from "./services";

function Screen({ route }: { route: Route }) {
  switch (route.name) {
    case "login":
      return <AuthScreen />;
    case "projects":
      return <ProjectListScreen />;
    case "project-create":
      return <ProjectCreateScreen />;
    case "run-history":
      return <RunHistoryScreen key={route.projectId} projectId={route.projectId} />;
  }
}

/**
 * The whole client: restores the session once, then shows whichever screen
 * the navigation shell has chosen. `api` replaces the HTTP client in tests.
 */
export default function AppShell({ settings, api }: { settings: ClientSettings; api?: GmeService }) {
  const queryClient = useQueryClient();
  const [services] = useState(() => createServices(settings, queryClient, api));
  const { phase, session, route } = useStore(services.shell.store);

  useEffect(() => {
    void services.shell.bootstrap();
  }, [services]);

  if (phase === "restoring") {
    return <p className="p-8 text-sm text-gray-500">Restoring session...</p>;
  }

  return (
    <ServicesContext.Provider value={services}>
      {session && (
        <TopBar
          user={session.user}
          showBack={route.name !== "projects"}
          onHome={() => services.shell.navigate({ name: "projects" })}
          onSignOut={() => void services.shell.logout()}
        />
      )}
      <Screen route={route} />
    </ServicesContext.Provider>
  );
}

import AppShell from "@/components/shell/app-shell";
import { clientSettingsFrom, loadConfig } from "@/lib/server/config";

export const dynamic = "force-dynamic";

/**
 * Single page of the app. Configuration is read here, on the server, and
 * only the browser-safe part reaches the shell.
 */
export default function HomePage() {
  return <AppShell settings={clientSettingsFrom(loadConfig())} />;
}

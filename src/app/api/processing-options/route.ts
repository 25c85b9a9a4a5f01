import { getProcessingOptions } from "@/lib/server/handlers";
import { routeDeps } from "@/lib/server/route-support";

export const dynamic = "force-dynamic";

export function GET() {
  return getProcessingOptions(routeDeps);
}

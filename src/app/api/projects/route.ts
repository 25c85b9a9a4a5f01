import { getProjects, postProject } from "@/lib/server/handlers";
import { routeDeps } from "@/lib/server/route-support";

export function GET(request: Request) {
  return getProjects(routeDeps, request);
}

export function POST(request: Request) {
  return postProject(routeDeps, request);
}

import { deleteSession, getSession, postSession } from "@/lib/server/handlers";
import { routeDeps } from "@/lib/server/route-support";

export function GET() {
  return getSession(routeDeps);
}

export function POST(request: Request) {
  return postSession(routeDeps, request);
}

export function DELETE() {
  return deleteSession(routeDeps);
}

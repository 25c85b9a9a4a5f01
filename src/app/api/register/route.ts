import { postRegister } from "@/lib/server/handlers";
import { routeDeps } from "@/lib/server/route-support";

export function POST(request: Request) {
  return postRegister(routeDeps, request);
}

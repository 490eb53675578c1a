// functions/router.ts
// Maps /api/* paths onto the handler modules, one export per HTTP method.
import * as distributions from "./api/distributions";
import * as share from "./api/share";
import * as wallet from "./api/wallet";
import { errorJson } from "./api/respond";
import type { ApiEnv, ApiHandler } from "./api/types";

type Method = "GET" | "POST" | "OPTIONS";

const ROUTES: Record<string, Partial<Record<Method, ApiHandler>>> = {
  "/api/distributions": { GET: distributions.onRequestGet, OPTIONS: distributions.onRequestOptions },
  "/api/wallet": { GET: wallet.onRequestGet, OPTIONS: wallet.onRequestOptions },
  "/api/share": { POST: share.onRequestPost, OPTIONS: share.onRequestOptions },
};

function isMethod(m: string): m is Method {
  return m === "GET" || m === "POST" || m === "OPTIONS";
}

export function isApiPath(pathname: string): boolean {
  return pathname === "/api" || pathname.startsWith("/api/");
}

export async function routeRequest(request: Request, env: ApiEnv): Promise<Response> {
  const { pathname } = new URL(request.url);
  const route = ROUTES[pathname.replace(/\/+$/, "")];
  if (!route) return errorJson("Not found", 404);

  const method = request.method.toUpperCase();
  const handler = isMethod(method) ? route[method] : undefined;
  if (!handler) {
    return new Response(null, { status: 405, headers: { Allow: Object.keys(route).join(",") } });
  }
  return handler({ request, env });
}

// functions/api/respond.ts
import { corsHeaders, type CorsEnv } from "./cors";

export function json(body: unknown, status: number, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { ...headers, "content-type": "application/json" },
  });
}

export function errorJson(error: string, status: number, headers: Record<string, string> = {}): Response {
  return json({ error }, status, headers);
}

/** Preflight response, or 403 for a disallowed Origin. */
export function preflight(request: Request, env: CorsEnv, methods: string): Response {
  const headers = corsHeaders(request, env, methods);
  if (!headers) return new Response(null, { status: 403 });
  return new Response(null, { status: 204, headers });
}

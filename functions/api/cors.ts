// functions/api/cors.ts

export type CorsEnv = {
  /** Comma-separated list of allowed Origins for browser CORS (e.g. "https://estimator.example.org") */
  allowedOrigins?: string;
};

const BASE_HEADERS: Record<string, string> = {
  "Access-Control-Allow-Headers": "content-type",
  "Cache-Control": "no-store",
};

function normalizeOrigins(raw: string | undefined): string[] {
  return (raw ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function isLocalOrigin(origin: string): boolean {
  return (
    origin.startsWith("http://localhost:") ||
    origin.startsWith("http://127.0.0.1:") ||
    origin.startsWith("http://[::1]:")
  );
}

export function resolveAllowedOrigin(request: Request, env?: CorsEnv): { allowed: string | null; hasOrigin: boolean } {
  const origin = request.headers.get("Origin");
  if (!origin) return { allowed: null, hasOrigin: false };

  if (origin === new URL(request.url).origin) return { allowed: origin, hasOrigin: true };
  if (isLocalOrigin(origin)) return { allowed: origin, hasOrigin: true };
  if (normalizeOrigins(env?.allowedOrigins).includes(origin)) return { allowed: origin, hasOrigin: true };

  return { allowed: null, hasOrigin: true };
}

/** CORS headers for a response, or null when a browser Origin is present but not allowed. */
export function corsHeaders(request: Request, env: CorsEnv | undefined, methods: string): Record<string, string> | null {
  const { allowed, hasOrigin } = resolveAllowedOrigin(request, env);
  if (hasOrigin && !allowed) return null;

  return {
    ...BASE_HEADERS,
    "Access-Control-Allow-Origin": allowed ?? "*",
    "Access-Control-Allow-Methods": methods,
    ...(allowed ? { Vary: "Origin" } : {}),
    "Access-Control-Max-Age": "86400",
  };
}

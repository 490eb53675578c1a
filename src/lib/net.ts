// src/lib/net.ts
import { parseClientConfig } from "./config";

export type RetryConfig = {
  attempts?: number;     // total tries (incl. first)
  baseDelayMs?: number;  // initial backoff
  timeoutMs?: number;    // per-request timeout
  jitter?: boolean;
};

const wait = (ms: number) => new Promise((r) => setTimeout(r, ms));

// Exponential backoff with optional jitter
export function backoff(attempt: number, base: number, jitter: boolean) {
  const t = base * Math.pow(2, attempt); // 0,1,2...
  if (!jitter) return t;
  const rand = Math.random() * 0.4 + 0.8; // 0.8-1.2x
  return Math.round(t * rand);
}

async function fetchWithTimeout(input: RequestInfo | URL, init: RequestInit, timeoutMs: number): Promise<Response> {
  const controller = new AbortController();
  const id = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(input, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(id);
  }
}

/**
 * fetch with a per-attempt timeout, retrying network errors, 5xx and 429.
 * Returns the final Response (ok or not); 4xx pass straight through so the caller can
 * surface validation messages.
 */
export async function fetchWithRetry(
  input: RequestInfo | URL,
  init: RequestInit = {},
  cfg: RetryConfig = {}
): Promise<Response> {
  const attempts = Math.max(1, cfg.attempts ?? 3);
  const base = cfg.baseDelayMs ?? 250;
  const timeout = cfg.timeoutMs ?? 4000;
  const jitter = cfg.jitter ?? true;

  let lastErr: unknown = null;
  for (let i = 0; i < attempts; i++) {
    try {
      const res = await fetchWithTimeout(input, init, timeout);
      if ((res.status >= 500 || res.status === 429) && i < attempts - 1) {
        await wait(backoff(i, base, jitter));
        continue;
      }
      return res;
    } catch (e) {
      lastErr = e;
      if (i < attempts - 1) {
        await wait(backoff(i, base, jitter));
        continue;
      }
      throw e;
    }
  }
  throw lastErr ?? new Error("fetchWithRetry: exhausted attempts");
}

/** Join `path` onto `base` ("" keeps it same-origin). */
export function joinUrl(base: string, path: string): string {
  const normalized = path.startsWith("/") ? path : `/${path}`;
  const trimmed = base.replace(/\/+$/, "");
  return trimmed ? `${trimmed}${normalized}` : normalized;
}

/** Browser API base: `VITE_API_ORIGIN` when set, otherwise same-origin. */
export function apiUrl(path: string): string {
  return joinUrl(parseClientConfig(import.meta.env).apiOrigin, path);
}

/** Read a JSON body, returning null instead of throwing on malformed payloads. */
export async function readJson(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!text) return null;
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return null;
  }
}

// src/lib/safeNumber.ts

/**
 * Coerce a loosely-typed value (JSON cell, query param, form field) into a finite number.
 *
 * Policy: finite numbers pass through; strings are trimmed and parsed with `Number`;
 * everything else (null, undefined, booleans, objects, NaN, ±Infinity, blank strings)
 * yields `fallback`. Never throws.
 */
export function safeFloat(value: unknown, fallback = 0): number {
  if (typeof value === "number") return Number.isFinite(value) ? value : fallback;
  if (typeof value === "string") {
    const t = value.trim();
    if (!t) return fallback;
    const n = Number(t);
    return Number.isFinite(n) ? n : fallback;
  }
  return fallback;
}

/** Same policy as `safeFloat`, truncated toward zero. */
export function safeInt(value: unknown, fallback = 0): number {
  const n = safeFloat(value, Number.NaN);
  return Number.isNaN(n) ? fallback : Math.trunc(n);
}

/** Like `safeFloat`, but reports failure as `null` so callers can skip the value. */
export function maybeFloat(value: unknown): number | null {
  const n = safeFloat(value, Number.NaN);
  return Number.isNaN(n) ? null : n;
}

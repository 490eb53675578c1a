// src/lib/session.ts
// Explicit, serializable dashboard state. Every transition takes a session and returns a new one;
// the host decides where it lives between interactions (React state, localStorage, a request).
import { z } from "zod";
import { DEFAULT_FDV_SENSITIVITY, DEFAULT_SHARE_OPTIONS, OG_POOL_RANGE } from "./config";
import { tierFromBand, type PercentileBand } from "./percentile";
import { generatePercentileOptions, snapValueToOptions } from "./sliders";

export type TierSource = { value: number; fromWallet: boolean };

export type SessionContext = {
  ogPoolPct: number;
  fdvBillion: number;
  cohortSize: number;
  tierPct: number;
  tierSource: TierSource | null;
  shareOptions: number[];
  fdvSensitivity: number[];
  primaryCohort: string | null;
  walletAddress: string | null;
  hasRevealedOnce: boolean;
  lastRevealSignature: string | null;
};

export type InputsPatch = Partial<
  Pick<
    SessionContext,
    "ogPoolPct" | "fdvBillion" | "cohortSize" | "tierPct" | "shareOptions" | "fdvSensitivity" | "primaryCohort"
  >
>;

export const SESSION_DEFAULTS: SessionContext = {
  ogPoolPct: 15,
  fdvBillion: 4,
  cohortSize: 100_000,
  tierPct: 10.0,
  tierSource: null,
  shareOptions: DEFAULT_SHARE_OPTIONS,
  fdvSensitivity: DEFAULT_FDV_SENSITIVITY,
  primaryCohort: null,
  walletAddress: null,
  hasRevealedOnce: false,
  lastRevealSignature: null,
};

const PERCENTILE_OPTIONS = generatePercentileOptions();

const finite = z.number().finite();

const SessionSchema = z
  .object({
    ogPoolPct: finite,
    fdvBillion: finite,
    cohortSize: finite.int().positive(),
    tierPct: finite,
    tierSource: z.object({ value: finite, fromWallet: z.boolean() }).nullable(),
    shareOptions: z.array(finite),
    fdvSensitivity: z.array(finite),
    primaryCohort: z.string().nullable(),
    walletAddress: z.string().nullable(),
    hasRevealedOnce: z.boolean(),
    lastRevealSignature: z.string().nullable(),
  })
  .partial();

export function defaultSession(overrides: Partial<SessionContext> = {}): SessionContext {
  return {
    ...SESSION_DEFAULTS,
    shareOptions: [...SESSION_DEFAULTS.shareOptions],
    fdvSensitivity: [...SESSION_DEFAULTS.fdvSensitivity],
    ...overrides,
  };
}

/** FDV sensitivity points always include the headline FDV; sorted and unique. */
export function withFdvPoint(points: ReadonlyArray<number>, fdvBillion: number): number[] {
  if (points.includes(fdvBillion)) return [...points];
  return Array.from(new Set([...points, fdvBillion])).sort((a, b) => a - b);
}

/**
 * Apply user input. Cohort size and tier are snapped onto their slider option sets, an empty
 * share selection falls back to the defaults, and a manual tier change clears the wallet link.
 */
export function applyInputs(
  session: SessionContext,
  patch: InputsPatch,
  opts: { cohortOptions?: ReadonlyArray<number> } = {}
): SessionContext {
  const next: SessionContext = { ...session, ...patch };

  next.ogPoolPct = Math.min(OG_POOL_RANGE.max, Math.max(OG_POOL_RANGE.min, next.ogPoolPct));
  if (opts.cohortOptions?.length) {
    next.cohortSize = snapValueToOptions(next.cohortSize, opts.cohortOptions);
  }
  next.tierPct = snapValueToOptions(next.tierPct, PERCENTILE_OPTIONS);
  if (patch.tierPct !== undefined) {
    next.tierSource = { value: next.tierPct, fromWallet: false };
  }
  if (!next.shareOptions.length) next.shareOptions = [...DEFAULT_SHARE_OPTIONS];
  next.fdvSensitivity = withFdvPoint(next.fdvSensitivity, next.fdvBillion);
  return next;
}

/**
 * Record a wallet lookup. A located band moves the tier to the band's midpoint (snapped to the
 * tier options); without a band the tier stays where the user left it.
 */
export function applyWalletBand(
  session: SessionContext,
  band: Pick<PercentileBand, "startPercentile" | "endPercentile"> | null,
  address: string
): SessionContext {
  if (!band) {
    return { ...session, walletAddress: address, tierSource: { value: session.tierPct, fromWallet: false } };
  }
  const suggested = tierFromBand(band);
  return {
    ...session,
    walletAddress: address,
    tierPct: snapValueToOptions(suggested, PERCENTILE_OPTIONS),
    tierSource: { value: suggested, fromWallet: true },
  };
}

export function clearWallet(session: SessionContext): SessionContext {
  return { ...session, walletAddress: null, tierSource: null };
}

export function markRevealed(session: SessionContext, signature: string): SessionContext {
  return { ...session, hasRevealedOnce: true, lastRevealSignature: signature };
}

/** True when the displayed results no longer match the current assumptions. */
export function needsReveal(session: SessionContext, signature: string): boolean {
  return session.lastRevealSignature !== signature;
}

export function serializeSession(session: SessionContext): string {
  return JSON.stringify(session);
}

/** Restore a stored session; unknown or invalid fields fall back to defaults. */
export function parseSession(raw: string | null | undefined): SessionContext {
  if (!raw) return defaultSession();
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return defaultSession();
  }
  const parsed = SessionSchema.safeParse(json);
  return parsed.success ? defaultSession(parsed.data) : defaultSession();
}

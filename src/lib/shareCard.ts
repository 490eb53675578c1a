// src/lib/shareCard.ts
// Share-card payloads and the client for the card rendering service.
import { z } from "zod";
import { fetchWithRetry, joinUrl, readJson, type RetryConfig } from "./net";
import { formatPercentileOption } from "./sliders";
import type { ScenarioResult } from "./scenario";
import { hasSummary, walletStats, type WalletReport } from "./wallet";

export class ShareServiceError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = "ShareServiceError";
  }
}

const NonNeg = z.number().finite().min(0);

export const ShareCardPayloadSchema = z.object({
  wallet: z.string().min(1).max(128),
  payoutUsd: NonNeg,
  payoutTokens: NonNeg,
  tokenPrice: NonNeg,
  cohortLabel: z.string().min(1).max(128),
  cohortWallets: NonNeg.optional(),
  percentileLabel: z.string().min(1).max(128),
  sharePct: NonNeg,
  fdvBillion: NonNeg,
  ogPoolPct: NonNeg,
  tradeCount: NonNeg.optional(),
  totalEth: NonNeg.optional(),
  totalUsd: NonNeg.optional(),
  asOf: z.string().optional(),
});

export type ShareCardPayload = z.infer<typeof ShareCardPayloadSchema>;

const ServiceResponse = z
  .object({
    id: z.string().min(1).optional(),
    image_url: z.string().optional(),
    share_url: z.string().optional(),
    meta_url: z.string().optional(),
  })
  .passthrough();

export const ShareCardSchema = z.object({
  id: z.string().min(1),
  imageUrl: z.string(),
  shareUrl: z.string(),
  metaUrl: z.string(),
});

export type ShareCard = z.infer<typeof ShareCardSchema>;

export type ShareServiceConfig = {
  serviceUrl: string;
  publicBase?: string;
  retry?: RetryConfig;
};

export type ShareCardArgs = {
  walletAddress: string;
  report: WalletReport;
  result: ScenarioResult;
  tierPct: number;
  cohortLabel: string;
  cohortWallets: number;
  featuredShare: number;
  fdvBillion: number;
  ogPoolPct: number;
  tokenPrice: number;
};

/** Service paths become absolute against the public base (preferred) or the service URL. */
export function absoluteUrl(path: string, cfg: ShareServiceConfig, preferPublic = false): string {
  if (!path) return path;
  if (/^https?:\/\//i.test(path)) return path;
  const base = preferPublic && cfg.publicBase ? cfg.publicBase : cfg.serviceUrl;
  if (!base) return path;
  return `${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

export function buildShareCardPayload(args: ShareCardArgs): ShareCardPayload {
  const stats = args.report.summary ? walletStats(args.report.summary) : null;
  const payload: ShareCardPayload = {
    wallet: args.walletAddress,
    payoutUsd: args.result.usdValue,
    payoutTokens: args.result.tokensPerWallet,
    tokenPrice: args.tokenPrice,
    cohortLabel: args.cohortLabel,
    cohortWallets: Math.trunc(args.cohortWallets || 0),
    percentileLabel: formatPercentileOption(args.tierPct),
    sharePct: args.featuredShare,
    fdvBillion: args.fdvBillion,
    ogPoolPct: args.ogPoolPct,
    tradeCount: stats?.tradeCount ?? 0,
    totalEth: stats?.totalEth ?? 0,
    totalUsd: stats?.totalUsd ?? 0,
  };
  if (stats?.lastTrade) payload.asOf = stats.lastTrade;
  return payload;
}

/** POST a payload to `<serviceUrl>/cards` and normalize the URLs it hands back. */
export async function createShareCard(payload: ShareCardPayload, cfg: ShareServiceConfig): Promise<ShareCard> {
  if (!cfg.serviceUrl) throw new ShareServiceError("Share service URL is not configured.");

  let res: Response;
  try {
    res = await fetchWithRetry(
      joinUrl(cfg.serviceUrl, "/cards"),
      { method: "POST", headers: { "Content-Type": "application/json" }, body: JSON.stringify(payload) },
      { attempts: 2, timeoutMs: 20_000, ...cfg.retry }
    );
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ShareServiceError(`Failed to create share card: ${msg}`);
  }
  if (!res.ok) {
    throw new ShareServiceError(`Failed to create share card: HTTP ${res.status}`, res.status);
  }

  const parsed = ServiceResponse.safeParse(await readJson(res));
  if (!parsed.success) throw new ShareServiceError("Share service returned invalid JSON response.");
  const data = parsed.data;
  if (!data.id) throw new ShareServiceError("Share service response missing card identifier.");

  return {
    id: data.id,
    imageUrl: absoluteUrl(data.image_url ?? "", cfg, true),
    shareUrl: absoluteUrl(data.share_url ?? "", cfg, true),
    metaUrl: absoluteUrl(data.meta_url ?? "", cfg, true),
  };
}

/** Browser side: ask our own `/api/share` proxy for a card. */
export async function requestShareCard(payload: ShareCardPayload, endpoint: string): Promise<ShareCard> {
  const res = await fetchWithRetry(
    endpoint,
    { method: "POST", headers: { "Content-Type": "application/json" }, body: JSON.stringify(payload) },
    { attempts: 2, timeoutMs: 25_000 }
  );
  const body = await readJson(res);
  if (!res.ok) {
    const err = z.object({ error: z.string() }).safeParse(body);
    throw new ShareServiceError(err.success ? err.data.error : `HTTP ${res.status}`, res.status);
  }
  const card = ShareCardSchema.safeParse(body);
  if (!card.success) throw new ShareServiceError("Share proxy returned an unexpected payload.");
  return card.data;
}

/** A card belongs to one wallet, one OG definition and one set of assumptions. */
export function shareCardKey(signature: string, walletAddress: string, cohortLabel: string): string {
  return JSON.stringify([signature, walletAddress.trim().toLowerCase(), cohortLabel]);
}

/** Cards keyed by `shareCardKey`; each is rendered once. */
export class ShareCardMemo {
  private readonly cards = new Map<string, ShareCard>();

  get(key: string): ShareCard | undefined {
    return this.cards.get(key);
  }

  async ensure(key: string, create: () => Promise<ShareCard>): Promise<ShareCard> {
    const hit = this.cards.get(key);
    if (hit) return hit;
    const card = await create();
    this.cards.set(key, card);
    return card;
  }
}

export type SharePrefetchResult = {
  card: ShareCard | null;
  payload: ShareCardPayload | null;
  warning?: string;
};

/**
 * Render (or reuse) the card ahead of the share panel. Without a wallet summary there is
 * nothing to share; service failures come back as a warning instead of an exception.
 */
export async function prefetchShareCard(args: {
  walletAddress: string | null | undefined;
  report: WalletReport | null | undefined;
  card: Omit<ShareCardArgs, "walletAddress" | "report">;
  signature: string;
  memo: ShareCardMemo;
  create: (payload: ShareCardPayload) => Promise<ShareCard>;
}): Promise<SharePrefetchResult> {
  const { walletAddress, report } = args;
  if (!walletAddress || !hasSummary(report)) return { card: null, payload: null };

  const payload = buildShareCardPayload({ ...args.card, walletAddress, report });
  try {
    const key = shareCardKey(args.signature, walletAddress, args.card.cohortLabel);
    const card = await args.memo.ensure(key, () => args.create(payload));
    return { card, payload };
  } catch (err) {
    if (err instanceof ShareServiceError) return { card: null, payload, warning: err.message };
    throw err;
  }
}

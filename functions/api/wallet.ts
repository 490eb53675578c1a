// functions/api/wallet.ts
// GET /api/wallet?address=0x…: trade history for one wallet.
import { WalletLookupError } from "../../src/lib/dune";
import { createLogger } from "../../src/lib/logger";
import { hasSummary, isWalletAddress } from "../../src/lib/wallet";
import { corsHeaders } from "./cors";
import { errorJson, json, preflight } from "./respond";
import type { ApiHandler } from "./types";

const METHODS = "GET,OPTIONS";
const log = createLogger("api/wallet");

export const onRequestOptions: ApiHandler = async ({ request, env }) => preflight(request, env, METHODS);

export const onRequestGet: ApiHandler = async ({ request, env }) => {
  const headers = corsHeaders(request, env, METHODS);
  if (!headers) return errorJson("Origin not allowed", 403);

  const address = (new URL(request.url).searchParams.get("address") ?? "").trim();
  if (!isWalletAddress(address)) {
    return errorJson("Enter a valid 0x wallet address (40 hex characters).", 400, headers);
  }

  try {
    const report = await env.lookupWallet(address.toLowerCase());
    if (!hasSummary(report)) return errorJson("No trades found for this wallet.", 404, headers);
    return json(report, 200, headers);
  } catch (err) {
    if (err instanceof WalletLookupError) {
      log.warn(`lookup failed for ${address}: ${err.message}`);
      return errorJson(err.message, 502, headers);
    }
    log.error(`unexpected lookup failure for ${address}`, err);
    return errorJson("Wallet lookup failed", 500, headers);
  }
};

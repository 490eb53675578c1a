// functions/env.ts
import { fileURLToPath } from "node:url";
import { parseServerConfig } from "../src/lib/config";
import { DistributionCache } from "../src/lib/distributionCache";
import { fsDistributionSource } from "../src/lib/distributionFs";
import { fetchWalletReport } from "../src/lib/dune";
import { setLogLevel } from "../src/lib/logger";
import { createShareCard } from "../src/lib/shareCard";
import type { ApiEnv } from "./api/types";

export const DEFAULT_DATA_DIR = fileURLToPath(new URL("../data/", import.meta.url));

/** Wire config, the snapshot cache and the outbound clients from an env record. */
export function createApiEnv(vars: Record<string, string | undefined>): ApiEnv {
  const config = parseServerConfig(vars);
  setLogLevel(config.logLevel);
  return {
    config,
    allowedOrigins: config.allowedOrigins,
    dataDir: config.dataDir ?? DEFAULT_DATA_DIR,
    distributions: new DistributionCache(fsDistributionSource),
    lookupWallet: (address) =>
      fetchWalletReport(address, { apiKey: config.duneApiKey, queryId: config.duneQueryId }),
    createCard: (payload) =>
      createShareCard(payload, { serviceUrl: config.shareServiceUrl, publicBase: config.sharePublicBase }),
  };
}

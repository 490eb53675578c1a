// functions/api/types.ts
import type { DistributionCache } from "../../src/lib/distributionCache";
import type { ServerConfig } from "../../src/lib/config";
import type { ShareCard, ShareCardPayload } from "../../src/lib/shareCard";
import type { WalletReport } from "../../src/lib/wallet";
import type { CorsEnv } from "./cors";

/** Everything a handler needs; built once per server from `process.env`. */
export interface ApiEnv extends CorsEnv {
  config: ServerConfig;
  dataDir: string;
  distributions: DistributionCache;
  lookupWallet: (address: string) => Promise<WalletReport>;
  createCard: (payload: ShareCardPayload) => Promise<ShareCard>;
}

export type FunctionContext<E = ApiEnv> = { request: Request; env: E };

export type ApiHandler<E = ApiEnv> = (ctx: FunctionContext<E>) => Promise<Response>;

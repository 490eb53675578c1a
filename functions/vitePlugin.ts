// functions/vitePlugin.ts
// Serves the /api handlers from the Vite dev and preview servers.
import type { IncomingMessage, ServerResponse } from "node:http";
import type { Connect, Plugin } from "vite";
import { createLogger } from "../src/lib/logger";
import { createApiEnv } from "./env";
import { isApiPath, routeRequest } from "./router";
import type { ApiEnv } from "./api/types";

const log = createLogger("api");

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

export async function toWebRequest(req: IncomingMessage): Promise<Request> {
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) value.forEach((v) => headers.append(key, v));
    else if (value !== undefined) headers.set(key, value);
  }
  const method = req.method ?? "GET";
  const body = method === "GET" || method === "HEAD" ? undefined : await readBody(req);
  return new Request(url, { method, headers, body });
}

export async function sendWebResponse(res: ServerResponse, response: Response): Promise<void> {
  res.statusCode = response.status;
  response.headers.forEach((value, key) => res.setHeader(key, value));
  res.end(Buffer.from(await response.arrayBuffer()));
}

export function apiPlugin(envFactory: () => ApiEnv = () => createApiEnv(process.env)): Plugin {
  let env: ApiEnv | null = null;

  const middleware: Connect.NextHandleFunction = (req, res, next) => {
    const pathname = (req.url ?? "").split("?")[0];
    if (!isApiPath(pathname)) {
      next();
      return;
    }
    env ??= envFactory();
    const current = env;
    toWebRequest(req)
      .then((request) => routeRequest(request, current))
      .then((response) => sendWebResponse(res, response))
      .catch((err: unknown) => {
        log.error(`unhandled error for ${req.method} ${pathname}`, err);
        next(err);
      });
  };

  return {
    name: "airdrop-api",
    configureServer(server) {
      server.middlewares.use(middleware);
    },
    configurePreviewServer(server) {
      server.middlewares.use(middleware);
    },
  };
}

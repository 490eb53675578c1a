// functions/api/share.ts
// POST /api/share: validate a share-card payload and forward it to the card service.
import { createLogger } from "../../src/lib/logger";
import { ShareCardPayloadSchema, ShareServiceError } from "../../src/lib/shareCard";
import { corsHeaders } from "./cors";
import { errorJson, json, preflight } from "./respond";
import type { ApiHandler } from "./types";

const METHODS = "POST,OPTIONS";
const MAX_BODY_BYTES = 16 * 1024;
const log = createLogger("api/share");

export const onRequestOptions: ApiHandler = async ({ request, env }) => preflight(request, env, METHODS);

export const onRequestPost: ApiHandler = async ({ request, env }) => {
  const headers = corsHeaders(request, env, METHODS);
  if (!headers) return errorJson("Origin not allowed", 403);

  const text = await request.text();
  if (text.length > MAX_BODY_BYTES) return errorJson("Payload too large", 413, headers);

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return errorJson("Invalid JSON", 400, headers);
  }

  const parsed = ShareCardPayloadSchema.safeParse(body);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    return errorJson(`Invalid share payload: ${detail}`, 400, headers);
  }

  try {
    const card = await env.createCard(parsed.data);
    return json(card, 201, headers);
  } catch (err) {
    if (err instanceof ShareServiceError) {
      log.warn(err.message);
      return errorJson(err.message, 502, headers);
    }
    log.error("unexpected share failure", err);
    return errorJson("Share card failed", 500, headers);
  }
};

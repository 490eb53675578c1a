// functions/api/distributions.ts
// GET /api/distributions: every cohort's percentile snapshot, normalized and cached by mtime.
import { join } from "node:path";
import { COHORT_CONFIG, loadCohorts } from "../../src/lib/cohorts";
import type { DistributionBucket } from "../../src/lib/distribution";
import { createLogger } from "../../src/lib/logger";
import { corsHeaders } from "./cors";
import { errorJson, json, preflight } from "./respond";
import type { ApiHandler } from "./types";

const METHODS = "GET,OPTIONS";
const log = createLogger("api/distributions");

export type DistributionsPayload = {
  demoWallet: string;
  cohorts: Array<{
    name: string;
    slug: string;
    title: string;
    timelineLabel: string;
    tagline: string;
    description: string;
    cutoff: string;
    estimate: number;
    rows: DistributionBucket[];
  }>;
};

export const onRequestOptions: ApiHandler = async ({ request, env }) => preflight(request, env, METHODS);

export const onRequestGet: ApiHandler = async ({ request, env }) => {
  const headers = corsHeaders(request, env, METHODS);
  if (!headers) return errorJson("Origin not allowed", 403);

  try {
    const cohorts = await loadCohorts((file) => env.distributions.load(join(env.dataDir, file)), COHORT_CONFIG);
    const body: DistributionsPayload = {
      demoWallet: env.config.demoWallet,
      cohorts: cohorts.map((c) => ({
        name: c.name,
        slug: c.config.slug,
        title: c.config.title,
        timelineLabel: c.config.timelineLabel,
        tagline: c.config.tagline,
        description: c.config.description,
        cutoff: c.config.cutoff,
        estimate: c.estimate,
        rows: [...c.rows],
      })),
    };
    return json(body, 200, headers);
  } catch (err) {
    log.error("failed to load distributions", err);
    return errorJson("Failed to load distributions", 500, headers);
  }
};

// src/lib/cohorts.ts
import { estimateCohortSize, normalizeDistribution, type Distribution } from "./distribution";

export type CohortConfig = {
  name: string;
  slug: string;
  file: string;          // snapshot file name, relative to the data directory
  description: string;
  timelineLabel: string;
  title: string;
  tagline: string;
  cutoff: string;        // ISO timestamp of the last qualifying first trade
};

export type LoadedCohort = {
  name: string;
  rows: Distribution;
  estimate: number;
  config: CohortConfig;
};

export type CohortMap = ReadonlyMap<string, LoadedCohort>;

export const COHORT_CONFIG: ReadonlyArray<CohortConfig> = [
  {
    name: "Super OG (≤2021)",
    slug: "super_og",
    file: "og_percentile_distribution_pre2022.json",
    description: "First trade on or before 31 Dec 2021",
    timelineLabel: "≤2021",
    title: "Super OG",
    tagline: "Pre-2022 traders",
    cutoff: "2021-12-31T23:59:59Z",
  },
  {
    name: "Uncle (≤2022)",
    slug: "unc",
    file: "og_percentile_distribution_pre2023.json",
    description: "First trade on or before 31 Dec 2022",
    timelineLabel: "≤2022",
    title: "Uncle",
    tagline: "First active in 2022",
    cutoff: "2022-12-31T23:59:59Z",
  },
  {
    name: "Cousin (≤2023)",
    slug: "cuz",
    file: "og_percentile_distribution_pre2024.json",
    description: "First trade on or before 31 Dec 2023",
    timelineLabel: "≤2023",
    title: "Cousin",
    tagline: "Joined by 2023",
    cutoff: "2023-12-31T23:59:59Z",
  },
];

export const DEFAULT_PRIMARY_COHORT = COHORT_CONFIG[0].name;

export function makeCohort(config: CohortConfig, rows: Distribution): LoadedCohort {
  return { name: config.name, rows, estimate: estimateCohortSize(rows), config };
}

/**
 * Load every configured cohort through `load` (typically a DistributionCache bound to a
 * data directory). Order follows the config.
 */
export async function loadCohorts(
  load: (file: string) => Promise<Distribution>,
  configs: ReadonlyArray<CohortConfig> = COHORT_CONFIG
): Promise<LoadedCohort[]> {
  return Promise.all(configs.map(async (config) => makeCohort(config, await load(config.file))));
}

export function cohortMap(cohorts: Iterable<LoadedCohort>): CohortMap {
  const m = new Map<string, LoadedCohort>();
  for (const c of cohorts) m.set(c.name, c);
  return m;
}

/** Rebuild cohorts from the JSON the distributions endpoint returns; rows are re-normalized. */
export function cohortsFromPayload(
  items: ReadonlyArray<{ name: string; rows?: unknown }>,
  configs: ReadonlyArray<CohortConfig> = COHORT_CONFIG
): LoadedCohort[] {
  const out: LoadedCohort[] = [];
  for (const config of configs) {
    const item = items.find((i) => i.name === config.name);
    out.push(makeCohort(config, item ? normalizeDistribution(item.rows) : []));
  }
  return out;
}

// src/lib/distributionCache.ts
import { normalizeDistribution, type Distribution } from "./distribution";
import { createLogger, type Logger } from "./logger";

/** Where snapshot files come from. `stat` resolves to the mtime in ms, or null if missing. */
export interface DistributionSource {
  stat(path: string): Promise<number | null>;
  read(path: string): Promise<string>;
}

export type DistributionCacheEntry = {
  path: string;
  mtimeMs: number;
  rows: Distribution;
};

/**
 * Parsed snapshots keyed by path. An entry is reused while the file's mtime is unchanged
 * and replaced as soon as it moves; a missing file is cached as an empty distribution with
 * mtime 0.
 */
export class DistributionCache {
  private readonly entries = new Map<string, DistributionCacheEntry>();
  private readonly log: Logger;

  constructor(private readonly source: DistributionSource, log?: Logger) {
    this.log = log ?? createLogger("distributions");
  }

  async load(path: string): Promise<Distribution> {
    const mtime = await this.source.stat(path);
    const mtimeMs = mtime ?? 0;
    const hit = this.entries.get(path);
    if (hit && hit.mtimeMs === mtimeMs) return hit.rows;

    const rows = mtime === null ? [] : await this.parse(path);
    this.entries.set(path, { path, mtimeMs, rows });
    this.log.debug(`loaded ${rows.length} buckets from ${path} (mtime ${mtimeMs})`);
    return rows;
  }

  peek(path: string): DistributionCacheEntry | undefined {
    return this.entries.get(path);
  }

  invalidate(path?: string) {
    if (path === undefined) this.entries.clear();
    else this.entries.delete(path);
  }

  private async parse(path: string): Promise<Distribution> {
    const raw = await this.source.read(path);
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (err) {
      this.log.warn(`snapshot ${path} is not valid JSON; treating as empty`, err);
      return [];
    }
    return normalizeDistribution(payload);
  }
}

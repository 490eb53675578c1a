import { mkdtemp, rm, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DistributionCache, type DistributionSource } from "./distributionCache";
import { fsDistributionSource } from "./distributionFs";
import type { Logger } from "./logger";

const quietLogger = (): Logger => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });

function memorySource(files: Record<string, { mtime: number; text: string }>) {
  const read = vi.fn(async (path: string) => {
    const f = files[path];
    if (!f) throw new Error(`missing ${path}`);
    return f.text;
  });
  const source: DistributionSource = {
    stat: async (path) => files[path]?.mtime ?? null,
    read,
  };
  return { source, read };
}

const rowsJson = (count: number) =>
  JSON.stringify([{ usd_percentile_rank: 1, wallet_count: count, min_total_usd: 0, max_total_usd: 10 }]);

describe("DistributionCache", () => {
  it("reuses an entry while the mtime is unchanged", async () => {
    const files = { "/data/a.json": { mtime: 100, text: rowsJson(5) } };
    const { source, read } = memorySource(files);
    const cache = new DistributionCache(source, quietLogger());

    const first = await cache.load("/data/a.json");
    const second = await cache.load("/data/a.json");
    expect(second).toBe(first);
    expect(read).toHaveBeenCalledTimes(1);
    expect(cache.peek("/data/a.json")?.mtimeMs).toBe(100);
  });

  it("reloads when the mtime moves", async () => {
    const files = { "/data/a.json": { mtime: 100, text: rowsJson(5) } };
    const { source, read } = memorySource(files);
    const cache = new DistributionCache(source, quietLogger());

    expect((await cache.load("/data/a.json"))[0].wallet_count).toBe(5);
    files["/data/a.json"] = { mtime: 200, text: rowsJson(9) };
    expect((await cache.load("/data/a.json"))[0].wallet_count).toBe(9);
    expect(read).toHaveBeenCalledTimes(2);
  });

  it("caches a missing file as empty with mtime 0", async () => {
    const { source, read } = memorySource({});
    const cache = new DistributionCache(source, quietLogger());
    expect(await cache.load("/data/none.json")).toEqual([]);
    expect(cache.peek("/data/none.json")).toEqual({ path: "/data/none.json", mtimeMs: 0, rows: [] });
    expect(read).not.toHaveBeenCalled();
  });

  it("treats malformed JSON as empty and warns", async () => {
    const log = quietLogger();
    const { source } = memorySource({ "/data/bad.json": { mtime: 1, text: "{not json" } });
    const cache = new DistributionCache(source, log);
    expect(await cache.load("/data/bad.json")).toEqual([]);
    expect(log.warn).toHaveBeenCalledTimes(1);
  });

  it("drops entries on invalidate", async () => {
    const { source, read } = memorySource({ "/a": { mtime: 1, text: rowsJson(1) }, "/b": { mtime: 1, text: rowsJson(2) } });
    const cache = new DistributionCache(source, quietLogger());
    await cache.load("/a");
    await cache.load("/b");
    cache.invalidate("/a");
    expect(cache.peek("/a")).toBeUndefined();
    expect(cache.peek("/b")?.rows[0]?.wallet_count).toBe(2);
    await cache.load("/a");
    expect(read).toHaveBeenCalledTimes(3);
    cache.invalidate();
    expect(cache.peek("/a")).toBeUndefined();
    expect(cache.peek("/b")).toBeUndefined();
  });
});

describe("fsDistributionSource", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "distributions-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("picks up a rewritten snapshot on disk", async () => {
    const file = join(dir, "cohort.json");
    await writeFile(file, JSON.stringify({ result: { rows: [{ usd_percentile_rank: 1, wallet_count: 3 }] } }));
    await utimes(file, 1_000, 1_000);

    const cache = new DistributionCache(fsDistributionSource, quietLogger());
    expect(await cache.load(file)).toHaveLength(1);

    await writeFile(
      file,
      JSON.stringify([
        { usd_percentile_rank: 2, wallet_count: 1 },
        { usd_percentile_rank: 1, wallet_count: 4 },
      ])
    );
    await utimes(file, 2_000, 2_000);
    const rows = await cache.load(file);
    expect(rows.map((r) => r.wallet_count)).toEqual([4, 1]);
  });

  it("reports a missing file as null", async () => {
    expect(await fsDistributionSource.stat(join(dir, "absent.json"))).toBeNull();
  });
});

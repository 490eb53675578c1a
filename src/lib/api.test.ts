import { afterEach, describe, expect, it, vi } from "vitest";
import { ApiError, fetchDistributions, fetchWallet } from "./api";

afterEach(() => {
  vi.unstubAllGlobals();
});

const stub = (body: unknown, status = 200) => {
  const fetchMock = vi.fn(async (_input: RequestInfo | URL, _init?: RequestInit) => new Response(JSON.stringify(body), { status }));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
};

describe("fetchDistributions", () => {
  it("rebuilds every configured cohort", async () => {
    const fetchMock = stub({
      demoWallet: "0xdemo",
      cohorts: [{ name: "Cousin (≤2023)", rows: [{ usd_percentile_rank: 1, wallet_count: 9, min_total_usd: 1, max_total_usd: 2 }] }],
    });
    const { cohorts, demoWallet } = await fetchDistributions();
    expect(fetchMock.mock.calls[0][0]).toBe("/api/distributions");
    expect(demoWallet).toBe("0xdemo");
    expect(cohorts.map((c) => c.estimate)).toEqual([0, 0, 9]);
  });

  it("reports server errors", async () => {
    stub({ error: "Failed to load distributions" }, 500);
    await expect(fetchDistributions()).rejects.toThrow("Failed to load distributions");
  }, 10_000);
});

describe("fetchWallet", () => {
  const address = "0x00000000000000000000000000000000000000aa";

  it("returns the report", async () => {
    const fetchMock = stub({ summary: { total_usd: 5 } });
    expect(await fetchWallet(` ${address} `)).toEqual({ summary: { total_usd: 5 } });
    expect(fetchMock.mock.calls[0][0]).toBe(`/api/wallet?address=${address}`);
  });

  it("maps 404 to null", async () => {
    stub({ error: "No trades found for this wallet." }, 404);
    expect(await fetchWallet(address)).toBeNull();
  });

  it("throws the handler's message", async () => {
    stub({ error: "Enter a valid 0x wallet address (40 hex characters)." }, 400);
    const err = await fetchWallet("0x1").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ApiError);
    expect(err).toMatchObject({ status: 400, message: "Enter a valid 0x wallet address (40 hex characters)." });
  });
});

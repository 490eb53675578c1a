import { afterEach, describe, expect, it, vi } from "vitest";
import { WalletLookupError, fetchWalletReport, reportFromRows, type DuneClientConfig } from "./dune";

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });

/** Queue of responses handed out one per fetch call. */
function stubFetch(...responses: Array<() => Response>) {
  const queue = [...responses];
  const fetchMock = vi.fn(async (_input: RequestInfo | URL, _init?: RequestInit) => {
    const next = queue.shift();
    if (!next) throw new Error("unexpected fetch");
    return next();
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

const address = "0x00000000000000000000000000000000000000aa";

function config(patch: Partial<DuneClientConfig> = {}) {
  const sleep = vi.fn(async (_ms: number) => {});
  const cfg: DuneClientConfig = { apiKey: "test-key", queryId: 5850749, sleep, retry: { attempts: 1 }, ...patch };
  return { cfg, sleep };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("fetchWalletReport", () => {
  it("executes the query and polls until rows arrive", async () => {
    const fetchMock = stubFetch(
      () => jsonResponse({ execution_id: "ex-1" }),
      () => jsonResponse({ state: "QUERY_STATE_EXECUTING" }),
      () =>
        jsonResponse({
          state: "QUERY_STATE_COMPLETED",
          result: {
            rows: [
              { section: "summary", total_usd: "1234.5", trade_count: 12 },
              { section: "collection", name: "Some Collection" },
            ],
          },
        })
    );
    const { cfg, sleep } = config();

    const report = await fetchWalletReport(address, cfg);
    expect(report.summary?.total_usd).toBe("1234.5");
    expect(report.collections).toHaveLength(1);
    expect(report.buyer_seller).toEqual([]);

    expect(fetchMock).toHaveBeenCalledTimes(3);
    const [execUrl, execInit] = fetchMock.mock.calls[0];
    expect(execUrl).toBe("https://api.dune.com/api/v1/query/5850749/execute");
    expect(execInit?.method).toBe("POST");
    expect(execInit?.body).toBe(JSON.stringify({ query_parameters: { wallet: address } }));
    expect(fetchMock.mock.calls[1][0]).toBe("https://api.dune.com/api/v1/execution/ex-1/results");
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(1000);
  });

  it("returns an empty report when the query has no rows", async () => {
    stubFetch(
      () => jsonResponse({ execution_id: "ex-2" }),
      () => jsonResponse({ state: "QUERY_STATE_COMPLETED", result: { rows: [] } })
    );
    expect(await fetchWalletReport(address, config().cfg)).toEqual({});
  });

  it("posts the execute request once but retries result polling", async () => {
    const retry = { attempts: 3, baseDelayMs: 0, jitter: false };
    const failing = stubFetch(
      () => jsonResponse({ error: "busy" }, 503),
      () => jsonResponse({ execution_id: "never" })
    );
    await expect(fetchWalletReport(address, config({ retry }).cfg)).rejects.toMatchObject({
      message: "Dune execute failed (HTTP 503)",
      status: 503,
    });
    expect(failing).toHaveBeenCalledTimes(1);

    const polling = stubFetch(
      () => jsonResponse({ execution_id: "ex-3" }),
      () => jsonResponse({ error: "busy" }, 503),
      () => jsonResponse({ state: "QUERY_STATE_COMPLETED", result: { rows: [] } })
    );
    expect(await fetchWalletReport(address, config({ retry }).cfg)).toEqual({});
    expect(polling).toHaveBeenCalledTimes(3);
    expect(polling.mock.calls[2][0]).toBe("https://api.dune.com/api/v1/execution/ex-3/results");
  });

  it("requires an API key", async () => {
    const fetchMock = stubFetch();
    await expect(fetchWalletReport(address, config({ apiKey: undefined }).cfg)).rejects.toThrow(
      "DUNE_API_KEY not configured"
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("surfaces a rejected execution", async () => {
    stubFetch(() => jsonResponse({ error: "forbidden" }, 403));
    const err = await fetchWalletReport(address, config().cfg).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(WalletLookupError);
    expect(err).toMatchObject({ message: "Dune execute failed (HTTP 403)", status: 403 });
  });

  it("fails when no execution id comes back", async () => {
    stubFetch(() => jsonResponse({}));
    await expect(fetchWalletReport(address, config().cfg)).rejects.toThrow("Failed to start Dune execution");
  });

  it("reports a failed execution with the service message", async () => {
    stubFetch(
      () => jsonResponse({ execution_id: "ex-3" }),
      () => jsonResponse({ state: "QUERY_STATE_FAILED", error: "query timed out upstream" })
    );
    await expect(fetchWalletReport(address, config().cfg)).rejects.toThrow("query timed out upstream");
  });

  it("gives up after the poll budget", async () => {
    stubFetch(
      () => jsonResponse({ execution_id: "ex-4" }),
      () => jsonResponse({ state: "QUERY_STATE_PENDING" }),
      () => jsonResponse({ state: "QUERY_STATE_EXECUTING" })
    );
    const { cfg, sleep } = config({ pollAttempts: 2, pollIntervalMs: 5 });
    await expect(fetchWalletReport(address, cfg)).rejects.toThrow("Timed out waiting for Dune execution");
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(5);
  });
});

describe("reportFromRows", () => {
  it("splits rows by section", () => {
    const report = reportFromRows([
      { section: "buyer_seller", role: "buyer" },
      { section: "summary", total_usd: 10 },
      { section: "buyer_seller", role: "seller" },
    ]);
    expect(report.summary?.total_usd).toBe(10);
    expect(report.buyer_seller).toHaveLength(2);
    expect(report.collections).toEqual([]);
  });

  it("leaves summary null when the query returned none", () => {
    expect(reportFromRows([{ section: "collection" }]).summary).toBeNull();
  });
});

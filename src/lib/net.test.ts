import { afterEach, describe, expect, it, vi } from "vitest";
import { fetchWithRetry, joinUrl, readJson } from "./net";

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("joinUrl", () => {
  it("joins with exactly one slash", () => {
    expect(joinUrl("", "api/wallet")).toBe("/api/wallet");
    expect(joinUrl("http://127.0.0.1:4076/", "/cards")).toBe("http://127.0.0.1:4076/cards");
  });
});

describe("fetchWithRetry", () => {
  it("retries server errors", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response("busy", { status: 503 }))
      .mockResolvedValueOnce(new Response("ok", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);
    const res = await fetchWithRetry("http://example.test/x", {}, { baseDelayMs: 0, jitter: false });
    expect(res.status).toBe(200);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("passes client errors straight through", async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response("bad", { status: 400 }));
    vi.stubGlobal("fetch", fetchMock);
    const res = await fetchWithRetry("http://example.test/x", {}, { baseDelayMs: 0 });
    expect(res.status).toBe(400);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("throws the last network error", async () => {
    const fetchMock = vi.fn().mockRejectedValue(new TypeError("offline"));
    vi.stubGlobal("fetch", fetchMock);
    await expect(fetchWithRetry("http://example.test/x", {}, { attempts: 2, baseDelayMs: 0 })).rejects.toThrow("offline");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});

describe("readJson", () => {
  it("returns null for empty or invalid bodies", async () => {
    expect(await readJson(new Response(""))).toBeNull();
    expect(await readJson(new Response("{bad"))).toBeNull();
    expect(await readJson(new Response('{"a":1}'))).toEqual({ a: 1 });
  });
});

import { beforeEach, describe, expect, it, vi } from "vitest";
import { NetworkError } from "../errors";
import { fetchPage } from "./fetcher";

const URL_UNDER_TEST = "https://www.example.hk/html/topic/index.html";

describe("fetchPage", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("returns the body and sends browser-like headers", async () => {
    const fetchMock = vi.fn(async () => new Response("<html>ok</html>", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const html = await fetchPage(URL_UNDER_TEST, { userAgent: "test-agent/1.0" });

    expect(html).toBe("<html>ok</html>");
    expect(fetchMock).toHaveBeenCalledWith(
      URL_UNDER_TEST,
      expect.objectContaining({
        headers: expect.objectContaining({
          "User-Agent": "test-agent/1.0",
          "Accept-Language": "zh-HK,zh;q=0.9,en-US;q=0.8,en;q=0.7",
        }),
      })
    );
  });

  it("rejects non-2xx responses with the status", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("gone", { status: 503 })));

    const err = await fetchPage(URL_UNDER_TEST).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NetworkError);
    expect(err).toMatchObject({ url: URL_UNDER_TEST, status: 503 });
  });

  it("wraps connection failures", async () => {
    const cause = new TypeError("fetch failed");
    vi.stubGlobal("fetch", vi.fn(async () => {
      throw cause;
    }));

    const err = await fetchPage(URL_UNDER_TEST).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NetworkError);
    expect(err).toHaveProperty("message", `요청 실패: ${URL_UNDER_TEST}`);
    expect(err).toHaveProperty("cause", cause);
  });

  it("aborts after the timeout", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        (_url: string, init: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
          })
      )
    );

    await expect(fetchPage(URL_UNDER_TEST, { timeoutMs: 10 })).rejects.toThrow(
      `타임아웃 (10ms): ${URL_UNDER_TEST}`
    );
  });
});

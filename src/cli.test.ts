import fsSync from "node:fs";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { main, parseCliArgs } from "./cli";

async function makeOutputPath() {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "feed-cli-"));
  return {
    output: path.join(dir, "feed.xml"),
    cleanup: async () => {
      await fs.rm(dir, { recursive: true, force: true });
    },
  };
}

describe("parseCliArgs", () => {
  it("maps flags onto config overrides", () => {
    expect(
      parseCliArgs(["--output", "out/feed.xml", "--source", "https://www.example.hk/t", "--max-items", "10", "--timeout", "500"])
    ).toEqual({
      help: false,
      overrides: {
        FEED_OUTPUT: "out/feed.xml",
        FEED_SOURCE_URL: "https://www.example.hk/t",
        FEED_MAX_ITEMS: "10",
        FETCH_TIMEOUT_MS: "500",
      },
    });
  });

  it("accepts short flags", () => {
    expect(parseCliArgs(["-o", "feed.xml", "-h"])).toEqual({
      help: true,
      overrides: { FEED_OUTPUT: "feed.xml" },
    });
  });

  it("rejects unknown flags", () => {
    expect(() => parseCliArgs(["--verbose"])).toThrow();
  });
});

describe("main", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("prints usage for --help", async () => {
    expect(await main(["--help"], {})).toBe(0);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining("Usage: feed-updater"));
  });

  it("exits with 1 on bad arguments", async () => {
    expect(await main(["extra-positional"], {})).toBe(1);
  });

  it("writes the feed to --output and exits with 0", async () => {
    const out = await makeOutputPath();
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(`<li><a href="/a/1.html">A commentary headline</a> 2026-10-15</li>`, { status: 200 }))
    );

    const code = await main(["--output", out.output, "--source", "https://www.example.hk/topic"], {});

    expect(code).toBe(0);
    expect(await fs.readFile(out.output, "utf-8")).toContain(
      "<link>https://www.example.hk/a/1.html</link>"
    );
    await out.cleanup();
  });

  it("exits with 1 when the page cannot be fetched", async () => {
    const out = await makeOutputPath();
    vi.stubGlobal("fetch", vi.fn(async () => new Response("nope", { status: 404 })));

    expect(await main(["--output", out.output], {})).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      "[cli] NetworkError: HTTP 404: https://www.orangenews.hk/html/topic/index.html"
    );
    await out.cleanup();
  });

  it("exits with 1 when the feed cannot be written", async () => {
    const out = await makeOutputPath();
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(`<li><a href="/a/1.html">A commentary headline</a> 2026-10-15</li>`, { status: 200 }))
    );
    vi.spyOn(fsSync.promises, "rename").mockRejectedValue(new Error("disk full"));

    expect(await main(["--output", out.output], {})).toBe(1);
    expect(console.error).toHaveBeenCalledWith(`[cli] WriteError: 피드 파일 쓰기 실패: ${out.output}`);
    await expect(fs.access(out.output)).rejects.toThrow();
    expect(await fs.readdir(path.dirname(out.output))).toEqual([]);
    await out.cleanup();
  });

  it("exits with 1 and keeps a corrupt feed as it is", async () => {
    const out = await makeOutputPath();
    await fs.writeFile(out.output, "<rss><channel>broken", "utf-8");
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(`<li><a href="/a/1.html">A commentary headline</a> 2026-10-15</li>`, { status: 200 }))
    );

    expect(await main(["--output", out.output], {})).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      `[cli] FeedReadError: 기존 피드 파싱 실패: ${out.output}`
    );
    expect(await fs.readFile(out.output, "utf-8")).toBe("<rss><channel>broken");
    await out.cleanup();
  });

  it("exits with 1 on invalid configuration", async () => {
    expect(await main([], { FEED_MAX_ITEMS: "lots" })).toBe(1);
  });
});

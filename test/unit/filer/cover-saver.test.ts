import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import pino from "pino";

import { CoverSaver } from "../../../src/filer/cover-saver.js";

describe("CoverSaver", () => {
  const originalFetch = globalThis.fetch;
  let mockFetch: Mock<typeof fetch>;
  let dir: string;

  beforeEach(async () => {
    mockFetch = vi.fn<typeof fetch>();
    globalThis.fetch = mockFetch;
    dir = await mkdtemp(path.join(os.tmpdir(), "covers-"));
  });

  afterEach(async () => {
    globalThis.fetch = originalFetch;
    await rm(dir, { recursive: true, force: true });
  });

  const saver = () => new CoverSaver({ logger: pino({ level: "silent" }) });

  it("prefers the large image and falls back on failure", async () => {
    mockFetch
      .mockResolvedValueOnce(new Response(null, { status: 404 }))
      .mockResolvedValueOnce(new Response("thumb", { status: 200 }));

    const target = await saver().save(
      {
        small: "https://covers.example.test/s.jpg",
        thumbnail: "https://covers.example.test/m.jpg",
        large: "https://covers.example.test/l.jpg",
      },
      dir,
      "Frank Herbert - Dune",
    );

    expect(mockFetch.mock.calls.map((call) => call[0])).toEqual([
      "https://covers.example.test/l.jpg",
      "https://covers.example.test/m.jpg",
    ]);
    expect(target).toBe(path.join(dir, "Frank Herbert - Dune.jpg"));
    expect(await readFile(path.join(dir, "Frank Herbert - Dune.jpg"), "utf-8")).toBe("thumb");
  });

  it("returns null when every download fails", async () => {
    mockFetch.mockRejectedValue(new TypeError("fetch failed"));

    await expect(
      saver().save({ thumbnail: "https://covers.example.test/m.jpg" }, dir, "x"),
    ).resolves.toBeNull();
  });

  it("returns null without trying when there are no URLs", async () => {
    await expect(saver().save({}, dir, "x")).resolves.toBeNull();
    expect(mockFetch).not.toHaveBeenCalled();
  });
});

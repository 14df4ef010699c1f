import { type Mock, afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ChapterFetchError, ExtractionError, PlanningError } from "./errors.js";
import { parseLinks } from "./links.js";
import {
  type ChapterSource,
  type ChapterStore,
  DEFAULT_CONFIG,
  FetchOrchestrator,
  type OrchestratorConfig,
  buildFetchPlan,
  normalizePriority,
  planFetch,
  politenessDelay,
  resolvePriority,
} from "./orchestrator.js";
import type { ChapterContent, ChapterLinkIndex, ExtractedChapter, FetchPlanEntry } from "./types.js";

function indexOf(entries: Record<number, Record<string, string>>): ChapterLinkIndex {
  return new Map(
    Object.entries(entries).map(([chapter, bySource]) => [Number(chapter), new Map(Object.entries(bySource))]),
  );
}

describe("normalizePriority", () => {
  it("drops duplicates and keeps the first occurrence", () => {
    expect(normalizePriority(["@b", "@a", "@b"])).toEqual(["@b", "@a"]);
  });
});

describe("resolvePriority", () => {
  const known = ["@a", "@b", "@c"];

  it("uses every known source when nothing is preferred", () => {
    expect(resolvePriority([], known)).toEqual(["@a", "@b", "@c"]);
    expect(resolvePriority([], known, true)).toEqual(["@a", "@b", "@c"]);
  });

  it("puts preferred sources first and appends the rest", () => {
    expect(resolvePriority(["@c", "@a"], known)).toEqual(["@c", "@a", "@b"]);
  });

  it("keeps only the preferred sources when exclusive", () => {
    expect(resolvePriority(["@c", "@a", "@c"], known, true)).toEqual(["@c", "@a"]);
  });

  it("keeps a preferred source the file does not list", () => {
    expect(resolvePriority(["@z"], known)).toEqual(["@z", "@a", "@b", "@c"]);
  });
});

describe("buildFetchPlan", () => {
  const index = indexOf({ 1: { A: "url1", B: "url2" }, 2: { B: "url3" } });

  it("picks the highest-priority source per chapter", () => {
    expect(buildFetchPlan(index, 1, 2, ["A", "B"])).toEqual({
      entries: [
        { chapter: 1, url: "url1", source: "A" },
        { chapter: 2, url: "url3", source: "B" },
      ],
      missing: [],
    });
  });

  it("follows the order of the priority list", () => {
    expect(buildFetchPlan(index, 1, 1, ["B", "A"]).entries).toEqual([{ chapter: 1, url: "url2", source: "B" }]);
  });

  it("lists chapters no prioritized source covers", () => {
    expect(buildFetchPlan(index, 1, 2, ["C"])).toEqual({ entries: [], missing: [1, 2] });
  });

  it("treats chapters absent from the index as missing", () => {
    expect(buildFetchPlan(index, 2, 4, ["A", "B"]).missing).toEqual([3, 4]);
  });

  it("rejects an inverted range", () => {
    expect(() => buildFetchPlan(index, 3, 2, ["A"])).toThrow(RangeError);
  });
});

describe("planFetch", () => {
  const { index } = parseLinks("Глава 5 (https://host/@a/x)\nГлава 6 (https://host/@b/y)", { host: "host" });

  it("plans a fully covered range", () => {
    expect(planFetch(index, 5, 6, ["@a", "@b"])).toEqual([
      { chapter: 5, url: "https://host/@a/x", source: "@a" },
      { chapter: 6, url: "https://host/@b/y", source: "@b" },
    ]);
  });

  it("throws PlanningError listing every gap", () => {
    const error = (() => {
      try {
        planFetch(index, 5, 7, ["@a", "@b"]);
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(PlanningError);
    expect(error).toMatchObject({ missing: [7] });
  });
});

describe("politenessDelay", () => {
  it("scales the random value into the range", () => {
    expect(politenessDelay(3000, 7000, () => 0)).toBe(3000);
    expect(politenessDelay(3000, 7000, () => 0.5)).toBe(5000);
  });

  it("returns the bound when min equals max", () => {
    expect(politenessDelay(100, 100, () => 0.9)).toBe(100);
  });
});

class MemoryStore implements ChapterStore {
  records = new Map<number, ExtractedChapter>();
  puts: number[] = [];

  async get(chapter: number): Promise<ExtractedChapter | null> {
    return this.records.get(chapter) ?? null;
  }

  async put(chapter: ExtractedChapter): Promise<void> {
    this.puts.push(chapter.chapter);
    this.records.set(chapter.chapter, chapter);
  }
}

function content(title: string): ChapterContent {
  return { title, blocks: [`<p>${title}</p>`], images: [] };
}

const PLAN: FetchPlanEntry[] = [
  { chapter: 3, url: "https://teletype.in/@a/3", source: "@a" },
  { chapter: 1, url: "https://teletype.in/@a/1", source: "@a" },
  { chapter: 2, url: "https://teletype.in/@b/2", source: "@b" },
];

describe("FetchOrchestrator", () => {
  const config: OrchestratorConfig = { ...DEFAULT_CONFIG, delayMinMs: 3000, delayMaxMs: 7000, retryDelayMs: 2000 };
  let store: MemoryStore;
  let extract: Mock<ChapterSource["extract"]>;
  let sleep: Mock<(ms: number) => Promise<void>>;
  let orchestrator: FetchOrchestrator;

  beforeEach(() => {
    vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});

    store = new MemoryStore();
    extract = vi.fn<ChapterSource["extract"]>(async (url) => content(url.slice(url.lastIndexOf("/") + 1)));
    sleep = vi.fn<(ms: number) => Promise<void>>(async () => {});
    orchestrator = new FetchOrchestrator(config, { extractor: { extract }, cache: store, sleep, random: () => 0.5 });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("fetches every chapter, caches it and returns them sorted", async () => {
    const chapters = await orchestrator.run(PLAN);

    expect(chapters.map((chapter) => chapter.chapter)).toEqual([1, 2, 3]);
    expect(chapters[0]).toEqual({ chapter: 1, title: "1", blocks: ["<p>1</p>"], images: [] });
    expect(extract.mock.calls.map(([url]) => url)).toEqual([
      "https://teletype.in/@a/3",
      "https://teletype.in/@a/1",
      "https://teletype.in/@b/2",
    ]);
    expect(store.puts).toEqual([3, 1, 2]);
  });

  it("passes the image setting to the extractor", async () => {
    const textOnly = new FetchOrchestrator(
      { ...config, includeImages: false },
      { extractor: { extract }, cache: store, sleep, random: () => 0.5 },
    );

    await textOnly.run(PLAN.slice(0, 1));

    expect(extract).toHaveBeenCalledWith("https://teletype.in/@a/3", false);
  });

  it("sleeps a politeness delay only between network fetches", async () => {
    await orchestrator.run(PLAN);

    expect(sleep.mock.calls).toEqual([[5000], [5000]]);
  });

  it("uses cached chapters without touching the network", async () => {
    store.records.set(1, { chapter: 1, title: "cached", blocks: ["<p>cached</p>"], images: [] });

    const chapters = await orchestrator.run(PLAN);

    expect(chapters[0].title).toBe("cached");
    expect(extract).toHaveBeenCalledTimes(2);
    expect(extract).not.toHaveBeenCalledWith("https://teletype.in/@a/1", true);
    expect(store.puts).toEqual([3, 2]);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it("makes no network calls when everything is cached", async () => {
    for (const { chapter } of PLAN) {
      store.records.set(chapter, { chapter, title: `c${chapter}`, blocks: [], images: [] });
    }

    const chapters = await orchestrator.run(PLAN);

    expect(chapters.map((chapter) => chapter.title)).toEqual(["c1", "c2", "c3"]);
    expect(extract).not.toHaveBeenCalled();
    expect(sleep).not.toHaveBeenCalled();
  });

  it("retries a failing chapter with a fixed pause", async () => {
    extract
      .mockRejectedValueOnce(new ExtractionError("u", "timeout"))
      .mockRejectedValueOnce(new ExtractionError("u", "timeout"));

    const chapters = await orchestrator.run(PLAN.slice(0, 1));

    expect(chapters).toHaveLength(1);
    expect(extract).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[2000], [2000]]);
  });

  it("aborts with ChapterFetchError after the last attempt and fetches nothing later", async () => {
    const cause = new ExtractionError("https://teletype.in/@a/1", "No chapter content found");
    extract.mockImplementation(async (url) => {
      if (url.endsWith("/1")) throw cause;
      return content("ok");
    });

    const error = await orchestrator.run(PLAN).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ChapterFetchError);
    expect(error).toMatchObject({ chapter: 1, url: "https://teletype.in/@a/1", attempts: 3, cause });
    expect(extract.mock.calls.map(([url]) => url)).toEqual([
      "https://teletype.in/@a/3",
      "https://teletype.in/@a/1",
      "https://teletype.in/@a/1",
      "https://teletype.in/@a/1",
    ]);
    expect(store.puts).toEqual([3]);
  });

  it("rejects inverted delay bounds", () => {
    expect(
      () => new FetchOrchestrator({ ...config, delayMinMs: 5, delayMaxMs: 1 }, { extractor: { extract }, cache: store }),
    ).toThrow(RangeError);
  });

  it("rejects fewer than one attempt", () => {
    expect(() => new FetchOrchestrator({ ...config, maxAttempts: 0 }, { extractor: { extract }, cache: store })).toThrow(
      RangeError,
    );
  });
});

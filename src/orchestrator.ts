/**
 * Fetch Orchestrator: resolve source priority into a fetch plan and execute it
 * against the cache and the content extractor, one chapter at a time.
 */

import { ChapterFetchError, PlanningError } from "./errors.js";
import type { ChapterContent, ChapterLinkIndex, ExtractedChapter, FetchPlan, FetchPlanEntry } from "./types.js";
import { delay, displayTitle, progressBar } from "./utils.js";

/** Settings for a fetch run */
export interface OrchestratorConfig {
  /** Download images referenced by chapters */
  includeImages: boolean;
  /** Politeness delay bounds between network fetches (ms) */
  delayMinMs: number;
  delayMaxMs: number;
  /** Attempts per chapter before the run is aborted */
  maxAttempts: number;
  /** Fixed pause between attempts (ms) */
  retryDelayMs: number;
}

export const DEFAULT_CONFIG: OrchestratorConfig = {
  includeImages: true,
  delayMinMs: 3000,
  delayMaxMs: 7000,
  maxAttempts: 3,
  retryDelayMs: 2000,
};

/** Anything that can turn a chapter URL into content */
export interface ChapterSource {
  extract(url: string, includeImages: boolean): Promise<ChapterContent>;
}

/** Persistent chapter store consulted before the network */
export interface ChapterStore {
  get(chapter: number): Promise<ExtractedChapter | null>;
  put(chapter: ExtractedChapter): Promise<void>;
}

export interface OrchestratorDeps {
  extractor: ChapterSource;
  cache: ChapterStore;
  /** Defaults to a real timer */
  sleep?: (ms: number) => Promise<void>;
  /** Uniform random in [0, 1); defaults to Math.random */
  random?: () => number;
}

/**
 * Remove duplicate handles, keeping the first occurrence.
 */
export function normalizePriority(priority: string[]): string[] {
  return [...new Set(priority)];
}

/**
 * Source order for a run: the preferred handles first, then the remaining
 * known sources in their listed order. With `exclusive`, only the preferred ones.
 * No preference means every known source.
 */
export function resolvePriority(preferred: string[], known: string[], exclusive = false): string[] {
  if (preferred.length === 0) return [...known];
  if (exclusive) return normalizePriority(preferred);
  return normalizePriority([...preferred, ...known]);
}

/**
 * Resolve every chapter in [start, end] to the URL of its highest-priority source.
 *
 * @example
 * // index {1: {A: u1, B: u2}, 2: {B: u3}}, priority [A, B]
 * buildFetchPlan(index, 1, 2, ['A', 'B']).entries // [{1, u1, A}, {2, u3, B}]
 */
export function buildFetchPlan(index: ChapterLinkIndex, start: number, end: number, priority: string[]): FetchPlan {
  if (start > end) {
    throw new RangeError(`Start chapter ${start} is after end chapter ${end}`);
  }

  const sources = normalizePriority(priority);
  const entries: FetchPlanEntry[] = [];
  const missing: number[] = [];

  for (let chapter = start; chapter <= end; chapter++) {
    const bySource = index.get(chapter);
    const source = bySource ? sources.find((handle) => bySource.has(handle)) : undefined;
    const url = source !== undefined ? bySource?.get(source) : undefined;

    if (source !== undefined && url !== undefined) {
      entries.push({ chapter, url, source });
    } else {
      missing.push(chapter);
    }
  }

  return { entries, missing };
}

/**
 * Like buildFetchPlan, but a gap anywhere in the range is fatal.
 *
 * @throws {PlanningError} Listing every chapter no prioritized source covers
 */
export function planFetch(index: ChapterLinkIndex, start: number, end: number, priority: string[]): FetchPlanEntry[] {
  const plan = buildFetchPlan(index, start, end, priority);
  if (plan.missing.length > 0) {
    throw new PlanningError(plan.missing);
  }
  return plan.entries;
}

/**
 * Random politeness delay in [min, max].
 */
export function politenessDelay(min: number, max: number, random: () => number = Math.random): number {
  return min + random() * (max - min);
}

export class FetchOrchestrator {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(
    readonly config: OrchestratorConfig,
    private readonly deps: OrchestratorDeps,
  ) {
    if (config.delayMinMs > config.delayMaxMs) {
      throw new RangeError(`delayMinMs (${config.delayMinMs}) exceeds delayMaxMs (${config.delayMaxMs})`);
    }
    if (config.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be at least 1, got ${config.maxAttempts}`);
    }
    this.sleep = deps.sleep ?? delay;
    this.random = deps.random ?? Math.random;
  }

  /**
   * Resolve every plan entry from the cache or the network.
   * Cached chapters are used as stored, whatever includeImages says now.
   *
   * @returns All chapters, sorted by chapter number
   * @throws {ChapterFetchError} If a chapter fails on every attempt; nothing after it is fetched
   */
  async run(plan: FetchPlanEntry[]): Promise<ExtractedChapter[]> {
    const results: ExtractedChapter[] = [];
    const uncached: FetchPlanEntry[] = [];

    for (const entry of plan) {
      const cached = await this.deps.cache.get(entry.chapter);
      if (cached) {
        console.log(`Chapter ${entry.chapter} loaded from cache.`);
        results.push(cached);
      } else {
        uncached.push(entry);
      }
    }

    if (uncached.length > 0) {
      console.log(`\nFetching ${uncached.length} chapter(s)...\n`);
    }

    for (let i = 0; i < uncached.length; i++) {
      const entry = uncached[i];
      const chapter = await this.fetchChapter(entry);
      await this.deps.cache.put(chapter);
      results.push(chapter);

      progressBar(i + 1, uncached.length, displayTitle(chapter));

      if (i < uncached.length - 1) {
        await this.sleep(politenessDelay(this.config.delayMinMs, this.config.delayMaxMs, this.random));
      }
    }

    return results.sort((a, b) => a.chapter - b.chapter);
  }

  /**
   * Extract one chapter with a fixed pause between attempts.
   */
  private async fetchChapter(entry: FetchPlanEntry): Promise<ExtractedChapter> {
    const { maxAttempts, retryDelayMs, includeImages } = this.config;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const content = await this.deps.extractor.extract(entry.url, includeImages);
        return { chapter: entry.chapter, ...content };
      } catch (error) {
        lastError = error;
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`\n  ⚠ Chapter ${entry.chapter}, attempt ${attempt}/${maxAttempts} failed: ${message}`);
        if (attempt < maxAttempts) {
          await this.sleep(retryDelayMs);
        }
      }
    }

    throw new ChapterFetchError(entry.chapter, entry.url, maxAttempts, { cause: lastError });
  }
}

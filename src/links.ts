/**
 * Build the chapter → source → URL index from a free-form links listing
 *
 * A listing is any text containing lines like:
 *   Глава 310 (https://teletype.in/@cult/chapter-310)
 * Everything that does not look like that is ignored.
 */

import * as fs from "node:fs/promises";
import { EmptyLinkIndexError } from "./errors.js";
import type { ChapterLinkIndex } from "./types.js";
import { escapeRegex } from "./utils.js";

/** Publishing host the listings point at */
export const DEFAULT_HOST = "teletype.in";

export interface ParseLinksOptions {
  /** Host the chapter URLs must belong to (default: teletype.in) */
  host?: string;
}

export interface ParsedLinks {
  index: ChapterLinkIndex;
  /** Distinct source handles, sorted */
  sources: string[];
}

function linkPattern(host: string): RegExp {
  // marker, number, rest of the line, then http(s)://host/@handle/slug
  return new RegExp(
    String.raw`(?:глава|chapter)\s+(\d+)[^\n]*?\(?(https?://${escapeRegex(host)}/(@[\w-]+)/[^\s)?]+)`,
    "gi",
  );
}

/**
 * Parse a links listing into a chapter index.
 * A later link for the same chapter and source replaces the earlier one.
 *
 * @example
 * const { index, sources } = parseLinks('Глава 5 (https://teletype.in/@a/x)');
 * index.get(5)?.get('@a') // 'https://teletype.in/@a/x'
 * sources // ['@a']
 */
export function parseLinks(text: string, options: ParseLinksOptions = {}): ParsedLinks {
  const index: ChapterLinkIndex = new Map();
  const sources = new Set<string>();

  for (const match of text.matchAll(linkPattern(options.host ?? DEFAULT_HOST))) {
    const [, num, url, source] = match;
    const chapter = parseInt(num, 10);

    let bySource = index.get(chapter);
    if (!bySource) {
      bySource = new Map();
      index.set(chapter, bySource);
    }
    bySource.set(source, url);
    sources.add(source);
  }

  return { index, sources: [...sources].sort() };
}

/**
 * Read and parse a links file.
 *
 * @throws {EmptyLinkIndexError} If the file contains no chapter links
 */
export async function loadLinkIndex(path: string, options: ParseLinksOptions = {}): Promise<ParsedLinks> {
  const text = await fs.readFile(path, "utf-8");
  const parsed = parseLinks(text, options);
  if (parsed.index.size === 0) {
    throw new EmptyLinkIndexError(path);
  }
  return parsed;
}

/**
 * Count how many chapters each source provides.
 */
export function countChaptersBySource(index: ChapterLinkIndex, sources: string[]): Map<string, number> {
  const counts = new Map<string, number>(sources.map((source) => [source, 0]));
  for (const bySource of index.values()) {
    for (const source of bySource.keys()) {
      counts.set(source, (counts.get(source) ?? 0) + 1);
    }
  }
  return counts;
}

/**
 * Lowest and highest chapter number in the index, or null for an empty index.
 */
export function chapterRange(index: ChapterLinkIndex): { min: number; max: number } | null {
  if (index.size === 0) return null;
  const chapters = [...index.keys()];
  return { min: Math.min(...chapters), max: Math.max(...chapters) };
}

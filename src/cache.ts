/**
 * On-disk cache of extracted chapters, one JSON file per chapter number
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { ExtractedChapter } from "./types.js";

/** Default cache directory, relative to the working directory */
export const DEFAULT_CACHE_DIR = "cache";

/** Serialized image inside a cache record */
export interface CachedImage {
  filename: string;
  /** Base64-encoded image bytes */
  dataB64: string;
}

/** Durable form of an ExtractedChapter */
export interface CacheRecord {
  chapterNum: number;
  title: string;
  /** Blocks joined with '\n' (blocks themselves never contain a newline) */
  html: string;
  images: CachedImage[];
  hasImages: boolean;
}

/** Result of cache record validation */
export type CacheValidationResult = { isValid: true; record: CacheRecord } | { isValid: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate the structure of a parsed cache record.
 *
 * @example
 * validateCacheRecord({ title: 'x' }) // { isValid: false, error: 'Missing or invalid field: chapterNum (expected number)' }
 */
export function validateCacheRecord(data: unknown): CacheValidationResult {
  if (!isRecord(data)) {
    return { isValid: false, error: "cache record must be an object" };
  }

  const { chapterNum, title, html, images: rawImages, hasImages } = data;

  if (typeof chapterNum !== "number") {
    return { isValid: false, error: "Missing or invalid field: chapterNum (expected number)" };
  }

  if (typeof title !== "string") {
    return { isValid: false, error: "Missing or invalid field: title (expected string)" };
  }

  if (typeof html !== "string") {
    return { isValid: false, error: "Missing or invalid field: html (expected string)" };
  }

  if (!Array.isArray(rawImages)) {
    return { isValid: false, error: "Missing or invalid field: images (expected array)" };
  }

  const images: CachedImage[] = [];
  for (let i = 0; i < rawImages.length; i++) {
    const image: unknown = rawImages[i];
    if (!isRecord(image)) {
      return { isValid: false, error: `images[${i}] must be an object` };
    }
    const { filename, dataB64 } = image;
    if (typeof filename !== "string") {
      return { isValid: false, error: `images[${i}].filename must be a string` };
    }
    if (typeof dataB64 !== "string") {
      return { isValid: false, error: `images[${i}].dataB64 must be a string` };
    }
    images.push({ filename, dataB64 });
  }

  if (typeof hasImages !== "boolean") {
    return { isValid: false, error: "Missing or invalid field: hasImages (expected boolean)" };
  }

  return { isValid: true, record: { chapterNum, title, html, images, hasImages } };
}

export function toCacheRecord(chapter: ExtractedChapter): CacheRecord {
  return {
    chapterNum: chapter.chapter,
    title: chapter.title,
    html: chapter.blocks.join("\n"),
    images: chapter.images.map(({ filename, data }) => ({ filename, dataB64: data.toString("base64") })),
    hasImages: chapter.images.length > 0,
  };
}

export function fromCacheRecord(record: CacheRecord): ExtractedChapter {
  return {
    chapter: record.chapterNum,
    title: record.title,
    blocks: record.html.split("\n").filter((block) => block !== ""),
    images: record.images.map(({ filename, dataB64 }) => ({ filename, data: Buffer.from(dataB64, "base64") })),
  };
}

export class FetchCache {
  constructor(readonly dir: string = DEFAULT_CACHE_DIR) {}

  /** Path of the record for a chapter */
  pathFor(chapter: number): string {
    return path.join(this.dir, `chapter_${chapter}.json`);
  }

  /**
   * Load a cached chapter.
   * An unreadable or malformed record counts as a miss.
   *
   * @returns The cached chapter, or null on a miss
   */
  async get(chapter: number): Promise<ExtractedChapter | null> {
    const file = this.pathFor(chapter);

    let content: string;
    try {
      content = await fs.readFile(file, "utf-8");
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      console.warn(`  ⚠ Ignoring unreadable cache file ${file}`);
      return null;
    }

    const validation = validateCacheRecord(parsed);
    if (!validation.isValid) {
      console.warn(`  ⚠ Ignoring invalid cache file ${file}: ${validation.error}`);
      return null;
    }
    return fromCacheRecord(validation.record);
  }

  /**
   * Store a chapter, replacing any previous record for its number.
   */
  async put(chapter: ExtractedChapter): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    await fs.writeFile(this.pathFor(chapter.chapter), JSON.stringify(toCacheRecord(chapter)), "utf-8");
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

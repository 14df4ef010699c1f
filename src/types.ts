/**
 * Shared type definitions for the book builder
 */

/** Chapter number → source handle (e.g. '@cult') → chapter URL */
export type ChapterLinkIndex = Map<number, Map<string, string>>;

/** A single resolved fetch: which URL to load for a chapter */
export interface FetchPlanEntry {
  /** Chapter number */
  chapter: number;
  /** URL chosen by source priority */
  url: string;
  /** Source handle the URL belongs to */
  source: string;
}

/** Result of resolving a chapter range against a source priority */
export interface FetchPlan {
  /** Resolvable chapters in ascending order */
  entries: FetchPlanEntry[];
  /** Chapters no prioritized source covers, ascending */
  missing: number[];
}

/** An image referenced by chapter markup */
export interface ChapterImage {
  /** Content-addressed filename (e.g. 'img_<md5>.jpg') */
  filename: string;
  /** Raw image bytes */
  data: Buffer;
}

/** Structured content pulled from one chapter page */
export interface ChapterContent {
  /** Chapter title, empty when the page has none */
  title: string;
  /** Self-contained block-level markup fragments, in reading order */
  blocks: string[];
  /** Images referenced by the blocks */
  images: ChapterImage[];
}

/** Chapter content tagged with its number, as cached and assembled */
export interface ExtractedChapter extends ChapterContent {
  chapter: number;
}

/** Book-level metadata handed to the document assemblers */
export interface BookMeta {
  title: string;
  author: string;
  /** BCP 47 language tag (e.g. 'ru') */
  language: string;
  /** Cover image bytes (JPEG) */
  cover?: Buffer;
}

/**
 * Content Extractor: chapter URL → title, blocks and images.
 *
 * Pages come in two shapes depending on the platform's render path, so the
 * page is offered to each strategy in turn: the inlined application state
 * first, the rendered article markup second.
 */

import { domStrategy } from "./dom.js";
import { ExtractionError } from "./errors.js";
import {
  type ExtractionStrategy,
  type ParsedPage,
  cleanHtml,
  imageFilename,
  renderImageBlock,
  renderTextBlock,
} from "./extract.js";
import { type PageFetcher, httpFetcher } from "./http.js";
import { stateStrategy } from "./state.js";
import type { ChapterContent, ChapterImage } from "./types.js";

/** Strategies in the order they are tried */
export const DEFAULT_STRATEGIES: readonly ExtractionStrategy[] = [stateStrategy, domStrategy];

/** Parsed page plus the name of the strategy that recognized it */
export interface RecognizedPage extends ParsedPage {
  strategy: string;
}

export class ContentExtractor {
  constructor(
    private readonly fetcher: PageFetcher = httpFetcher,
    private readonly strategies: readonly ExtractionStrategy[] = DEFAULT_STRATEGIES,
  ) {}

  /**
   * Fetch a chapter page and extract its content.
   *
   * @param url - Chapter page URL
   * @param includeImages - When false, image elements are skipped entirely
   * @throws {ExtractionError} If the page cannot be loaded or no strategy recognizes it
   */
  async extract(url: string, includeImages: boolean): Promise<ChapterContent> {
    let html: string;
    try {
      html = await this.fetcher.fetchText(url);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ExtractionError(url, `Failed to load ${url}: ${message}`, { cause: error });
    }

    const page = this.recognize(html, url);
    if (!page) {
      throw new ExtractionError(url, `No chapter content found at ${url}`);
    }
    return await this.render(page, includeImages);
  }

  /**
   * Offer the page to each strategy in order; the first non-null result wins.
   */
  recognize(html: string, url: string): RecognizedPage | null {
    for (const strategy of this.strategies) {
      const page = strategy.parse(html, url);
      if (page) return { ...page, strategy: strategy.name };
    }
    return null;
  }

  /**
   * Turn parsed nodes into cleaned block markup, downloading images as needed.
   */
  async render(page: ParsedPage, includeImages: boolean): Promise<ChapterContent> {
    const blocks: string[] = [];
    const images: ChapterImage[] = [];
    const downloaded = new Set<string>();

    for (const node of page.nodes) {
      if (node.kind === "text") {
        const inner = cleanHtml(node.html);
        if (inner) blocks.push(renderTextBlock(node.tag, inner, node.centered));
        continue;
      }

      if (!includeImages) continue;

      const filename = imageFilename(node.url);
      if (!downloaded.has(filename)) {
        const data = await this.downloadImage(node.url);
        if (!data) continue;
        images.push({ filename, data });
        downloaded.add(filename);
      }
      blocks.push(renderImageBlock(filename));
    }

    return { title: page.title, blocks, images };
  }

  /**
   * Download an image; a failure only costs the chapter that image.
   *
   * @returns Image bytes, or null if the download failed
   */
  private async downloadImage(url: string): Promise<Buffer | null> {
    try {
      return await this.fetcher.fetchBytes(url);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`  ⚠ Image download failed, skipping: ${url} (${message})`);
      return null;
    }
  }
}

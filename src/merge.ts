/**
 * Merge extracted chapters into a single markdown document
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import TurndownService from "turndown";
import { collectImages } from "./epub.js";
import type { BookMeta, ExtractedChapter } from "./types.js";
import { displayTitle, generateAnchor } from "./utils.js";

const markdownConverter = new TurndownService({
  headingStyle: "atx",
  codeBlockStyle: "fenced",
});

// Remove script/style elements from conversion
markdownConverter.remove(["script", "style", "noscript", "iframe"]);

/**
 * Point chapter image references at the images/ directory beside the document.
 *
 * @example
 * fixImagePaths('![](images/img_1.png)') // '![](./images/img_1.png)'
 */
export function fixImagePaths(content: string): string {
  return content.replace(/\]\(images\//g, "](./images/");
}

/**
 * Generate a table of contents entry for a chapter.
 *
 * @param chapter - Chapter to link to
 * @param position - Zero-based position in the book
 * @returns Formatted TOC entry (e.g., '1. [Introduction](#introduction)')
 */
export function generateTocEntry(chapter: ExtractedChapter, position: number): string {
  const title = displayTitle(chapter);
  return `${position + 1}. [${title}](#${generateAnchor(title)})`;
}

/**
 * Convert one chapter to markdown, headed by its display title.
 */
export function chapterToMarkdown(chapter: ExtractedChapter): string {
  const body = markdownConverter.turndown(chapter.blocks.join("\n"));
  return `## ${displayTitle(chapter)}\n\n${fixImagePaths(body)}`;
}

/**
 * Render the whole book: title block, table of contents, then every chapter.
 */
export function renderMarkdownBook(chapters: ExtractedChapter[], meta: BookMeta): string {
  const parts: string[] = [];

  parts.push(`# ${meta.title}\n`);
  parts.push(`Author: ${meta.author}`);
  parts.push(`Chapters: ${chapters.length}`);
  parts.push("\n---\n");

  parts.push("## Table of Contents\n");
  chapters.forEach((chapter, i) => parts.push(generateTocEntry(chapter, i)));
  parts.push("\n---\n");

  for (const chapter of chapters) {
    parts.push(chapterToMarkdown(chapter));
    parts.push("\n---\n");
  }

  return parts.join("\n");
}

/**
 * Write the merged document and its images (into images/ next to it).
 */
export async function writeMarkdownBook(outputFile: string, chapters: ExtractedChapter[], meta: BookMeta): Promise<void> {
  const images = collectImages(chapters);
  if (images.length > 0) {
    const imagesDir = path.join(path.dirname(outputFile), "images");
    await fs.mkdir(imagesDir, { recursive: true });
    for (const image of images) {
      await fs.writeFile(path.join(imagesDir, image.filename), image.data);
    }
  }
  await fs.writeFile(outputFile, renderMarkdownBook(chapters, meta), "utf-8");
}

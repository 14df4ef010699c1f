/**
 * Building blocks shared by the page extraction strategies:
 * the parsed-page model, markup cleanup and image naming.
 */

import { createHash } from "node:crypto";

/** A block-level element pulled out of a chapter page, before cleanup */
export type PageNode =
  | { kind: "text"; tag: string; html: string; centered: boolean }
  | { kind: "image"; url: string };

/** What a strategy recognized on a chapter page */
export interface ParsedPage {
  title: string;
  nodes: PageNode[];
}

/**
 * One way of reading a chapter page.
 * Returns null when the page is not in the shape this strategy understands.
 */
export interface ExtractionStrategy {
  readonly name: string;
  parse(html: string, pageUrl: string): ParsedPage | null;
}

/** Tags emitted as text blocks */
export const TEXT_BLOCK_TAGS: ReadonlySet<string> = new Set([
  "p",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "blockquote",
  "ul",
  "ol",
  "div",
]);

const CENTER_STYLE = ' style="text-align:center;"';

/**
 * Strip platform noise from a block's inner markup.
 * Removes empty named anchors, comments and data-* attributes, then
 * collapses whitespace runs to a single space.
 *
 * @example
 * cleanHtml('<a name="h.1"></a>Hello  <b data-id="7">world</b>') // 'Hello <b>world</b>'
 */
export function cleanHtml(html: string): string {
  return html
    .replace(/<a\s+name="[^"]*"\s*>\s*<\/a\s*>/g, "")
    .replace(/<!--[\s\S]*?-->/g, "")
    .replace(/\s+data-[\w-]+="[^"]*"/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Deterministic image filename derived from the image URL (not its bytes).
 *
 * @example
 * imageFilename('https://img.example/a.jpeg') // 'img_<md5 of the URL>.jpg'
 */
export function imageFilename(url: string): string {
  const hash = createHash("md5").update(url).digest("hex");
  const ext = url.includes("jpeg") || url.includes("jpg") ? "jpg" : "png";
  return `img_${hash}.${ext}`;
}

export function renderTextBlock(tag: string, inner: string, centered: boolean): string {
  return `<${tag}${centered ? CENTER_STYLE : ""}>${inner}</${tag}>`;
}

export function renderImageBlock(filename: string): string {
  return `<p${CENTER_STYLE}><img src="images/${filename}" alt="" /></p>`;
}

/**
 * Rendered-DOM strategy: read the chapter from the server-rendered article markup.
 */

import * as cheerio from "cheerio";
import { type ExtractionStrategy, type PageNode, type ParsedPage, TEXT_BLOCK_TAGS } from "./extract.js";
import { resolveUrl } from "./utils.js";

const TITLE_SELECTOR = "h1.article__header_title";
const CONTENT_SELECTOR = "article.article__content";

function usableSrc(src: string | undefined): string | null {
  if (!src || src.startsWith("data:")) return null;
  return src;
}

/**
 * Find the image source inside a <figure>'s markup.
 * Lazy-loaded figures keep the real <img> inside <noscript>, which the
 * HTML parser leaves as raw text.
 */
export function figureImageSrc(figureHtml: string): string | null {
  const $ = cheerio.load(figureHtml, null, false);
  const img = $("img").first();
  const direct = usableSrc(img.attr("src")) ?? usableSrc(img.attr("data-src"));
  if (direct) return direct;

  const noscript = $("noscript").first();
  if (noscript.length === 0) return null;

  const fallback = cheerio.load(noscript.text(), null, false);
  return usableSrc(fallback("img").first().attr("src"));
}

export const domStrategy: ExtractionStrategy = {
  name: "dom",
  parse(html: string, pageUrl: string): ParsedPage | null {
    const $ = cheerio.load(html);
    const article = $(CONTENT_SELECTOR).first();
    if (article.length === 0) return null;

    const title = $(TITLE_SELECTOR).first().text().trim();
    const nodes: PageNode[] = [];

    for (const el of article.children().toArray()) {
      const tag = el.tagName.toLowerCase();
      const $el = $(el);

      if (tag === "figure") {
        const src = figureImageSrc($el.html() ?? "");
        const url = src ? resolveUrl(src, pageUrl) : null;
        if (url) nodes.push({ kind: "image", url });
        continue;
      }

      if (TEXT_BLOCK_TAGS.has(tag)) {
        nodes.push({
          kind: "text",
          tag,
          html: $el.html() ?? "",
          centered: $el.attr("data-align") === "center",
        });
      }
    }

    return { title, nodes };
  },
};

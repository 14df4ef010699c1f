/**
 * Structured-state strategy: read the chapter from the application state
 * the platform inlines into the page, e.g.
 *
 *   <script>window.__INITIAL_STATE__={"articles":{...}};(function(){...})()</script>
 *
 * The article body is a small HTML fragment where images are
 * `<image src="...">` elements and centering is `align="center"`.
 */

import * as cheerio from "cheerio";
import { type ExtractionStrategy, type PageNode, type ParsedPage, TEXT_BLOCK_TAGS } from "./extract.js";
import { resolveUrl } from "./utils.js";

export const STATE_MARKER = "window.__INITIAL_STATE__=";

/** The payload ends at whichever of these comes first */
const STATE_TERMINATORS = [";(function", "</script>"];

/** The fields of an article record the strategy uses */
export interface StateArticle {
  title: string;
  text: string;
}

/**
 * Cut the serialized state out of a page.
 *
 * @returns The payload source, or null if the marker or its end is missing
 */
export function extractStatePayload(html: string): string | null {
  const markerAt = html.indexOf(STATE_MARKER);
  if (markerAt === -1) return null;

  const start = markerAt + STATE_MARKER.length;
  let end = -1;
  for (const terminator of STATE_TERMINATORS) {
    const at = html.indexOf(terminator, start);
    if (at !== -1 && (end === -1 || at < end)) end = at;
  }
  if (end === -1) return null;

  return html.slice(start, end).trim().replace(/;$/, "");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Depth-first search for the first record that has string `title` and `text`.
 */
export function findArticle(state: unknown): StateArticle | null {
  if (Array.isArray(state)) {
    for (const item of state) {
      const found = findArticle(item);
      if (found) return found;
    }
    return null;
  }
  if (!isRecord(state)) return null;

  if (typeof state.title === "string" && typeof state.text === "string") {
    return { title: state.title, text: state.text };
  }
  for (const value of Object.values(state)) {
    const found = findArticle(value);
    if (found) return found;
  }
  return null;
}

/**
 * Split an article body fragment into page nodes.
 */
export function parseArticleBody(body: string, pageUrl: string): PageNode[] {
  // htmlparser2 keeps <image> as is (parse5 would rewrite it to <img>) and
  // still closes void elements like <br> and <hr>
  const $ = cheerio.load(
    body,
    { xml: { xmlMode: false, recognizeSelfClosing: true, encodeEntities: "utf8" } },
    false,
  );
  const nodes: PageNode[] = [];

  for (const el of $.root().children().toArray()) {
    const tag = el.tagName.toLowerCase();
    const $el = $(el);

    if (tag === "image") {
      const src = $el.attr("src");
      const url = src ? resolveUrl(src, pageUrl) : null;
      if (url) nodes.push({ kind: "image", url });
      continue;
    }

    if (TEXT_BLOCK_TAGS.has(tag)) {
      nodes.push({
        kind: "text",
        tag,
        html: $el.html() ?? "",
        centered: $el.attr("align") === "center",
      });
    }
  }

  return nodes;
}

export const stateStrategy: ExtractionStrategy = {
  name: "state",
  parse(html: string, pageUrl: string): ParsedPage | null {
    const payload = extractStatePayload(html);
    if (payload === null) return null;

    let state: unknown;
    try {
      state = JSON.parse(payload);
    } catch {
      return null;
    }

    const article = findArticle(state);
    if (!article) return null;

    return { title: article.title.trim(), nodes: parseArticleBody(article.text, pageUrl) };
  },
};

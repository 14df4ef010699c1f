/**
 * HTTP helpers for chapter pages and images
 */

import { HttpError } from "./errors.js";

/**
 * Realistic Chrome user agent to avoid bot detection.
 * Matches a recent stable Chrome version on Windows.
 */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

/** Timeout for chapter page requests (ms) */
export const PAGE_TIMEOUT = 60000;

/** Timeout for image downloads (ms) */
export const IMAGE_TIMEOUT = 30000;

/** Fetches the network resources the extractor needs */
export interface PageFetcher {
  fetchText(url: string): Promise<string>;
  fetchBytes(url: string): Promise<Buffer>;
}

async function get(url: string, timeout: number): Promise<Response> {
  const response = await fetch(url, {
    headers: {
      "User-Agent": DEFAULT_USER_AGENT,
      Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8",
      "Accept-Language": "ru-RU,ru;q=0.9,en;q=0.8",
    },
    redirect: "follow",
    signal: AbortSignal.timeout(timeout),
  });
  if (!response.ok) {
    throw new HttpError(url, response.status, response.statusText);
  }
  return response;
}

/**
 * GET a page and return its body as text.
 *
 * @throws {HttpError} On a non-2xx status
 */
export async function fetchText(url: string, timeout = PAGE_TIMEOUT): Promise<string> {
  const response = await get(url, timeout);
  return await response.text();
}

/**
 * GET a binary resource.
 *
 * @throws {HttpError} On a non-2xx status
 */
export async function fetchBytes(url: string, timeout = IMAGE_TIMEOUT): Promise<Buffer> {
  const response = await get(url, timeout);
  return Buffer.from(await response.arrayBuffer());
}

/** Fetcher backed by the global fetch */
export const httpFetcher: PageFetcher = {
  fetchText: (url) => fetchText(url),
  fetchBytes: (url) => fetchBytes(url),
};

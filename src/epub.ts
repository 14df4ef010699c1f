/**
 * Package extracted chapters as an EPUB 3 book (with an EPUB 2 NCX for older readers)
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import * as cheerio from "cheerio";
import JSZip from "jszip";
import sharp from "sharp";
import type { BookMeta, ChapterImage, ExtractedChapter } from "./types.js";
import { displayTitle } from "./utils.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const STYLES_FILE = path.join(__dirname, "styles.css");

const CONTAINER_XML = `<?xml version="1.0" encoding="UTF-8"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>
`;

/**
 * Escape text for XML content and attribute values.
 */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * Re-serialize HTML block markup as well-formed XHTML
 * (self-closed void elements, no HTML-only named entities).
 */
export function toXhtml(html: string): string {
  const $ = cheerio.load(html, null, false);
  return $.xml();
}

export function imageMediaType(filename: string): string {
  return filename.endsWith(".png") ? "image/png" : "image/jpeg";
}

export function chapterFilename(chapter: number): string {
  return `chapter_${chapter}.xhtml`;
}

/**
 * Images of all chapters, each filename once, in first-seen order.
 */
export function collectImages(chapters: ExtractedChapter[]): ChapterImage[] {
  const seen = new Map<string, ChapterImage>();
  for (const chapter of chapters) {
    for (const image of chapter.images) {
      if (!seen.has(image.filename)) seen.set(image.filename, image);
    }
  }
  return [...seen.values()];
}

/**
 * Normalize a cover image to JPEG, flattening transparency onto white.
 */
export async function prepareCover(data: Buffer): Promise<Buffer> {
  return await sharp(data)
    .flatten({ background: { r: 255, g: 255, b: 255 } })
    .jpeg({ quality: 90 })
    .toBuffer();
}

function xhtmlDocument(title: string, language: string, body: string): string {
  return `<?xml version="1.0" encoding="utf-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops" lang="${escapeXml(language)}" xml:lang="${escapeXml(language)}">
<head>
  <title>${escapeXml(title)}</title>
  <link rel="stylesheet" type="text/css" href="style/default.css"/>
</head>
<body>
${body}
</body>
</html>
`;
}

export function renderChapter(chapter: ExtractedChapter, language: string): string {
  const title = displayTitle(chapter);
  const body = [`<h1>${escapeXml(title)}</h1>`, ...chapter.blocks.map(toXhtml)].join("\n");
  return xhtmlDocument(title, language, body);
}

function renderNav(chapters: ExtractedChapter[], meta: BookMeta): string {
  const items = chapters
    .map((chapter) => `      <li><a href="${chapterFilename(chapter.chapter)}">${escapeXml(displayTitle(chapter))}</a></li>`)
    .join("\n");
  return xhtmlDocument(
    meta.title,
    meta.language,
    `<nav epub:type="toc" id="toc">
  <h1>${escapeXml(meta.title)}</h1>
  <ol>
${items}
  </ol>
</nav>`,
  );
}

function renderNcx(chapters: ExtractedChapter[], meta: BookMeta, identifier: string): string {
  const points = chapters
    .map(
      (chapter, i) => `    <navPoint id="ch${chapter.chapter}" playOrder="${i + 1}">
      <navLabel><text>${escapeXml(displayTitle(chapter))}</text></navLabel>
      <content src="${chapterFilename(chapter.chapter)}"/>
    </navPoint>`,
    )
    .join("\n");
  return `<?xml version="1.0" encoding="UTF-8"?>
<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1">
  <head>
    <meta name="dtb:uid" content="${escapeXml(identifier)}"/>
    <meta name="dtb:depth" content="1"/>
    <meta name="dtb:totalPageCount" content="0"/>
    <meta name="dtb:maxPageNumber" content="0"/>
  </head>
  <docTitle><text>${escapeXml(meta.title)}</text></docTitle>
  <navMap>
${points}
  </navMap>
</ncx>
`;
}

function renderOpf(
  chapters: ExtractedChapter[],
  images: ChapterImage[],
  meta: BookMeta,
  identifier: string,
  modified: Date,
): string {
  const manifest = [
    `<item id="nav" href="nav.xhtml" media-type="application/xhtml+xml" properties="nav"/>`,
    `<item id="ncx" href="toc.ncx" media-type="application/x-dtbncx+xml"/>`,
    `<item id="style" href="style/default.css" media-type="text/css"/>`,
  ];
  const spine: string[] = [];

  if (meta.cover) {
    manifest.push(`<item id="cover-image" href="cover.jpg" media-type="image/jpeg" properties="cover-image"/>`);
    manifest.push(`<item id="cover" href="cover.xhtml" media-type="application/xhtml+xml"/>`);
    spine.push(`<itemref idref="cover"/>`);
  }
  spine.push(`<itemref idref="nav"/>`);

  images.forEach((image, i) => {
    manifest.push(`<item id="img${i + 1}" href="images/${image.filename}" media-type="${imageMediaType(image.filename)}"/>`);
  });
  for (const chapter of chapters) {
    manifest.push(`<item id="ch${chapter.chapter}" href="${chapterFilename(chapter.chapter)}" media-type="application/xhtml+xml"/>`);
    spine.push(`<itemref idref="ch${chapter.chapter}"/>`);
  }

  // dcterms:modified wants second precision
  const timestamp = modified.toISOString().replace(/\.\d{3}Z$/, "Z");

  return `<?xml version="1.0" encoding="UTF-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="book-id">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
    <dc:identifier id="book-id">${escapeXml(identifier)}</dc:identifier>
    <dc:title>${escapeXml(meta.title)}</dc:title>
    <dc:creator>${escapeXml(meta.author)}</dc:creator>
    <dc:language>${escapeXml(meta.language)}</dc:language>
    <meta property="dcterms:modified">${timestamp}</meta>${meta.cover ? `\n    <meta name="cover" content="cover-image"/>` : ""}
  </metadata>
  <manifest>
    ${manifest.join("\n    ")}
  </manifest>
  <spine toc="ncx">
    ${spine.join("\n    ")}
  </spine>
</package>
`;
}

export interface BuildEpubOptions {
  /** Fixed identifier (default: random urn:uuid) */
  identifier?: string;
  /** Modification timestamp (default: now) */
  modified?: Date;
  /** Stylesheet content (default: styles.css beside this module) */
  stylesheet?: string;
}

/**
 * Assemble chapters into an EPUB archive.
 * Chapters are written in the order given; images are deduplicated by filename.
 *
 * @returns The .epub file contents
 */
export async function buildEpub(
  chapters: ExtractedChapter[],
  meta: BookMeta,
  options: BuildEpubOptions = {},
): Promise<Buffer> {
  const identifier = options.identifier ?? `urn:uuid:${randomUUID()}`;
  const stylesheet = options.stylesheet ?? (await fs.readFile(STYLES_FILE, "utf-8"));
  const images = collectImages(chapters);

  const zip = new JSZip();
  // mimetype must be the first entry and stored uncompressed
  zip.file("mimetype", "application/epub+zip", { compression: "STORE" });
  zip.file("META-INF/container.xml", CONTAINER_XML);

  const oebps = "OEBPS";
  zip.file(`${oebps}/content.opf`, renderOpf(chapters, images, meta, identifier, options.modified ?? new Date()));
  zip.file(`${oebps}/toc.ncx`, renderNcx(chapters, meta, identifier));
  zip.file(`${oebps}/nav.xhtml`, renderNav(chapters, meta));
  zip.file(`${oebps}/style/default.css`, stylesheet);

  if (meta.cover) {
    zip.file(`${oebps}/cover.jpg`, meta.cover);
    zip.file(
      `${oebps}/cover.xhtml`,
      xhtmlDocument(meta.title, meta.language, `<div style="text-align:center;"><img src="cover.jpg" alt="${escapeXml(meta.title)}"/></div>`),
    );
  }

  for (const image of images) {
    zip.file(`${oebps}/images/${image.filename}`, image.data);
  }
  for (const chapter of chapters) {
    zip.file(`${oebps}/${chapterFilename(chapter.chapter)}`, renderChapter(chapter, meta.language));
  }

  return await zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE", mimeType: "application/epub+zip" });
}

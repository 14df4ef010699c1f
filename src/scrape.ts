/**
 * Build an e-book from teletype.in chapters listed in a links file
 *
 * Usage: npm run build-book -- <links-file> [options]
 * Example: npm run build-book -- links.txt --from 300 --to 320 --source @cult --source @grape
 *
 * Options:
 *   --from <n> / --to <n>   Chapter range (default: everything in the file)
 *   --source <handle>       Source priority, highest first (repeatable)
 *   --only                  Use only the --source handles
 *   --no-images             Skip images
 *   --format epub|md        Output format (default: epub)
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { DEFAULT_CACHE_DIR, FetchCache } from "./cache.js";
import { buildEpub, prepareCover } from "./epub.js";
import { ChapterFetchError, EmptyLinkIndexError, PlanningError } from "./errors.js";
import { ContentExtractor } from "./extractor.js";
import { chapterRange, countChaptersBySource, loadLinkIndex } from "./links.js";
import { writeMarkdownBook } from "./merge.js";
import { DEFAULT_CONFIG, FetchOrchestrator, type OrchestratorConfig, planFetch, resolvePriority } from "./orchestrator.js";
import type { BookMeta, ExtractedChapter } from "./types.js";
import {
  formatDuration,
  getMultiStringArg,
  getNullableNumberArg,
  getNullableStringArg,
  getNumberArg,
  getPositionalArg,
  getStringArg,
  hasFlag,
  hasHelpFlag,
  onInterrupt,
  sanitizeFilename,
  setupSignalHandlers,
} from "./utils.js";

export type OutputFormat = "epub" | "md";

const OUTPUT_FORMATS: readonly OutputFormat[] = ["epub", "md"];

/** Configuration options for a book build */
export interface BuildOptions {
  /** Path of the links listing */
  linksFile: string;
  /** First chapter (default: lowest in the file) */
  from: number | null;
  /** Last chapter (default: highest in the file) */
  to: number | null;
  /** Preferred source handles, highest first; the others follow (default: all, sorted) */
  sources: string[];
  /** Use only the preferred sources */
  onlySources: boolean;
  includeImages: boolean;
  title: string;
  author: string;
  language: string;
  /** Cover image path */
  cover: string | null;
  /** Output format, null when the given value is not supported */
  format: OutputFormat | null;
  /** Output path (default: derived from the title) */
  out: string | null;
  cacheDir: string;
  /** Politeness delay bounds between chapters (ms) */
  delayMin: number;
  delayMax: number;
  /** Pause between attempts at a failing chapter (ms) */
  retryDelay: number;
  /** Whether to show help and exit */
  showHelp: boolean;
}

/** Flags that take values, used for positional argument detection */
const BUILD_VALUE_FLAGS = [
  "--from",
  "--to",
  "--source",
  "--title",
  "--author",
  "--language",
  "--cover",
  "--format",
  "--out",
  "--cache-dir",
  "--delay-min",
  "--delay-max",
  "--retry-delay",
];

/**
 * Print usage information for the build command.
 */
function showUsage(): void {
  console.log("Usage: npm run build-book -- <links-file> [options]");
  console.log("");
  console.log("Fetch the chapters listed in a links file and package them as one book.");
  console.log("");
  console.log("Options:");
  console.log("  --from <n>           First chapter (default: lowest in the file)");
  console.log("  --to <n>             Last chapter (default: highest in the file)");
  console.log("  --source <handle>    Preferred source, highest first (repeatable); others follow");
  console.log("  --only               Use only the --source handles");
  console.log("  --no-images          Do not download images");
  console.log('  --title <title>      Book title (default: "My Web Novel")');
  console.log('  --author <name>      Book author (default: "Unknown Author")');
  console.log("  --language <tag>     Book language (default: ru)");
  console.log("  --cover <path>       Cover image");
  console.log("  --format <epub|md>   Output format (default: epub)");
  console.log("  --out <path>         Output file (default: derived from the title)");
  console.log("  --cache-dir <dir>    Chapter cache directory (default: cache)");
  console.log("  --delay-min <ms>     Minimum delay between chapters (default: 3000)");
  console.log("  --delay-max <ms>     Maximum delay between chapters (default: 7000)");
  console.log("  --retry-delay <ms>   Pause between attempts at a chapter (default: 2000)");
  console.log("  --help, -h           Show this help message");
  console.log("");
  console.log("Example:");
  console.log("  npm run build-book -- links.txt --from 300 --to 320 --source @cult --title \"My Book\"");
}

function parseFormat(value: string): OutputFormat | null {
  return OUTPUT_FORMATS.find((format) => format === value) ?? null;
}

/**
 * Parse command line arguments for the build command.
 *
 * @param args - Command line arguments (defaults to process.argv)
 */
export function parseArgs(args: string[] = process.argv.slice(2)): BuildOptions {
  return {
    linksFile: getPositionalArg(args, BUILD_VALUE_FLAGS),
    from: getNullableNumberArg(args, "--from"),
    to: getNullableNumberArg(args, "--to"),
    sources: getMultiStringArg(args, "--source"),
    onlySources: hasFlag(args, "--only"),
    includeImages: !hasFlag(args, "--no-images"),
    title: getStringArg(args, "--title", "My Web Novel"),
    author: getStringArg(args, "--author", "Unknown Author"),
    language: getStringArg(args, "--language", "ru"),
    cover: getNullableStringArg(args, "--cover"),
    format: parseFormat(getStringArg(args, "--format", "epub")),
    out: getNullableStringArg(args, "--out"),
    cacheDir: getStringArg(args, "--cache-dir", DEFAULT_CACHE_DIR),
    delayMin: getNumberArg(args, "--delay-min", DEFAULT_CONFIG.delayMinMs),
    delayMax: getNumberArg(args, "--delay-max", DEFAULT_CONFIG.delayMaxMs),
    retryDelay: getNumberArg(args, "--retry-delay", DEFAULT_CONFIG.retryDelayMs),
    showHelp: hasHelpFlag(args),
  };
}

/**
 * Output path for a build: --out, or the sanitized title with the format's extension.
 */
export function outputPath(options: Pick<BuildOptions, "out" | "title">, format: OutputFormat): string {
  return options.out ?? `${sanitizeFilename(options.title) || "book"}.${format}`;
}

/**
 * Read and normalize the cover; a missing or broken cover only costs the cover.
 */
async function loadCover(coverPath: string): Promise<Buffer | undefined> {
  try {
    const cover = await prepareCover(await fs.readFile(coverPath));
    console.log("✓ Cover added");
    return cover;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`⚠ Cover not added (${coverPath}): ${message}`);
    return undefined;
  }
}

/**
 * Run a full build: links → plan → fetch → assemble.
 *
 * @throws {EmptyLinkIndexError | PlanningError | ChapterFetchError} On fatal pipeline errors
 */
export async function build(options: BuildOptions, format: OutputFormat): Promise<string> {
  const started = Date.now();

  console.log(`Reading ${options.linksFile}...`);
  const { index, sources } = await loadLinkIndex(options.linksFile);

  const range = chapterRange(index);
  const from = options.from ?? range?.min ?? 0;
  const to = options.to ?? range?.max ?? 0;
  console.log(`  ✓ Chapters found: ${index.size} (${range?.min} to ${range?.max})`);

  const counts = countChaptersBySource(index, sources);
  console.log("  ✓ Sources:");
  for (const source of sources) {
    console.log(`      ${source} (${counts.get(source) ?? 0} chapters)`);
  }

  const priority = resolvePriority(options.sources, sources, options.onlySources);
  console.log(`  Priority: ${priority.join(" -> ")}`);

  console.log(`\nChecking chapters ${from}-${to}...`);
  const plan = planFetch(index, from, to, priority);
  console.log(`  ✓ ${plan.length} chapter(s) ready.`);

  const config: OrchestratorConfig = {
    ...DEFAULT_CONFIG,
    includeImages: options.includeImages,
    delayMinMs: options.delayMin,
    delayMaxMs: options.delayMax,
    retryDelayMs: options.retryDelay,
  };

  const removeInterruptHint = onInterrupt(() => {
    console.log(`Chapters fetched so far are kept in ${options.cacheDir}/.`);
  });

  const orchestrator = new FetchOrchestrator(config, {
    extractor: new ContentExtractor(),
    cache: new FetchCache(options.cacheDir),
  });
  let chapters: ExtractedChapter[];
  try {
    chapters = await orchestrator.run(plan);
  } finally {
    removeInterruptHint();
  }

  const meta: BookMeta = {
    title: options.title,
    author: options.author,
    language: options.language,
    cover: options.cover ? await loadCover(options.cover) : undefined,
  };

  const outputFile = outputPath(options, format);
  console.log(`\nBuilding ${outputFile}...`);
  if (format === "epub") {
    await fs.writeFile(outputFile, await buildEpub(chapters, meta));
  } else {
    await writeMarkdownBook(outputFile, chapters, meta);
  }

  const stats = await fs.stat(outputFile);
  const sizeKb = (stats.size / 1024).toFixed(1);
  console.log(`\nDone! ${chapters.length} chapters → ${path.resolve(outputFile)} (${sizeKb} KB)`);
  console.log(`Completed in ${formatDuration(Date.now() - started)}`);

  return outputFile;
}

/**
 * Main entry point for the book builder.
 *
 * @throws Exits with code 1 on bad arguments or any fatal pipeline error
 */
export async function main(): Promise<void> {
  const options = parseArgs();

  if (options.showHelp) {
    showUsage();
    process.exit(0);
  }

  if (!options.linksFile) {
    showUsage();
    process.exit(1);
  }

  if (!options.format) {
    console.error(`Error: --format must be one of: ${OUTPUT_FORMATS.join(", ")}`);
    process.exit(1);
  }

  try {
    await fs.access(options.linksFile);
  } catch {
    console.error(`Error: ${options.linksFile} not found.`);
    process.exit(1);
  }

  try {
    await build(options, options.format);
  } catch (error) {
    if (error instanceof PlanningError) {
      console.error(`\nError: ${error.message}`);
      console.error("Add more sources with --source or narrow the chapter range.");
    } else if (error instanceof EmptyLinkIndexError || error instanceof ChapterFetchError) {
      console.error(`\nError: ${error.message}`);
    } else {
      console.error("\nError:", error);
    }
    process.exit(1);
  }
}

// Only run main when executed directly (not when imported for testing)
if (import.meta.url === `file://${process.argv[1]}`) {
  setupSignalHandlers("Book build");
  main().catch((error) => {
    console.error("Error:", error);
    process.exit(1);
  });
}

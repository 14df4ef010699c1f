/**
 * Utility functions for the book builder
 * Extracted for testability
 */

/** Callback for cleanup actions when process is interrupted */
type CleanupCallback = () => void | Promise<void>;

/** Registered cleanup callbacks for SIGINT handling */
const cleanupCallbacks: CleanupCallback[] = [];

/** Flag to prevent multiple SIGINT handlers from running */
let isExiting = false;

/**
 * Register a cleanup callback to be called when the process receives SIGINT.
 * Multiple callbacks can be registered and will be called in order.
 *
 * @param callback - Async or sync function to call during cleanup
 * @returns Function that unregisters the callback
 */
export function onInterrupt(callback: CleanupCallback): () => void {
  cleanupCallbacks.push(callback);
  return () => {
    const index = cleanupCallbacks.indexOf(callback);
    if (index !== -1) cleanupCallbacks.splice(index, 1);
  };
}

/**
 * Run every registered cleanup callback in order.
 * A failing callback is reported and does not stop the others.
 */
export async function runCleanupCallbacks(): Promise<void> {
  for (const callback of [...cleanupCallbacks]) {
    try {
      await callback();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Cleanup failed: ${message}`);
    }
  }
}

/**
 * Setup graceful shutdown handlers for SIGINT (Ctrl+C) and SIGTERM.
 * Displays a clean message instead of a stack trace when interrupted.
 * Should be called once at the start of the main entry point.
 *
 * @param commandName - Name of the command for the exit message (e.g., "Book build")
 */
export function setupSignalHandlers(commandName: string): void {
  const handler = async (signal: string) => {
    if (isExiting) return;
    isExiting = true;

    console.log(`\n${commandName} interrupted.`);

    await runCleanupCallbacks();

    // 128 + signal number (SIGINT = 2, SIGTERM = 15)
    const exitCode = signal === "SIGINT" ? 130 : 143;
    process.exit(exitCode);
  };

  process.on("SIGINT", () => void handler("SIGINT"));
  process.on("SIGTERM", () => void handler("SIGTERM"));
}

/**
 * Wait for specified milliseconds.
 *
 * @param ms - Duration to wait in milliseconds
 * @returns Promise that resolves after the delay
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Display a progress bar in the terminal.
 * Shows percentage, counts, and current item title.
 *
 * @param current - Current item number (1-based)
 * @param total - Total number of items
 * @param title - Title of the current item being processed
 */
export function progressBar(current: number, total: number, title: string): void {
  const barWidth = 30;
  const percent = Math.round((current / total) * 100);
  const filled = Math.round((current / total) * barWidth);
  const empty = barWidth - filled;
  const bar = "=".repeat(filled) + " ".repeat(empty);

  const maxTitleLen = 40;
  const shortTitle = title.length > maxTitleLen ? `${title.slice(0, maxTitleLen - 3)}...` : title.padEnd(maxTitleLen);

  process.stdout.write(`\r[${bar}] ${percent.toString().padStart(3)}% (${current}/${total}) ${shortTitle}`);

  if (current === total) {
    process.stdout.write("\n");
  }
}

/**
 * Format duration in milliseconds to human-readable string.
 *
 * @example
 * formatDuration(65000) // '1m 5s'
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes > 0) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  return `${seconds}s`;
}

/**
 * Create a safe filename from a title.
 * Converts to lowercase, replaces special characters with dashes,
 * and truncates to 50 characters.
 *
 * @example
 * sanitizeFilename('Chapter 1: Introduction') // 'chapter-1-introduction'
 * sanitizeFilename('Привет Мир') // 'привет-мир'
 */
export function sanitizeFilename(title: string): string {
  return title
    .toLowerCase()
    // Keep Latin (a-z), Cyrillic (а-яё), and digits; replace all else with dashes
    .replace(/[^a-zа-яё0-9]+/gi, "-")
    .replace(/^-|-$/g, "")
    .slice(0, 50);
}

/**
 * Generate a markdown anchor from a heading title.
 * Matches the anchor generation used by GitHub/CommonMark style processors.
 *
 * @example
 * generateAnchor('Hello World') // 'hello-world'
 * generateAnchor('Глава 12') // 'глава-12'
 */
export function generateAnchor(title: string): string {
  return title
    .toLowerCase()
    .replace(/ /g, "-")
    // Keep Latin (a-z), Cyrillic (а-яё), digits, and hyphens
    .replace(/[^a-zа-яё0-9-]/gi, "")
    .replace(/^-+|-+$/g, "");
}

/**
 * Title shown for a chapter: its own title, or "Chapter N" when it has none.
 */
export function displayTitle(chapter: { chapter: number; title: string }): string {
  const title = chapter.title.trim();
  return title || `Chapter ${chapter.chapter}`;
}

/**
 * Resolve a possibly relative href against the page it was found on.
 *
 * @returns Absolute URL, or null if it cannot be resolved
 *
 * @example
 * resolveUrl('/files/a.png', 'https://teletype.in/@a/x') // 'https://teletype.in/files/a.png'
 */
export function resolveUrl(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).href;
  } catch {
    return null;
  }
}

/**
 * Escape text for use inside a RegExp source.
 */
export function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// ============================================================================
// Argument Parsing Helpers
// ============================================================================

/**
 * Check if help flag is present in arguments.
 *
 * @returns True if --help or -h is present
 */
export function hasHelpFlag(args: string[]): boolean {
  return args.includes("--help") || args.includes("-h");
}

/**
 * Check if a boolean flag (e.g. '--no-images') is present.
 */
export function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

/**
 * Get a string argument value from command line arguments.
 * If the flag appears multiple times, returns the last value.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--title')
 * @param defaultValue - Default value if flag not found
 */
export function getStringArg(args: string[], flag: string, defaultValue: string): string {
  let result = defaultValue;
  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === flag && value && !value.startsWith("--")) {
      result = value;
    }
  }
  return result;
}

/**
 * Get a nullable string argument value from command line arguments.
 *
 * @returns The argument value or null if not found
 */
export function getNullableStringArg(args: string[], flag: string): string | null {
  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === flag && value && !value.startsWith("--")) {
      return value;
    }
  }
  return null;
}

/**
 * Get a number argument value from command line arguments.
 *
 * @returns The parsed number, or the default when the flag is absent or not numeric
 */
export function getNumberArg(args: string[], flag: string, defaultValue: number): number {
  const value = getNullableNumberArg(args, flag);
  return value ?? defaultValue;
}

/**
 * Get a number argument value, or null when the flag is absent or not numeric.
 */
export function getNullableNumberArg(args: string[], flag: string): number | null {
  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === flag && value) {
      const parsed = parseInt(value, 10);
      if (!isNaN(parsed)) {
        return parsed;
      }
    }
  }
  return null;
}

/**
 * Get all values for a repeatable string argument.
 *
 * @returns Array of all values for the flag
 */
export function getMultiStringArg(args: string[], flag: string): string[] {
  const values: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === flag && value && !value.startsWith("--")) {
      values.push(value);
    }
  }
  return values;
}

/**
 * Get the first positional (non-flag) argument.
 * Skips values that follow flags (e.g., in '--from 5', skips '5').
 *
 * @param args - Command line arguments array
 * @param knownFlags - Flags that take values (to skip their values)
 * @returns The first non-flag argument or empty string
 */
export function getPositionalArg(args: string[], knownFlags: string[] = []): string {
  let skipNext = false;
  for (const arg of args) {
    if (skipNext) {
      skipNext = false;
      continue;
    }
    if (knownFlags.includes(arg)) {
      skipNext = true;
      continue;
    }
    if (!arg.startsWith("--") && !arg.startsWith("-")) {
      return arg;
    }
  }
  return "";
}

import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import {
  delay,
  displayTitle,
  escapeRegex,
  formatDuration,
  generateAnchor,
  getMultiStringArg,
  getNullableNumberArg,
  getNullableStringArg,
  getNumberArg,
  getPositionalArg,
  getStringArg,
  hasFlag,
  hasHelpFlag,
  onInterrupt,
  progressBar,
  resolveUrl,
  runCleanupCallbacks,
  sanitizeFilename,
} from "./utils.js";

describe("cleanup callbacks", () => {
  it("runs registered callbacks in order", async () => {
    const calls: string[] = [];
    const removeFirst = onInterrupt(() => {
      calls.push("first");
    });
    const removeSecond = onInterrupt(async () => {
      calls.push("second");
    });

    await runCleanupCallbacks();
    removeFirst();
    removeSecond();

    expect(calls).toEqual(["first", "second"]);
  });

  it("skips a callback once it is unregistered", async () => {
    const callback = vi.fn();
    const remove = onInterrupt(callback);

    remove();
    remove();
    await runCleanupCallbacks();

    expect(callback).not.toHaveBeenCalled();
  });

  it("reports a failing callback and keeps going", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const after = vi.fn();
    const removeFailing = onInterrupt(() => {
      throw new Error("disk gone");
    });
    const removeAfter = onInterrupt(after);

    await runCleanupCallbacks();
    removeFailing();
    removeAfter();

    expect(errorSpy).toHaveBeenCalledWith("Cleanup failed: disk gone");
    expect(after).toHaveBeenCalledTimes(1);
    errorSpy.mockRestore();
  });
});

describe("sanitizeFilename", () => {
  it("converts to lowercase and replaces special chars with dashes", () => {
    expect(sanitizeFilename("Hello World!")).toBe("hello-world");
  });

  it("handles Cyrillic text", () => {
    expect(sanitizeFilename("Привет Мир")).toBe("привет-мир");
  });

  it("removes leading and trailing dashes", () => {
    expect(sanitizeFilename("---test---")).toBe("test");
  });

  it("truncates to 50 characters", () => {
    const longTitle = "This is a very long title that exceeds fifty characters limit";
    expect(sanitizeFilename(longTitle).length).toBeLessThanOrEqual(50);
  });

  it("returns empty string when nothing usable remains", () => {
    expect(sanitizeFilename("***")).toBe("");
  });
});

describe("generateAnchor", () => {
  it("converts to lowercase and replaces spaces with dashes", () => {
    expect(generateAnchor("Hello World")).toBe("hello-world");
  });

  it("handles Cyrillic chapter labels", () => {
    expect(generateAnchor("Глава 12. Начало")).toBe("глава-12-начало");
  });

  it("strips leading and trailing punctuation", () => {
    expect(generateAnchor("...Title ")).toBe("title");
  });

  it("preserves hyphens from original title", () => {
    expect(generateAnchor("Title - with dash")).toBe("title---with-dash");
  });
});

describe("displayTitle", () => {
  it("uses the chapter title when present", () => {
    expect(displayTitle({ chapter: 3, title: "The Gate" })).toBe("The Gate");
  });

  it("falls back to a chapter label for blank titles", () => {
    expect(displayTitle({ chapter: 3, title: "" })).toBe("Chapter 3");
    expect(displayTitle({ chapter: 7, title: "   " })).toBe("Chapter 7");
  });

  it("trims surrounding whitespace", () => {
    expect(displayTitle({ chapter: 1, title: "  Prologue " })).toBe("Prologue");
  });
});

describe("resolveUrl", () => {
  const page = "https://teletype.in/@cult/chapter-1";

  it("returns absolute URLs as-is", () => {
    expect(resolveUrl("https://img.example.com/a.png", page)).toBe("https://img.example.com/a.png");
  });

  it("resolves root-relative URLs", () => {
    expect(resolveUrl("/files/a.png", page)).toBe("https://teletype.in/files/a.png");
  });

  it("resolves protocol-relative URLs", () => {
    expect(resolveUrl("//img.example.com/a.png", page)).toBe("https://img.example.com/a.png");
  });

  it("returns null for unresolvable input", () => {
    expect(resolveUrl("", "not-a-url")).toBeNull();
    expect(resolveUrl("http://", page)).toBeNull();
  });
});

describe("escapeRegex", () => {
  it("escapes regex metacharacters", () => {
    expect(escapeRegex("teletype.in")).toBe("teletype\\.in");
    expect(new RegExp(escapeRegex("a+b(c)")).test("a+b(c)")).toBe(true);
  });
});

describe("formatDuration", () => {
  it("formats seconds only", () => {
    expect(formatDuration(5000)).toBe("5s");
  });

  it("formats minutes and seconds", () => {
    expect(formatDuration(65000)).toBe("1m 5s");
    expect(formatDuration(120000)).toBe("2m 0s");
  });

  it("rounds down milliseconds", () => {
    expect(formatDuration(5999)).toBe("5s");
  });
});

describe("delay", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves after specified time", async () => {
    let resolved = false;
    const promise = delay(1000).then(() => {
      resolved = true;
    });

    expect(resolved).toBe(false);
    await vi.advanceTimersByTimeAsync(1000);
    await promise;
    expect(resolved).toBe(true);
  });
});

describe("progressBar", () => {
  let mockStdoutWrite: MockInstance<typeof process.stdout.write>;

  beforeEach(() => {
    mockStdoutWrite = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    mockStdoutWrite.mockRestore();
  });

  it("writes progress bar to stdout", () => {
    progressBar(5, 10, "Test Title");

    const output = String(mockStdoutWrite.mock.calls[0][0]);
    expect(output).toContain(" 50%");
    expect(output).toContain("(5/10)");
    expect(output).toContain("Test Title");
  });

  it("shows 100% and newline when complete", () => {
    progressBar(10, 10, "Complete");

    expect(mockStdoutWrite).toHaveBeenCalledTimes(2);
    expect(String(mockStdoutWrite.mock.calls[0][0])).toContain("100%");
    expect(mockStdoutWrite.mock.calls[1][0]).toBe("\n");
  });

  it("truncates long titles", () => {
    progressBar(1, 10, "This is a very long title that exceeds the maximum length allowed");

    const output = String(mockStdoutWrite.mock.calls[0][0]);
    expect(output).toContain("This is a very long title that exceed...");
  });
});

describe("argument helpers", () => {
  it("hasHelpFlag detects --help and -h", () => {
    expect(hasHelpFlag(["--help"])).toBe(true);
    expect(hasHelpFlag(["-h"])).toBe(true);
    expect(hasHelpFlag(["links.txt"])).toBe(false);
  });

  it("hasFlag detects boolean flags", () => {
    expect(hasFlag(["links.txt", "--no-images"], "--no-images")).toBe(true);
    expect(hasFlag(["links.txt"], "--no-images")).toBe(false);
  });

  it("getStringArg returns the last value or the default", () => {
    expect(getStringArg(["--title", "A", "--title", "B"], "--title", "X")).toBe("B");
    expect(getStringArg([], "--title", "X")).toBe("X");
    expect(getStringArg(["--title", "--author"], "--title", "X")).toBe("X");
  });

  it("getNullableStringArg returns the first value or null", () => {
    expect(getNullableStringArg(["--cover", "a.png"], "--cover")).toBe("a.png");
    expect(getNullableStringArg(["--cover"], "--cover")).toBeNull();
  });

  it("getNumberArg parses integers and falls back to the default", () => {
    expect(getNumberArg(["--from", "12"], "--from", 1)).toBe(12);
    expect(getNumberArg(["--from", "abc"], "--from", 1)).toBe(1);
    expect(getNumberArg([], "--from", 1)).toBe(1);
  });

  it("getNullableNumberArg returns null when absent", () => {
    expect(getNullableNumberArg(["--to", "40"], "--to")).toBe(40);
    expect(getNullableNumberArg([], "--to")).toBeNull();
  });

  it("getMultiStringArg collects repeated values in order", () => {
    expect(getMultiStringArg(["--source", "@b", "--source", "@a"], "--source")).toEqual(["@b", "@a"]);
  });

  it("getPositionalArg skips values of known flags", () => {
    expect(getPositionalArg(["--from", "5", "links.txt"], ["--from"])).toBe("links.txt");
    expect(getPositionalArg(["--no-images", "links.txt"], [])).toBe("links.txt");
    expect(getPositionalArg(["--from", "5"], ["--from"])).toBe("");
  });
});

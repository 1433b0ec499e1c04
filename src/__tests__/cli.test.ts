import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { EventEmitter } from "node:events";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { run } from "../cli/index.js";
import {
  buildConfig,
  parseCount,
  parseSeconds,
  readUrlList,
  resolveAction,
} from "../cli/options.js";
import { createProgressCallbacks, formatSchedule, printSummary } from "../cli/progress.js";
import { installSnapshotDump } from "../cli/interrupt.js";
import { UrlStore } from "../frontier/store.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let workDir: string;

/** Write a file into the per-test directory and return its path. */
function writeInput(name: string, content: string): string {
  const filePath = join(workDir, name);
  writeFileSync(filePath, content, "utf-8");
  return filePath;
}

/** Everything written to a spied stream, concatenated. */
function written(spy: { mock: { calls: unknown[][] } }): string {
  return spy.mock.calls.map((call) => String(call[0])).join("");
}

beforeEach(() => {
  workDir = mkdtempSync(join(tmpdir(), "frontier-store-"));
});

afterEach(() => {
  rmSync(workDir, { recursive: true, force: true });
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

// ---------------------------------------------------------------------------
// 1. Options
// ---------------------------------------------------------------------------
describe("CLI options (src/cli/options.ts)", () => {
  describe("parseCount", () => {
    it("should parse a non-negative integer", () => {
      expect(parseCount("12", "--sample")).toBe(12);
    });

    it.each(["-1", "1.5", "abc"])("should reject %s", (value) => {
      expect(() => parseCount(value, "--sample")).toThrow(
        `Invalid value for --sample: "${value}". Expected a non-negative integer.`,
      );
    });
  });

  describe("parseSeconds", () => {
    it("should parse fractional seconds", () => {
      expect(parseSeconds("0.5", "--delay")).toBe(0.5);
    });

    it.each(["", " ", "-2", "soon"])("should reject %j", (value) => {
      expect(() => parseSeconds(value, "--delay")).toThrow(/Invalid value for --delay/);
    });
  });

  describe("readUrlList", () => {
    it("should skip blank lines and comments", () => {
      const filePath = writeInput(
        "urls.txt",
        "https://example.org/a\r\n\r\n# comment\n  https://example.org/b  \n",
      );
      expect(readUrlList(filePath)).toEqual(["https://example.org/a", "https://example.org/b"]);
    });

    it("should name the file it cannot read", () => {
      expect(() => readUrlList(join(workDir, "missing.txt"))).toThrow(
        /Cannot read URL list ".*missing\.txt"/,
      );
    });
  });

  describe("buildConfig", () => {
    it("should only set options that were given", () => {
      expect(buildConfig({})).toEqual({});
    });

    it("should map CLI flags onto the frontier config", () => {
      expect(
        buildConfig({ strict: true, language: "de", compress: true, delay: "2", verbose: true }),
      ).toEqual({
        strict: true,
        language: "de",
        compressed: true,
        defaultCrawlDelay: 2,
        verbose: true,
      });
    });
  });

  describe("resolveAction", () => {
    it("should default to dumping", () => {
      expect(resolveAction({})).toEqual({ kind: "dump", unvisitedOnly: false, withStatus: false });
    });

    it("should build a sample action with its bounds", () => {
      expect(resolveAction({ sample: "3", excludeMin: "1", excludeMax: "9" })).toEqual({
        kind: "sample",
        size: 3,
        excludeMin: 1,
        excludeMax: 9,
      });
    });

    it("should build a schedule action with the default time limit", () => {
      expect(resolveAction({ schedule: "20" })).toEqual({
        kind: "schedule",
        maxUrls: 20,
        timeLimit: 10,
      });
    });

    it("should refuse sampling and scheduling together", () => {
      expect(() => resolveAction({ sample: "1", schedule: "1" })).toThrow(
        "Cannot use --sample and --schedule at the same time.",
      );
    });
  });
});

// ---------------------------------------------------------------------------
// 2. Progress reporting
// ---------------------------------------------------------------------------
describe("CLI progress (src/cli/progress.ts)", () => {
  it("should count discarded URLs and domains", () => {
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const callbacks = createProgressCallbacks("normal");
    callbacks.onUrlDiscarded("nope", "malformed URL");
    callbacks.onDomainDiscarded("https://example.org", 0);
    expect(callbacks.counts()).toEqual({ discardedUrls: 1, discardedDomains: 1 });
  });

  it("should log each discard in verbose mode", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const callbacks = createProgressCallbacks("verbose");
    callbacks.onUrlDiscarded("nope", "malformed URL");
    callbacks.onDomainDiscarded("https://example.org", 0);
    expect(written(stderr)).toBe(
      "  Discarded: nope (malformed URL)\n  Discarded domain: https://example.org (0 urls)\n",
    );
  });

  it("should format schedule entries with two decimals", () => {
    expect(
      formatSchedule([
        { domain: "https://example.org", path: "/b", url: "https://example.org/b", waitSeconds: 2 },
      ]),
    ).toEqual(["2.00\thttps://example.org/b"]);
  });

  it("should print a summary with the non-zero counters", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    printSummary(
      { input: 5, output: 3, domains: 2, discardedUrls: 2, discardedDomains: 0 },
      "normal",
    );
    expect(written(stderr)).toBe("Done! 3 of 5 URLs across 2 domains\nDiscarded URLs: 2\n");
  });

  it("should print nothing when quiet", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    printSummary({ input: 1, output: 1, domains: 1, discardedUrls: 0, discardedDomains: 0 }, "quiet");
    expect(stderr).not.toHaveBeenCalled();
  });
});

// ---------------------------------------------------------------------------
// 3. Snapshot dump on interrupt
// ---------------------------------------------------------------------------
describe("installSnapshotDump", () => {
  function setup() {
    const store = new UrlStore();
    store.addUrls(["https://example.org/a"]);
    const source = new EventEmitter();
    const chunks: string[] = [];
    const exit = vi.fn<[number], void>();
    const remove = installSnapshotDump(store, {
      source,
      out: { write: (chunk: string) => chunks.push(chunk) },
      exit,
    });
    return { source, chunks, exit, remove };
  }

  it("should write the snapshot and exit with 128 + signal number", () => {
    const { source, chunks, exit } = setup();
    source.emit("SIGINT", "SIGINT");

    expect(chunks).toHaveLength(1);
    const snapshot: unknown = JSON.parse(chunks[0]);
    expect(snapshot).toMatchObject({
      version: 1,
      domains: [{ domain: "https://example.org", urls: [{ path: "/a", visited: false }] }],
    });
    expect(exit).toHaveBeenCalledWith(130);
  });

  it("should remove all handlers after the first signal", () => {
    const { source, exit } = setup();
    source.emit("SIGTERM", "SIGTERM");
    expect(exit).toHaveBeenCalledWith(143);
    expect(source.listenerCount("SIGINT")).toBe(0);
    expect(source.listenerCount("SIGTERM")).toBe(0);
  });

  it("should remove its handlers when asked", () => {
    const { source, remove } = setup();
    remove();
    expect(source.listenerCount("SIGINT")).toBe(0);
    expect(source.listenerCount("SIGTERM")).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// 4. run
// ---------------------------------------------------------------------------
describe("run", () => {
  const URLS = "https://example.org/b\nhttps://example.org/a\n# comment\n\nnot a url\n";

  function spyStreams() {
    return {
      stdout: vi.spyOn(process.stdout, "write").mockImplementation(() => true),
      stderr: vi.spyOn(process.stderr, "write").mockImplementation(() => true),
    };
  }

  it("should dump canonical URLs in store order", async () => {
    const { stdout, stderr } = spyStreams();
    await run(["node", "frontier-store", writeInput("urls.txt", URLS), "-q"]);

    expect(written(stdout)).toBe("https://example.org/b\nhttps://example.org/a\n");
    expect(stderr).not.toHaveBeenCalled();
    expect(process.exitCode).toBeUndefined();
  });

  it("should print a summary unless quiet", async () => {
    const { stderr } = spyStreams();
    await run(["node", "frontier-store", writeInput("urls.txt", URLS)]);

    expect(written(stderr)).toBe("Done! 2 of 3 URLs across 1 domains\nDiscarded URLs: 1\n");
  });

  it("should print a download schedule", async () => {
    const { stdout } = spyStreams();
    await run([
      "node",
      "frontier-store",
      writeInput("urls.txt", URLS),
      "--schedule",
      "2",
      "--delay",
      "1",
      "-q",
    ]);

    expect(written(stdout)).toBe("0.00\thttps://example.org/b\n1.00\thttps://example.org/a\n");
  });

  it("should leave out visited URLs with --unvisited", async () => {
    const { stdout } = spyStreams();
    const visited = writeInput("visited.txt", "https://example.org/b\n");
    await run([
      "node",
      "frontier-store",
      writeInput("urls.txt", URLS),
      "--visited",
      visited,
      "--unvisited",
      "-q",
    ]);

    expect(written(stdout)).toBe("https://example.org/a\n");
  });

  it("should append the visited flag with --with-status", async () => {
    const { stdout } = spyStreams();
    const visited = writeInput("visited.txt", "https://example.org/b\n");
    await run([
      "node",
      "frontier-store",
      writeInput("urls.txt", URLS),
      "--visited",
      visited,
      "--with-status",
      "-q",
    ]);

    expect(written(stdout)).toBe("https://example.org/b\ttrue\nhttps://example.org/a\tfalse\n");
  });

  it("should sample URLs by domain", async () => {
    const { stdout } = spyStreams();
    const input = writeInput("urls.txt", "https://test.org/x\nhttps://example.org/a\n");
    await run(["node", "frontier-store", input, "--sample", "1", "-q"]);

    expect(written(stdout)).toBe("https://example.org/a\nhttps://test.org/x\n");
  });

  it("should write to the output file", async () => {
    const { stdout } = spyStreams();
    const outputPath = join(workDir, "out.txt");
    await run(["node", "frontier-store", writeInput("urls.txt", URLS), "-o", outputPath, "-q"]);

    expect(readFileSync(outputPath, "utf-8")).toBe(
      "https://example.org/b\nhttps://example.org/a\n",
    );
    expect(stdout).not.toHaveBeenCalled();
  });

  it("should report conflicting actions and set the exit code", async () => {
    const { stderr } = spyStreams();
    await run([
      "node",
      "frontier-store",
      writeInput("urls.txt", URLS),
      "--sample",
      "1",
      "--schedule",
      "1",
    ]);

    expect(written(stderr)).toBe("Error: Cannot use --sample and --schedule at the same time.\n");
    expect(process.exitCode).toBe(1);
  });

  it("should refuse --verbose together with --quiet", async () => {
    const { stderr } = spyStreams();
    await run(["node", "frontier-store", writeInput("urls.txt", URLS), "-v", "-q"]);

    expect(written(stderr)).toBe("Error: Cannot use --verbose and --quiet at the same time.\n");
    expect(process.exitCode).toBe(1);
  });

  it("should keep the interrupt dump installed while a verbose run loads its URLs", async () => {
    spyStreams();
    const urls: string[] = [];
    for (let i = 0; i < 2500; i++) {
      urls.push(`https://example.org/p${i}`);
    }
    const input = writeInput("many.txt", urls.join("\n") + "\n");
    const baseline = process.listenerCount("SIGINT");
    const during: number[] = [];
    setImmediate(() => during.push(process.listenerCount("SIGINT")));

    await run(["node", "frontier-store", input, "-v"]);

    expect(during).toEqual([baseline + 1]);
    expect(process.listenerCount("SIGINT")).toBe(baseline);
    expect(process.exitCode).toBeUndefined();
  });

  it("should report an unreadable input file", async () => {
    const { stderr } = spyStreams();
    await run(["node", "frontier-store", join(workDir, "missing.txt")]);

    expect(written(stderr)).toMatch(/^Error: Cannot read URL list ".*missing\.txt"/);
    expect(process.exitCode).toBe(1);
  });
});

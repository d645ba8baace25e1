import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createLogger, Logger } from "./logger";
import { formatFileTimestamp, formatTimestamp } from "./format-timestamp";

const LINE = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2},\d{3} - (\w+) - (.*)$/;

describe("formatTimestamp", () => {
  it("formats log line timestamps", () => {
    expect(formatTimestamp(new Date(2024, 2, 5, 14, 7, 9, 42))).toBe(
      "2024-03-05 14:07:09,042",
    );
  });

  it("formats log file name timestamps", () => {
    expect(formatFileTimestamp(new Date(2024, 10, 23, 4, 5, 6))).toBe(
      "20241123_040506",
    );
  });
});

describe("createLogger", () => {
  let dir: string;
  let tablePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "batrepl-logger-"));
    tablePath = join(dir, "pairs.csv");
    await writeFile(tablePath, "");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("creates no file for NONE", async () => {
    const logger = await createLogger(tablePath, { level: "NONE", bom: true });

    expect(logger.enabled).toBe(false);
    expect(logger.filePath).toBeUndefined();
    await logger.close();
  });

  it("names the log file after the start time, beside the table", async () => {
    const logger = await createLogger(
      tablePath,
      { level: "INFO", bom: false },
      new Date(2024, 2, 5, 14, 7, 9),
    );
    await logger.close();

    expect(logger.filePath).toBe(join(dir, "replace_log_20240305_140709.txt"));
  });

  it("writes to a configured directory", async () => {
    const logDir = await mkdtemp(join(tmpdir(), "batrepl-logs-"));
    const logger = await createLogger(
      tablePath,
      { level: "INFO", directory: logDir, bom: false },
      new Date(2024, 2, 5, 14, 7, 9),
    );
    await logger.close();

    expect(logger.filePath).toBe(join(logDir, "replace_log_20240305_140709.txt"));
    await rm(logDir, { recursive: true, force: true });
  });

  it("rejects when the log directory does not exist", async () => {
    await expect(
      createLogger(tablePath, {
        level: "INFO",
        directory: join(dir, "missing"),
        bom: false,
      }),
    ).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("writes lines at or above the level, after a byte order mark", async () => {
    const logger = await createLogger(tablePath, { level: "INFO", bom: true });
    logger.debug("hidden");
    logger.info("shown");
    logger.warning("careful");
    logger.error("bad");
    await logger.close();

    const content = await readFile(logger.filePath ?? "", "utf-8");
    expect(content.startsWith("\uFEFF")).toBe(true);

    const entries = content
      .slice(1)
      .trimEnd()
      .split("\n")
      .map((line) => {
        const match = LINE.exec(line);
        return match ? [match[1], match[2]] : line;
      });
    expect(entries).toEqual([
      ["INFO", "Logging started."],
      ["INFO", "shown"],
      ["WARNING", "careful"],
      ["ERROR", "bad"],
    ]);
  });

  it("keeps only failures at ERROR", async () => {
    const logger = await createLogger(tablePath, { level: "ERROR", bom: false });
    logger.info("skipped");
    logger.critical("fatal");
    await logger.close();

    const content = await readFile(logger.filePath ?? "", "utf-8");
    expect(content).toMatch(/ - CRITICAL - fatal\n$/);
    expect(content.split("\n")).toHaveLength(2);
  });
});

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("sends only failures to the console without a log file", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = new Logger();

    logger.info("quiet");
    logger.warning("quiet too");
    logger.error("loud");

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith("[ERROR] loud");
  });

  it("hands failures to a report hook when one is given", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const lines: string[] = [];
    const logger = new Logger({ level: "NONE", report: (line) => lines.push(line) });

    logger.warning("quiet");
    logger.critical("stop");

    expect(lines).toEqual(["[CRITICAL] stop"]);
    expect(errorSpy).not.toHaveBeenCalled();
  });
});

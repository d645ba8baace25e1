/**
 * Logger Utility
 * Writes timestamped, leveled lines to a log file next to the table file
 */

import { createWriteStream, type WriteStream } from "node:fs";
import { once } from "node:events";
import { join, dirname } from "node:path";
import { formatTimestamp, formatFileTimestamp } from "./format-timestamp";
import type { LogLevel } from "../types";

type EventLevel = Exclude<LogLevel, "NONE">;

const SEVERITY: Record<EventLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
  CRITICAL: 50,
};

const BOM = "\uFEFF";

export interface LoggerOptions {
  level: LogLevel;
  // An open stream; without one nothing is written to a file
  stream?: WriteStream;
  filePath?: string;
  // Receives failures when there is no log file
  report?: (line: string) => void;
}

export class Logger {
  readonly level: LogLevel;
  readonly filePath?: string;
  private stream?: WriteStream;
  private failure?: Error;
  private report: (line: string) => void;

  constructor(options: LoggerOptions = { level: "NONE" }) {
    this.level = options.level;
    this.report = options.report ?? ((line) => console.error(line));

    if (options.level !== "NONE" && options.stream) {
      this.filePath = options.filePath;
      this.stream = options.stream;
      this.stream.on("error", (error) => {
        this.failure = error;
      });
    }
  }

  get enabled(): boolean {
    return this.stream !== undefined;
  }

  debug(message: string): void {
    this.log("DEBUG", message);
  }

  info(message: string): void {
    this.log("INFO", message);
  }

  warning(message: string): void {
    this.log("WARNING", message);
  }

  error(message: string): void {
    this.log("ERROR", message);
  }

  critical(message: string): void {
    this.log("CRITICAL", message);
  }

  /**
   * Flush pending lines and release the file handle
   * Rejects with the first write error the stream reported
   */
  close(): Promise<void> {
    const stream = this.stream;
    if (!stream) {
      return Promise.resolve();
    }
    this.stream = undefined;

    return new Promise((resolve, reject) => {
      if (this.failure) {
        stream.destroy();
        reject(this.failure);
        return;
      }
      stream.once("error", reject);
      stream.end(() => resolve());
    });
  }

  private log(level: EventLevel, message: string): void {
    if (!this.stream) {
      // Without a log file only failures are reported
      if (SEVERITY[level] >= SEVERITY.ERROR) {
        this.report(`[${level}] ${message}`);
      }
      return;
    }

    if (this.level === "NONE" || SEVERITY[level] < SEVERITY[this.level]) {
      return;
    }

    this.stream.write(`${formatTimestamp(new Date())} - ${level} - ${message}\n`);
  }
}

/**
 * Open the logger for a run
 * The log file lands in `directory`, or beside the table file when omitted.
 * Rejects when the log file cannot be opened.
 */
export async function createLogger(
  tablePath: string,
  options: {
    level: LogLevel;
    directory?: string;
    bom: boolean;
    report?: (line: string) => void;
  },
  now: Date = new Date(),
): Promise<Logger> {
  if (options.level === "NONE") {
    return new Logger({ level: "NONE", report: options.report });
  }

  const directory = options.directory ?? dirname(tablePath);
  const filePath = join(directory, `replace_log_${formatFileTimestamp(now)}.txt`);

  const stream = createWriteStream(filePath, { flags: "w", encoding: "utf-8" });
  await once(stream, "open");

  if (options.bom) {
    stream.write(BOM);
  }

  const logger = new Logger({
    level: options.level,
    stream,
    filePath,
    report: options.report,
  });
  logger.info("Logging started.");
  return logger;
}

// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Logger: chalk-coloured console output plus an optional plain-text file sink.
 * File lines carry no ANSI codes.
 */

import { appendFileSync, existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";

export type LogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
};

const LEVEL_STYLE: Record<LogLevel, (s: string) => string> = {
  DEBUG: chalk.gray,
  INFO: chalk.cyan,
  WARNING: chalk.yellow,
  ERROR: chalk.red,
};

export interface LoggerOptions {
  level?: LogLevel;
  file?: string;
  tag?: string;
  /** Console writer, replaced in tests. */
  write?: (line: string) => void;
  clock?: () => Date;
}

/** Terminal colour for a temperature, matching the bands operators are used to. */
export function colorForTemperature(celsius: number): (s: string) => string {
  if (celsius < 10) return chalk.blue;
  if (celsius <= 40) return chalk.green;
  if (celsius <= 60) return chalk.yellow;
  return chalk.red;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly file: string | undefined;
  private readonly tag: string;
  private readonly write: (line: string) => void;
  private readonly clock: () => Date;
  private fileFailed = false;

  constructor(opts: LoggerOptions = {}) {
    this.level = opts.level ?? "INFO";
    this.file = opts.file;
    this.tag = opts.tag ?? "Fanwise";
    this.write = opts.write ?? ((line) => console.log(line));
    this.clock = opts.clock ?? (() => new Date());

    if (this.file) {
      const dir = dirname(this.file);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
  }

  /** Same sinks and level, different tag. */
  child(tag: string): Logger {
    return new Logger({
      level: this.level,
      file: this.file,
      tag,
      write: this.write,
      clock: this.clock,
    });
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string): void {
    this.log("DEBUG", message);
  }

  info(message: string, color?: (s: string) => string): void {
    this.log("INFO", message, color);
  }

  warn(message: string): void {
    this.log("WARNING", message);
  }

  error(message: string): void {
    this.log("ERROR", message);
  }

  log(level: LogLevel, message: string, color?: (s: string) => string): void {
    if (!this.isEnabled(level)) return;

    const ts = this.clock().toISOString();
    const plain = `${ts} [${this.tag}] ${level} ${message}`;
    const styledLevel = LEVEL_STYLE[level](level);
    const styledMessage = color ? color(message) : message;
    this.write(`${chalk.dim(ts)} ${chalk.bold(`[${this.tag}]`)} ${styledLevel} ${styledMessage}`);

    if (this.file && !this.fileFailed) {
      try {
        appendFileSync(this.file, plain + "\n", "utf8");
      } catch (e) {
        // Console keeps working; report the broken sink once.
        this.fileFailed = true;
        this.write(chalk.red(`[${this.tag}] Cannot write log file '${this.file}': ${String(e)}`));
      }
    }
  }
}

// zonecore/utils/logger.ts
//
// Scoped console logger. A line reads
//   12:00:00.000 [SCOPE:LEVEL] message key=value key=value
// with UTC wall-clock time. warn and error go to stderr.

import { colorEnabled, colorize, ColorCode, Colors } from "./colors";
import { LogLevel, logEnabled } from "../config/logconfig";

export type LogFields = Record<string, unknown>;

const LEVEL_COLORS: Record<LogLevel, ColorCode> = {
  debug: Colors.BrightCyan,
  info: Colors.Green,
  warn: Colors.Yellow,
  error: Colors.Red,
};

function clockTime(): string {
  return new Date().toISOString().slice(11, 23);
}

function errorFields(err: Error): LogFields {
  return { error: err.message, name: err.name, stack: err.stack };
}

function formatValue(value: unknown): string {
  if (value instanceof Error) return JSON.stringify(value.message);
  if (typeof value === "string") return /\s|=|"/.test(value) ? JSON.stringify(value) : value;
  if (value === undefined) return "undefined";
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

export function formatFields(fields: LogFields): string {
  return Object.entries(fields)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(" ");
}

export class Logger {
  private constructor(private readonly scope: string) {}

  static scope(scope: string): Logger {
    return new Logger(scope.toUpperCase());
  }

  private write(level: LogLevel, message: string, extra: LogFields | Error | undefined, color = LEVEL_COLORS[level]): void {
    if (!logEnabled(this.scope, level)) return;

    const stream = level === "warn" || level === "error" ? process.stderr : process.stdout;
    const useColor = colorEnabled(stream);
    const tag = colorize(`[${this.scope}:${level.toUpperCase()}]`, color, useColor);

    let line = `${clockTime()} ${tag} ${message}`;
    if (extra !== undefined) {
      const { stack, ...fields } = extra instanceof Error ? errorFields(extra) : extra;
      const rendered = formatFields(typeof stack === "string" || stack === undefined ? fields : { ...fields, stack });
      if (rendered) line += ` ${colorize(rendered, Colors.Dim, useColor)}`;
      if (typeof stack === "string" && level === "error") line += `\n${stack}`;
    }
    stream.write(`${line}\n`);
  }

  debug(message: string, fields?: LogFields | Error): void {
    this.write("debug", message, fields);
  }

  info(message: string, fields?: LogFields | Error): void {
    this.write("info", message, fields);
  }

  warn(message: string, fields?: LogFields | Error): void {
    this.write("warn", message, fields);
  }

  error(message: string, fields?: LogFields | Error): void {
    this.write("error", message, fields);
  }

  /** Info level with a bright green tag, for startup milestones. */
  success(message: string, fields?: LogFields | Error): void {
    this.write("info", message, fields, Colors.BrightGreen);
  }
}

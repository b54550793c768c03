import * as fs from "fs";
import * as path from "path";

export type LogLevel = "INFO" | "ERROR";

export interface Logger {
  info(message: string): void;
  error(message: string): void;
  /** Log at ERROR level followed by the error's stack trace */
  exception(message: string, err: unknown): void;
}

export const now = (): string => new Date().toISOString();

/** Format one log line: `<timestamp> <LEVEL> <message>` */
export function formatLine(level: LogLevel, message: string, at: string = now()): string {
  return `${at} ${level} ${message}`;
}

function describe(err: unknown): string {
  if (err instanceof Error) return err.stack ?? `${err.name}: ${err.message}`;
  return String(err);
}

/**
 * Append-only line log. Each call writes synchronously so nothing is lost
 * when the process is interrupted mid-run.
 */
export class FileLogger implements Logger {
  constructor(private readonly filePath: string) {
    fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  }

  info(message: string): void {
    this.write("INFO", message);
  }

  error(message: string): void {
    this.write("ERROR", message);
  }

  exception(message: string, err: unknown): void {
    this.write("ERROR", `${message}\n${describe(err)}`);
  }

  private write(level: LogLevel, message: string): void {
    fs.appendFileSync(this.filePath, formatLine(level, message) + "\n", "utf-8");
  }
}

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  child(scope: string): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function formatArg(arg: unknown): string {
  if (typeof arg === "string") {
    return arg;
  }
  if (arg instanceof Error) {
    return arg.stack ?? arg.message;
  }
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

/**
 * Writes one line per record to stderr. Stdout belongs to the stdio MCP
 * transport and must never carry log output.
 */
export class StderrLogger implements Logger {
  private readonly scope: string;
  private readonly level: LogLevel;
  private readonly write: (line: string) => void;

  constructor(scope = "inkscript", level: LogLevel = "info", write?: (line: string) => void) {
    this.scope = scope;
    this.level = level;
    this.write = write ?? ((line) => process.stderr.write(line));
  }

  debug(message: string, ...args: unknown[]): void {
    this.log("debug", message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log("info", message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log("warn", message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log("error", message, args);
  }

  child(scope: string): Logger {
    return new StderrLogger(`${this.scope}:${scope}`, this.level, this.write);
  }

  private log(level: Exclude<LogLevel, "silent">, message: string, args: unknown[]): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) {
      return;
    }

    const suffix = args.length > 0 ? ` ${args.map(formatArg).join(" ")}` : "";
    this.write(`[${this.scope}] ${level.toUpperCase()} ${message}${suffix}\n`);
  }
}

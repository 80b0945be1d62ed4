export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

type LoggerOptions = {
  level?: LogLevel;
  context?: Record<string, unknown>;
  /** Receives one JSON line per record. Defaults to stdout/stderr by level. */
  output?: (line: string, level: LogLevel) => void;
};

function defaultOutput(line: string, level: LogLevel) {
  if (level === "error" || level === "warn") {
    console.error(line);
    return;
  }
  console.log(line);
}

/**
 * Leveled logger writing single-line JSON records:
 * `{"time":"…","level":"info","context":{…},"message":"…","data":…}`.
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly output: (line: string, level: LogLevel) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.context = options.context ?? {};
    this.output = options.output ?? defaultOutput;
  }

  debug(message: string, data?: unknown) {
    this.log("debug", message, data);
  }

  info(message: string, data?: unknown) {
    this.log("info", message, data);
  }

  warn(message: string, data?: unknown) {
    this.log("warn", message, data);
  }

  error(message: string, data?: unknown) {
    this.log("error", message, data);
  }

  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      context: { ...this.context, ...context },
      output: this.output,
    });
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.level]) return;

    const record: Record<string, unknown> = {
      time: new Date().toISOString(),
      level,
    };
    if (Object.keys(this.context).length > 0) {
      record.context = this.context;
    }
    record.message = message;
    if (data !== undefined) {
      record.data = data instanceof Error ? serializeError(data) : data;
    }

    this.output(JSON.stringify(record), level);
  }
}

function serializeError(error: Error) {
  return { name: error.name, message: error.message };
}

export function createLogger(options?: LoggerOptions) {
  return new Logger(options);
}

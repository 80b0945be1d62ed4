import { Logger, type LogLevel } from "@/lib/logger";

export type LogRecord = {
  time: string;
  level: LogLevel;
  context?: Record<string, unknown>;
  message: string;
  data?: unknown;
};

export function captureLogger(level: LogLevel = "debug") {
  const records: LogRecord[] = [];
  const logger = new Logger({
    level,
    output: (line) => {
      records.push(JSON.parse(line) as LogRecord);
    },
  });
  return { logger, records };
}

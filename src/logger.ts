import pino, { type Logger, type StreamEntry } from "pino";

export type { Logger } from "pino";

const rootLogger = pino({
  level: process.env.LOG_LEVEL ?? "warn",
  base: undefined,
}, pino.destination(2));

/**
 * Console logger for a module. Goes to stderr so it never mixes with the
 * progress bar and summary on stdout.
 */
export function createLogger(name: string): Logger {
  return rootLogger.child({ name });
}

export interface RunLoggerOptions {
  runLogPath: string;
  /** Long-lived log shared by every run, appended to. */
  mainLogPath?: string | null;
  level?: string;
}

export interface RunLogger {
  log: Logger;
  close(): void;
}

/**
 * File logger scoped to one run. Each component gets a child of `log`,
 * and `close()` must be called once the run is over.
 */
export function createRunLogger(options: RunLoggerOptions): RunLogger {
  const runFile = pino.destination({ dest: options.runLogPath, sync: true, mkdir: true });
  const files = [runFile];
  if (options.mainLogPath) {
    files.push(pino.destination({ dest: options.mainLogPath, sync: true, append: true, mkdir: true }));
  }

  const level = options.level ?? "info";
  const streams: StreamEntry[] = files.map((stream) => ({ stream, level: "trace" }));
  const log = pino(
    {
      level,
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(streams)
  );

  return {
    log,
    close() {
      for (const file of files) {
        file.end();
      }
    },
  };
}

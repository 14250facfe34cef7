import * as path from "path";
import pino, { type Logger } from "pino";

export interface LoggerOptions {
  level: string;
  /** Directory for the per-run log file. Omit to log to stdout only. */
  logDir?: string;
  /** Run start time, used in the log file name. */
  startedAt?: Date;
}

/** `indexing_2024-05-01_13-45-10.log` */
export const runLogFileName = (startedAt: Date): string =>
  `indexing_${startedAt.toISOString().slice(0, 19).replace("T", "_").replace(/:/g, "-")}.log`;

/**
 * Creates the run logger: readable, timestamped records on stdout and, when a log
 * directory is given, the same records in a file of their own for this run.
 */
export function createLogger(options: LoggerOptions): Logger {
  const prettyOptions = { translateTime: "SYS:yyyy-mm-dd HH:MM:ss.l", ignore: "pid,hostname" };
  const targets: pino.TransportTargetOptions[] = [
    {
      target: "pino-pretty",
      level: options.level,
      options: { ...prettyOptions, colorize: true, destination: 1 },
    },
  ];

  if (options.logDir) {
    targets.push({
      target: "pino-pretty",
      level: options.level,
      options: {
        ...prettyOptions,
        colorize: false,
        destination: path.resolve(options.logDir, runLogFileName(options.startedAt ?? new Date())),
        mkdir: true,
      },
    });
  }

  return pino({ level: options.level }, pino.transport({ targets }));
}

/** Logger that drops everything; for tests and library callers that do not log. */
export const silentLogger = (): Logger => pino({ level: "silent" });

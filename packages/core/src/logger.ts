import bunyan from "bunyan";

export type Logger = bunyan;

export interface CreateLoggerOptions {
  name?: string;
  level?: bunyan.LogLevel;
  stream?: NodeJS.WritableStream;
}

/** Logs go to stderr so stdout stays free for rendered games. */
export function createLogger(opts: CreateLoggerOptions = {}): Logger {
  return bunyan.createLogger({
    name: opts.name ?? "llmduel",
    level: opts.level ?? ((process.env.LOG_LEVEL as bunyan.LogLevelString) || "info"),
    stream: opts.stream ?? process.stderr,
  });
}

/** A logger that drops everything, for tests and embedding. */
export function createSilentLogger(name = "llmduel"): Logger {
  return createLogger({ name, level: bunyan.FATAL + 1 });
}

const log = createLogger();

export default log;

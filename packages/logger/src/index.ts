export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = {
  readonly symbol?: string;
} & Record<string, unknown>;

export interface Logger {
  readonly module: string;
  log(level: LogLevel, msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
}

/** Receives each serialised log line. Defaults to stdout/stderr. */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  readonly sink?: LogSink;
}

const writeLine: LogSink = (level, line) => {
  const output = level === "error" ? process.stderr : process.stdout;
  output.write(`${line}\n`);
};

const buildEntry = (moduleName: string, level: LogLevel, msg: string, meta?: LogMeta) => {
  const { symbol, ...rest } = meta ?? {};

  return {
    ts: new Date().toISOString(),
    level,
    module: moduleName,
    msg,
    ...(typeof symbol === "string" ? { symbol } : {}),
    ...rest,
  };
};

export const createLogger = (moduleName: string, options: LoggerOptions = {}): Logger => {
  const sink = options.sink ?? writeLine;

  const log = (level: LogLevel, msg: string, meta?: LogMeta): void => {
    const entry = buildEntry(moduleName, level, msg, meta);
    sink(level, JSON.stringify(entry));
  };

  return {
    module: moduleName,
    log,
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta),
  };
};

export interface CapturedLine {
  readonly level: LogLevel;
  readonly entry: Record<string, unknown>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === "object" && !Array.isArray(value);

/**
 * Sink that keeps parsed entries in memory, for tests and embedding.
 */
export const createMemorySink = (): { sink: LogSink; lines: CapturedLine[] } => {
  const lines: CapturedLine[] = [];
  const sink: LogSink = (level, line) => {
    const parsed: unknown = JSON.parse(line);
    const entry: Record<string, unknown> = isRecord(parsed) ? parsed : { value: parsed };
    lines.push({ level, entry });
  };
  return { sink, lines };
};

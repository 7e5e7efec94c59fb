import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { dirname } from "node:path";
import { type ILogObj, Logger } from "tslog";

const LEVEL_NAME_TO_ID: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export const LOG_LEVEL_ENV = "LOOPWRIGHT_LOG_LEVEL";
export const LOG_FILE_ENV = "LOOPWRIGHT_LOG_FILE";
export const LOG_RESET_ENV = "LOOPWRIGHT_LOG_RESET";

// Standard log line template for both console and file output
const LOG_TEMPLATE =
  "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}}:{{ms}}\t{{logLevelName}}\t[{{name}}]\t";

export function parseLogLevel(value?: string): number | undefined {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return undefined;
  }

  const numericLevel = Number(normalized);
  if (Number.isFinite(numericLevel)) {
    return Math.max(0, Math.min(6, Math.floor(numericLevel)));
  }

  return LEVEL_NAME_TO_ID[normalized];
}

function parseEnvBoolean(value?: string): boolean | undefined {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return undefined;
}

/**
 * Logger configuration options.
 */
export interface LoggerOptions {
  /**
   * Log level: 0=silly, 1=trace, 2=debug, 3=info, 4=warn, 5=error, 6=fatal
   * @default 4 (warn), or LOOPWRIGHT_LOG_LEVEL
   */
  minLevel?: number;

  /**
   * Output type: 'pretty' for development, 'json' for production
   * @default 'pretty'
   */
  type?: "pretty" | "json" | "hidden";

  /**
   * Logger name (appears in logs)
   * @default 'loopwright'
   */
  name?: string;

  /**
   * Truncate the log file instead of appending to it.
   * @default false, or LOOPWRIGHT_LOG_RESET
   */
  logReset?: boolean;
}

/**
 * Strips ANSI color codes from a string.
 */
export function stripAnsi(str: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI escape codes use control characters
  return str.replace(/\x1b\[[0-9;]*m/g, "");
}

// One WriteStream per process, shared by every logger
const fileSink: { path?: string; stream?: WriteStream; errorReported: boolean } = {
  errorReported: false,
};

function openFileSink(path: string, reset: boolean): WriteStream | undefined {
  if (fileSink.stream && fileSink.path === path) {
    return fileSink.stream;
  }
  fileSink.stream?.end();
  fileSink.stream = undefined;

  try {
    mkdirSync(dirname(path), { recursive: true });
    const stream = createWriteStream(path, { flags: reset ? "w" : "a" });
    stream.on("error", (error) => {
      if (!fileSink.errorReported) {
        console.error(`[loopwright] Log file write error, file logging disabled: ${error.message}`);
        fileSink.errorReported = true;
      }
      stream.end();
      if (fileSink.stream === stream) {
        fileSink.stream = undefined;
      }
    });
    fileSink.path = path;
    fileSink.stream = stream;
    fileSink.errorReported = false;
    return stream;
  } catch (error) {
    console.error(`Failed to initialize ${LOG_FILE_ENV} output:`, error);
    return undefined;
  }
}

/**
 * Closes the shared log file, resolving once buffered lines are flushed.
 * Used by tests.
 * @internal
 */
export function _resetFileLoggingState(): Promise<void> {
  const stream = fileSink.stream;
  fileSink.stream = undefined;
  fileSink.path = undefined;
  fileSink.errorReported = false;
  return new Promise((resolve) => {
    if (stream) {
      stream.end(() => resolve());
    } else {
      resolve();
    }
  });
}

/**
 * Create a tslog logger.
 *
 * Explicit options win over the LOOPWRIGHT_LOG_* environment variables. When
 * LOOPWRIGHT_LOG_FILE is set, formatted lines go to that file (ANSI stripped)
 * instead of the console.
 *
 * @example
 * ```typescript
 * // Development logger with pretty output
 * const logger = createLogger({ type: "pretty", minLevel: 2 });
 *
 * // Production logger with JSON output
 * const logger = createLogger({ type: "json", minLevel: 3 });
 *
 * // Silent logger for tests
 * const logger = createLogger({ type: "hidden" });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger<ILogObj> {
  const minLevel = options.minLevel ?? parseLogLevel(process.env[LOG_LEVEL_ENV]) ?? 4;
  const type = options.type ?? "pretty";
  const logFile = process.env[LOG_FILE_ENV]?.trim();
  const logReset = options.logReset ?? parseEnvBoolean(process.env[LOG_RESET_ENV]) ?? false;

  const stream = logFile ? openFileSink(logFile, logReset) : undefined;

  return new Logger<ILogObj>({
    name: options.name ?? "loopwright",
    minLevel,
    type: stream ? "pretty" : type,
    hideLogPositionForProduction: Boolean(stream) || type !== "pretty",
    prettyLogTemplate: LOG_TEMPLATE,
    overwrite: stream
      ? {
          transportFormatted: (logMetaMarkup: string, logArgs: unknown[]) => {
            const target = fileSink.stream;
            if (!target) return;
            const args = logArgs.map((arg) =>
              typeof arg === "string" ? stripAnsi(arg) : JSON.stringify(arg),
            );
            target.write(`${stripAnsi(logMetaMarkup)}${args.join(" ")}\n`);
          },
        }
      : undefined,
  });
}

/**
 * Logger for a runtime component: a named sub-logger of `parent` when the
 * caller supplied one, a fresh logger otherwise.
 *
 * @example
 * ```typescript
 * this.logger = componentLogger("loopwright:dispatcher", options.logger);
 * ```
 */
export function componentLogger(name: string, parent?: Logger<ILogObj>): Logger<ILogObj> {
  return parent ? parent.getSubLogger({ name }) : createLogger({ name });
}

/**
 * Default logger instance. Components create named loggers of their own
 * unless one is passed in.
 */
export const defaultLogger = createLogger();

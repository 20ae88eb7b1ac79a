export type LogSeverity = "debug" | "info" | "warn" | "error";

export interface Logger {
  log(severity: LogSeverity, message: string): void;
  progress(phase: string): void;
}

const SEVERITY_RANK: Record<LogSeverity, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  prefix?: string;
  level?: LogSeverity;
  // Receives formatted lines instead of the console
  sink?: (severity: LogSeverity, line: string) => void;
  onProgress?: (phase: string) => void;
}

function consoleSink(severity: LogSeverity, line: string): void {
  if (severity === "error") {
    console.error(line);
  } else if (severity === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const prefix = options.prefix ?? "swdprog";
  const threshold = SEVERITY_RANK[options.level ?? "info"];
  const sink = options.sink ?? consoleSink;

  return {
    log(severity, message) {
      if (SEVERITY_RANK[severity] < threshold) {
        return;
      }
      const stamp = new Date().toISOString();
      sink(severity, `${stamp} [${prefix}] ${severity.toUpperCase()}: ${message}`);
    },
    progress(phase) {
      options.onProgress?.(phase);
    },
  };
}

export const consoleLogger: Logger = createLogger();

export const silentLogger: Logger = {
  log() {},
  progress() {},
};

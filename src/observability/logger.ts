import { LogFields, LogLevel } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
}

export interface LoggerOptions {
  minLevel?: LogLevel;
  write?: (level: LogLevel, line: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function defaultWrite(level: LogLevel, line: string): void {
  if (level === "error") {
    console.error(line);
    return;
  }
  console.log(line);
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  return normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error"
    ? normalized
    : undefined;
}

export class Logger {
  private readonly context: LoggerContext;
  private readonly minLevel: LogLevel;
  private readonly sinkWrite: (level: LogLevel, line: string) => void;

  constructor(context: LoggerContext, options: LoggerOptions = {}) {
    this.context = context;
    this.minLevel = options.minLevel ?? parseLogLevel(process.env.LOG_LEVEL) ?? "info";
    this.sinkWrite = options.write ?? defaultWrite;
  }

  child(component: string): Logger {
    return new Logger(
      { component, runId: this.context.runId },
      { minLevel: this.minLevel, write: this.sinkWrite },
    );
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    this.sinkWrite(level, JSON.stringify(payload));
  }
}

/** Logger that discards everything; used where a caller does not care about log output. */
export function createSilentLogger(component = "test"): Logger {
  return new Logger({ component, runId: "run_silent" }, { minLevel: "error", write: () => undefined });
}

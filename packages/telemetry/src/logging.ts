export type ApplianceLogLevel = "debug" | "info" | "warn" | "error";

export type ApplianceLogSink = (level: ApplianceLogLevel, line: string) => void;

export interface ApplianceLoggerOptions {
  readonly name?: string;
  readonly level?: ApplianceLogLevel;
  readonly fields?: Record<string, unknown>;
  /** Receives each serialized line instead of the console. */
  readonly sink?: ApplianceLogSink;
}

export interface ApplianceLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): ApplianceLogger;
}

const LOG_LEVEL_PRIORITY: Record<ApplianceLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isLogLevel = (value: unknown): value is ApplianceLogLevel =>
  typeof value === "string" && Object.hasOwn(LOG_LEVEL_PRIORITY, value);

const consoleSink: ApplianceLogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export const createApplianceLogger = (options: ApplianceLoggerOptions = {}): ApplianceLogger => {
  const name = options.name ?? "appliance-rest";
  const threshold = LOG_LEVEL_PRIORITY[options.level ?? "info"];
  const sink = options.sink ?? consoleSink;
  const baseFields = {
    service: name,
    ...options.fields,
  } satisfies Record<string, unknown>;

  const createInstance = (contextFields: Record<string, unknown>): ApplianceLogger => {
    const write = (level: ApplianceLogLevel, message: string, context?: Record<string, unknown>) => {
      if (LOG_LEVEL_PRIORITY[level] < threshold) {
        return;
      }

      const payload = {
        timestamp: new Date().toISOString(),
        level,
        message,
        ...contextFields,
        ...context,
      } satisfies Record<string, unknown>;

      sink(level, JSON.stringify(payload));
    };

    return {
      debug(message, context) {
        write("debug", message, context);
      },
      info(message, context) {
        write("info", message, context);
      },
      warn(message, context) {
        write("warn", message, context);
      },
      error(message, context) {
        write("error", message, context);
      },
      child(additionalFields) {
        return createInstance({ ...contextFields, ...additionalFields });
      },
    } satisfies ApplianceLogger;
  };

  return createInstance(baseFields);
};

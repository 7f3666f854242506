import pino from "pino";

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface LoggerOptions {
  component: string;
  correlationId?: string;
}

const nodeEnv = process.env.NODE_ENV;
const isTest = nodeEnv === "test" || process.env.VITEST !== undefined;
const isDev = nodeEnv !== "production" && !isTest;

const baseOptions: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL ?? (isTest ? "silent" : "info"),
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

/**
 * Base logger configuration.
 * - Development: pretty-printed with colors
 * - Production: JSON format for log aggregation
 *
 * Both write to stderr: stdout carries command output (`list`, run summaries).
 */
const baseLogger = isDev
  ? pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    })
  : pino(baseOptions, pino.destination(2));

// Children copy the parent's level when created, so level changes are fanned out.
// Held weakly: a run logger is dropped with its pipeline.
const children = new Set<WeakRef<pino.Logger>>();
const released = new FinalizationRegistry<WeakRef<pino.Logger>>((ref) => children.delete(ref));

/**
 * Create a child logger with component context.
 */
export function createLogger(options: LoggerOptions): pino.Logger {
  const child = baseLogger.child({
    component: options.component,
    ...(options.correlationId && { correlationId: options.correlationId }),
  });
  const ref = new WeakRef(child);
  children.add(ref);
  released.register(child, ref);
  return child;
}

/**
 * Create a run-scoped logger; every line carries the run id.
 */
export function createRunLogger(runId: string): pino.Logger {
  return createLogger({ component: "pipeline", correlationId: runId });
}

/**
 * Raise or lower the level of every logger created so far (the CLI's `--verbose`).
 */
export function setLogLevel(level: LogLevel | "silent"): void {
  baseLogger.level = level;
  for (const ref of children) {
    const child = ref.deref();
    if (child) child.level = level;
    else children.delete(ref);
  }
}

/**
 * Re-export pino types for consumers.
 */
export type { Logger } from "pino";

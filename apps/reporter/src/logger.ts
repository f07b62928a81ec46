import pino from "pino";
import { config } from "./config.js";
import { currentExecutionContextId, NO_EXECUTION_CONTEXT } from "./execution-context.js";

const isDev = config.NODE_ENV !== "production";

// =============================================================================
// Structured Logger
// =============================================================================
//
// Usage patterns:
//
// SUCCESS (short, info level):
//   log.run.info({ runId, testplan }, "run started")
//
// FAILURE (detailed, error level):
//   log.storage.error({ error: err.message, samples: 512 }, "batch dropped")
//
// DEBUG (verbose, only in dev):
//   log.flusher.debug({ samples: 40, durationMs: 3 }, "flushed")
//
// =============================================================================

const baseConfig: pino.LoggerOptions = {
  level: config.LOG_LEVEL ?? (isDev ? "debug" : "info"),

  formatters: {
    level: (label) => ({ level: label }),
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  // Logs emitted from inside a simulated user carry its context id
  mixin() {
    const executionContextId = currentExecutionContextId();
    return executionContextId === NO_EXECUTION_CONTEXT ? {} : { executionContextId };
  },
};

// Pretty printing only for interactive development runs
export const logger =
  config.NODE_ENV === "development"
    ? pino({
        ...baseConfig,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
            messageFormat: "{component} | {msg}",
            singleLine: true,
          },
        },
      })
    : pino(baseConfig);

// =============================================================================
// Component Loggers
// =============================================================================

export const log = {
  // Reporter wiring and event handlers
  reporter: logger.child({ component: "reporter" }),

  // Background flush loop
  flusher: logger.child({ component: "flusher" }),

  // Database writes
  storage: logger.child({ component: "storage" }),

  // Run lifecycle (testrun / events rows, dashboard link)
  run: logger.child({ component: "run" }),

  // Shutdown sequencing
  shutdown: logger.child({ component: "shutdown" }),

  // System-level events
  system: logger.child({ component: "system" }),
};

// =============================================================================
// Convenience Functions
// =============================================================================

/**
 * Log a failure with full context for debugging
 */
export function logFailure(
  component: keyof typeof log,
  event: string,
  error: Error | unknown,
  context: Record<string, unknown>
): void {
  const err = error instanceof Error ? error : new Error(String(error));

  log[component].error({
    ...context,
    error: err.message,
    errorName: err.name,
    ...(isDev && { stack: err.stack }),
  }, event);
}

/**
 * Create a timer for measuring operation duration in milliseconds
 */
export function createTimer(): () => number {
  const start = process.hrtime.bigint();
  return () => Number(process.hrtime.bigint() - start) / 1_000_000;
}

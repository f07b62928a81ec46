export { Reporter, createReporter } from "./reporter.js";
export type { ReporterOptions, ReporterStats, CreateReporterOptions } from "./reporter.js";

export { LoadTestEventBus } from "./event-bus.js";
export type { LoadTestEvents, LoadTestEventMap, LoadTestEventName, LoadTestListener } from "./event-bus.js";

export {
  runInExecutionContext,
  currentExecutionContextId,
  NO_EXECUTION_CONTEXT,
} from "./execution-context.js";
export type { ExecutionContextProvider } from "./execution-context.js";

export { PostgresStorageSink } from "./storage-sink.js";
export type { StorageSink } from "./storage-sink.js";

export { ShutdownHookList, installProcessHooks } from "./shutdown-coordinator.js";

export * from "./domain/index.js";

export { register as metricsRegistry } from "./metrics.js";

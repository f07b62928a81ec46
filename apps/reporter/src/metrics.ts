import promClient from "prom-client";

// Registry shared with whatever exposes /metrics in the host process
export const register = promClient.register;

// ============================================
// Sample Metrics
// ============================================

/**
 * Counter: Samples appended to the buffer
 * Labels: outcome (success/failure)
 */
export const samplesBufferedTotal = new promClient.Counter({
  name: "loadtrace_samples_buffered_total",
  help: "Total number of request samples buffered",
  labelNames: ["outcome"],
});

/**
 * Counter: Samples persisted to the request table
 */
export const samplesWrittenTotal = new promClient.Counter({
  name: "loadtrace_samples_written_total",
  help: "Total number of request samples written to storage",
});

/**
 * Counter: Samples discarded after a failed batch write
 */
export const samplesDroppedTotal = new promClient.Counter({
  name: "loadtrace_samples_dropped_total",
  help: "Total number of request samples dropped after a failed write",
});

/**
 * Counter: Exceptions raised inside request event handlers
 * Labels: event (requestSuccess/requestFailure)
 */
export const handlerErrorsTotal = new promClient.Counter({
  name: "loadtrace_handler_errors_total",
  help: "Total number of errors raised while recording a request sample",
  labelNames: ["event"],
});

// ============================================
// Flush Metrics
// ============================================

/**
 * Histogram: Time to write one batch
 * Labels: status (ok/failed)
 */
export const flushDuration = new promClient.Histogram({
  name: "loadtrace_flush_duration_seconds",
  help: "Duration of batch writes to storage",
  labelNames: ["status"],
  buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1, 2, 5],
});

/**
 * Histogram: Samples per flushed batch
 */
export const flushBatchSize = new promClient.Histogram({
  name: "loadtrace_flush_batch_size",
  help: "Number of samples per flushed batch",
  buckets: [1, 10, 50, 100, 500, 1000, 5000, 10000],
});

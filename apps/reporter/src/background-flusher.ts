/**
 * Background Flusher
 *
 * Drains the sample buffer every `flushIntervalMs` and hands each epoch to the
 * storage sink as one batch. Samples therefore reach the database at most one
 * interval (plus the write itself) after they were recorded, at the cost of a
 * single insert per interval instead of one per request.
 *
 * A failed write drops what the sink could not store; the loop carries on
 * with the next epoch.
 * After `finish()`, the loop keeps going until it sees an empty buffer, so
 * everything appended before `finish()` has been handed to the sink by the
 * time `join()` resolves.
 */

import type { DrainableBuffer, Sample } from "./domain/index.js";
import type { StorageSink } from "./storage-sink.js";
import { log, logFailure, createTimer } from "./logger.js";
import { flushBatchSize, flushDuration, samplesDroppedTotal, samplesWrittenTotal } from "./metrics.js";

export interface BackgroundFlusherConfig {
  /** Pause between drains in milliseconds (default: 500) */
  flushIntervalMs?: number;
  /** Record prom-client metrics (default: false) */
  metrics?: boolean;
}

const DEFAULT_CONFIG: Required<BackgroundFlusherConfig> = {
  flushIntervalMs: 500,
  metrics: false,
};

export interface FlusherStats {
  running: boolean;
  drainAttempts: number;
  batchesWritten: number;
  samplesWritten: number;
  batchesDropped: number;
  samplesDropped: number;
  lastFlushDurationMs: number;
}

export class BackgroundFlusher {
  private config: Required<BackgroundFlusherConfig>;
  private loopPromise: Promise<void> | null = null;
  private finished = false;
  private exited = false;
  private wake: (() => void) | null = null;
  private stats = {
    drainAttempts: 0,
    batchesWritten: 0,
    samplesWritten: 0,
    batchesDropped: 0,
    samplesDropped: 0,
    lastFlushDurationMs: 0,
  };

  constructor(
    private readonly buffer: DrainableBuffer<Sample>,
    private readonly sink: StorageSink,
    config?: BackgroundFlusherConfig
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Start the flush loop
   */
  start(): void {
    if (this.loopPromise) {
      return; // Already started
    }

    this.loopPromise = this.run().catch((error) => {
      logFailure("flusher", "flush loop crashed", error, {});
    });

    log.flusher.info({ flushIntervalMs: this.config.flushIntervalMs }, "BackgroundFlusher started");
  }

  /**
   * Ask the loop to exit once the buffer is empty. Cuts the current pause short
   */
  finish(): void {
    this.finished = true;
    this.wake?.();
  }

  /**
   * Resolves once the loop has exited (immediately if it was never started)
   */
  async join(): Promise<void> {
    if (this.loopPromise) {
      await this.loopPromise;
    }
  }

  isFinished(): boolean {
    return this.finished;
  }

  private async run(): Promise<void> {
    for (;;) {
      this.stats.drainAttempts++;
      const batch = this.buffer.drainAll();

      if (batch.length > 0) {
        await this.writeBatch(batch);
      } else if (this.finished) {
        break;
      }

      await this.pause();
    }

    this.exited = true;
    log.flusher.info(
      {
        batchesWritten: this.stats.batchesWritten,
        samplesWritten: this.stats.samplesWritten,
        samplesDropped: this.stats.samplesDropped,
      },
      "BackgroundFlusher stopped"
    );
  }

  private async writeBatch(batch: Sample[]): Promise<void> {
    const elapsed = createTimer();
    let written: number;

    try {
      written = await this.sink.writeSamples(batch);
    } catch (error) {
      logFailure("flusher", "sample write threw, batch dropped", error, { samples: batch.length });
      written = 0;
    }

    const durationMs = elapsed();
    const dropped = batch.length - written;
    const complete = dropped === 0;
    this.stats.lastFlushDurationMs = durationMs;
    this.stats.samplesWritten += written;
    this.stats.samplesDropped += dropped;

    if (complete) {
      this.stats.batchesWritten++;
    } else {
      this.stats.batchesDropped++;
    }

    if (this.config.metrics) {
      flushDuration.observe({ status: complete ? "ok" : "failed" }, durationMs / 1000);
      flushBatchSize.observe(batch.length);
      if (written > 0) {
        samplesWrittenTotal.inc(written);
      }
      if (dropped > 0) {
        samplesDroppedTotal.inc(dropped);
      }
    }

    log.flusher.debug({ samples: batch.length, durationMs, written, dropped }, "flushed");
  }

  private pause(): Promise<void> {
    if (this.finished) {
      // Draining out: go straight to the next drain attempt
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const timer = setTimeout(resolve, this.config.flushIntervalMs);
      this.wake = () => {
        clearTimeout(timer);
        resolve();
      };
    }).finally(() => {
      this.wake = null;
    });
  }

  getStats(): FlusherStats {
    return {
      running: this.loopPromise !== null && !this.exited,
      ...this.stats,
    };
  }
}

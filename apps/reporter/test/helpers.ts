/**
 * Unit test helpers
 */

import type { Run, Sample } from "../src/domain/index.js";
import type { StorageSink } from "../src/storage-sink.js";

export type SinkCall =
  | { op: "writeSamples"; batch: Sample[] }
  | { op: "writeRunStart"; runId: Date }
  | { op: "writeRunEnd"; runId: Date; endTime: Date }
  | { op: "close" };

/**
 * In-memory StorageSink that records every call in order
 */
export class RecordingSink implements StorageSink {
  readonly calls: SinkCall[] = [];
  /** Make the next N writeSamples calls resolve 0 */
  failNextWrites = 0;
  /** Make the next N writeSamples calls reject */
  throwNextWrites = 0;
  /** Artificial latency of writeSamples in ms */
  writeDelayMs = 0;

  async writeSamples(batch: readonly Sample[]): Promise<number> {
    this.calls.push({ op: "writeSamples", batch: [...batch] });
    if (this.writeDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.writeDelayMs));
    }
    if (this.throwNextWrites > 0) {
      this.throwNextWrites--;
      throw new Error("connection reset");
    }
    if (this.failNextWrites > 0) {
      this.failNextWrites--;
      return 0;
    }
    return batch.length;
  }

  async writeRunStart(run: Run): Promise<boolean> {
    this.calls.push({ op: "writeRunStart", runId: run.runId });
    return true;
  }

  async writeRunEnd(run: Run, endTime: Date): Promise<boolean> {
    this.calls.push({ op: "writeRunEnd", runId: run.runId, endTime });
    return true;
  }

  async close(): Promise<void> {
    this.calls.push({ op: "close" });
  }

  ops(): string[] {
    return this.calls.map((call) => call.op);
  }

  /** Every sample handed to writeSamples, in order */
  writtenSamples(): Sample[] {
    return this.calls.flatMap((call) => (call.op === "writeSamples" ? call.batch : []));
  }

  count(op: SinkCall["op"]): number {
    return this.calls.filter((call) => call.op === op).length;
  }
}

export const RUN_ID = new Date("2024-05-01T12:00:00.000Z");

export function makeSample(name: string, overrides: Partial<{ time: Date; executionContextId: number }> = {}): Sample {
  return {
    time: overrides.time ?? new Date("2024-05-01T12:00:01.000Z"),
    runId: RUN_ID,
    executionContextId: overrides.executionContextId ?? 1,
    origin: "loadgen-1",
    name,
    kind: "GET",
    responseTime: 12.5,
    testplan: "checkout",
    success: true,
    responseLength: 100,
    exception: null,
  };
}

/**
 * Poll until `predicate` holds or fail after `timeoutMs`
 */
export async function waitFor(predicate: () => boolean, timeoutMs = 1000): Promise<void> {
  const start = Date.now();
  while (!predicate()) {
    if (Date.now() - start > timeoutMs) {
      throw new Error(`condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 2));
  }
}

/**
 * Storage sink for request samples and run lifecycle rows.
 *
 * Every write is best-effort: failures are logged and reported through the
 * result, never thrown, so neither the flush loop nor the shutdown sequence
 * can be aborted by the database.
 */

import { eq, sql } from "drizzle-orm";
import { request, testrun, events, type DbHandle, type NewRequestRow } from "@loadtrace/db";
import type { Run, Sample } from "./domain/index.js";
import { log, logFailure } from "./logger.js";

/**
 * Rows per insert statement. postgres.js rejects statements binding 65534 or
 * more parameters and each request row binds 11.
 */
export const SAMPLE_INSERT_CHUNK_SIZE = 5000;

export interface StorageSink {
  /** Multi-row inserts; resolves the number of samples actually written */
  writeSamples(batch: readonly Sample[]): Promise<number>;
  writeRunStart(run: Run): Promise<boolean>;
  writeRunEnd(run: Run, endTime: Date): Promise<boolean>;
  /** Release the connection. Safe to call more than once */
  close(): Promise<void>;
}

function chunkArray<T>(array: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < array.length; i += size) {
    chunks.push(array.slice(i, i + size));
  }
  return chunks;
}

function toRow(sample: Sample): NewRequestRow {
  return {
    time: sample.time,
    runId: sample.runId,
    exception: sample.exception,
    executionContextId: sample.executionContextId,
    origin: sample.origin,
    name: sample.name,
    kind: sample.kind,
    responseLength: sample.responseLength,
    responseTime: sample.responseTime,
    success: sample.success,
    testplan: sample.testplan,
  };
}

export class PostgresStorageSink implements StorageSink {
  private closePromise: Promise<void> | null = null;

  constructor(private readonly handle: DbHandle) {}

  /**
   * Round-trip to the server. Throws if the database is unreachable
   */
  async verifyConnection(): Promise<void> {
    await this.handle.db.execute(sql`select 1`);
  }

  async writeSamples(batch: readonly Sample[]): Promise<number> {
    let written = 0;

    for (const chunk of chunkArray(batch, SAMPLE_INSERT_CHUNK_SIZE)) {
      try {
        await this.handle.db.insert(request).values(chunk.map(toRow));
        written += chunk.length;
      } catch (error) {
        logFailure("storage", "failed to write samples, chunk dropped", error, {
          samples: chunk.length,
          batchSize: batch.length,
        });
      }
    }

    return written;
  }

  async writeRunStart(run: Run): Promise<boolean> {
    try {
      await this.handle.db.insert(testrun).values({
        runId: run.runId,
        testplan: run.testplan,
        profileName: run.profileName,
        numClients: run.numClients,
        rps: run.targetRps,
        description: run.description,
      });
      await this.handle.db.insert(events).values({
        time: new Date(),
        text: `${run.testplan} started`,
      });
      log.storage.debug({ runId: run.runId.toISOString() }, "testrun row inserted");
      return true;
    } catch (error) {
      logFailure("storage", "failed to insert testrun record", error, {
        runId: run.runId.toISOString(),
      });
      return false;
    }
  }

  async writeRunEnd(run: Run, endTime: Date): Promise<boolean> {
    try {
      await this.handle.db
        .update(testrun)
        .set({ endTime })
        .where(eq(testrun.runId, run.runId));
      await this.handle.db.insert(events).values({
        time: endTime,
        text: `${run.testplan} finished`,
      });
      return true;
    } catch (error) {
      logFailure("storage", "failed to update testrun record with end time", error, {
        runId: run.runId.toISOString(),
      });
      return false;
    }
  }

  close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.handle.end().then(
        () => {
          log.storage.debug({}, "connection closed");
        },
        (error: unknown) => {
          logFailure("storage", "failed to close connection", error, {});
        }
      );
    }
    return this.closePromise;
  }
}

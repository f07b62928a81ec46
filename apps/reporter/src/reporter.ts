/**
 * Load-test reporter: records every request outcome of a run into
 * PostgreSQL / TimescaleDB without slowing down the simulated users.
 *
 *   host events --> EventSubscriber --> SwapBuffer
 *   every 500ms --> BackgroundFlusher --> StorageSink (request table)
 *   quitting    --> ShutdownCoordinator --> final drain, testrun end, close
 *
 * Expected tables (drizzle definitions in @loadtrace/db):
 *
 *   request(time, run_id, exception, execution_context_id, origin, name,
 *           kind, response_length, response_time, success, testplan)
 *   testrun(run_id, testplan, profile_name, num_clients, rps, description, end_time)
 *   events(time, text)
 */

import { hostname } from "node:os";
import { createDb } from "@loadtrace/db";
import { SwapBuffer, type Sample } from "./domain/index.js";
import { BackgroundFlusher, type FlusherStats } from "./background-flusher.js";
import { EventSubscriber } from "./event-subscriber.js";
import type { LoadTestEvents } from "./event-bus.js";
import type { ExecutionContextProvider } from "./execution-context.js";
import { RunLifecycleTracker } from "./run-lifecycle.js";
import { PostgresStorageSink, type StorageSink } from "./storage-sink.js";
import { installProcessHooks, ShutdownCoordinator, ShutdownHookList } from "./shutdown-coordinator.js";
import { config } from "./config.js";
import { log, logFailure } from "./logger.js";

export interface ReporterOptions {
  testplan: string;
  events: LoadTestEvents;
  sink: StorageSink;
  profileName?: string;
  description?: string;
  /** Defaults to process.argv */
  argv?: readonly string[];
  /** Defaults to LOADTEST_RUN_ID */
  externalRunId?: string;
  /** Defaults to LOADTEST_RPS */
  targetRps?: string;
  /** Defaults to LOADTEST_DASHBOARD_URL */
  dashboardUrl?: string;
  /** Defaults to REPORTER_FLUSH_INTERVAL_MS */
  flushIntervalMs?: number;
  /** Defaults to REPORTER_METRICS_ENABLED */
  metrics?: boolean;
  /** Defaults to os.hostname() */
  origin?: string;
  executionContext?: ExecutionContextProvider;
  /** Hook list the exit sequence registers on; a private one by default */
  hooks?: ShutdownHookList;
  /** Clock, for tests */
  now?: () => Date;
}

export interface ReporterStats extends FlusherStats {
  bufferedSamples: number;
}

export class Reporter {
  readonly tracker: RunLifecycleTracker;
  readonly hooks: ShutdownHookList;
  private readonly buffer = new SwapBuffer<Sample>();
  private readonly flusher: BackgroundFlusher;
  private readonly subscriber: EventSubscriber;
  private readonly coordinator: ShutdownCoordinator;
  private started = false;

  constructor(options: ReporterOptions) {
    if (options.testplan.trim() === "") {
      throw new Error("Reporter requires a non-empty testplan name");
    }

    const metrics = options.metrics ?? config.REPORTER_METRICS_ENABLED;

    this.hooks = options.hooks ?? new ShutdownHookList();

    this.tracker = new RunLifecycleTracker({
      testplan: options.testplan,
      sink: options.sink,
      argv: options.argv ?? process.argv,
      externalRunId: options.externalRunId ?? config.LOADTEST_RUN_ID,
      profileName: options.profileName,
      description: options.description,
      targetRps: options.targetRps ?? config.LOADTEST_RPS,
      dashboardUrl: options.dashboardUrl ?? config.LOADTEST_DASHBOARD_URL,
      now: options.now,
    });

    this.flusher = new BackgroundFlusher(this.buffer, options.sink, {
      flushIntervalMs: options.flushIntervalMs ?? config.REPORTER_FLUSH_INTERVAL_MS,
      metrics,
    });

    this.coordinator = new ShutdownCoordinator(this.flusher, this.tracker, options.sink, this.hooks);

    this.subscriber = new EventSubscriber({
      events: options.events,
      buffer: this.buffer,
      runId: this.tracker.run.runId,
      testplan: options.testplan,
      origin: options.origin ?? hostname(),
      onQuitting: () => this.quit(),
      executionContext: options.executionContext,
      metrics,
    });
  }

  get runId(): Date {
    return this.tracker.run.runId;
  }

  /**
   * Start flushing, record the run start, then begin listening
   */
  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;

    this.flusher.start();
    await this.tracker.start();
    this.subscriber.attach();

    log.reporter.info(
      { testplan: this.tracker.run.testplan, runId: this.runId.toISOString(), role: this.tracker.role },
      "reporter started"
    );
  }

  /**
   * Stop listening, flush everything buffered, close the run and the connection
   */
  async quit(): Promise<void> {
    this.subscriber.detach();
    await this.coordinator.quit();
  }

  /**
   * Exit sequence without the host's quitting notification. Idempotent
   */
  async exit(): Promise<void> {
    this.subscriber.detach();
    await this.coordinator.exit();
  }

  getStats(): ReporterStats {
    return {
      bufferedSamples: this.buffer.size(),
      ...this.flusher.getStats(),
    };
  }
}

export type CreateReporterOptions = Omit<ReporterOptions, "sink" | "hooks"> & {
  /** Bind the exit sequence to SIGINT / SIGTERM / beforeExit (default: true) */
  installProcessHooks?: boolean;
};

/**
 * Connect to the database from the environment and start a reporter.
 * An unreachable database is fatal.
 */
export async function createReporter(options: CreateReporterOptions): Promise<Reporter> {
  const handle = createDb({
    databaseUrl: config.DATABASE_URL,
    max: config.DATABASE_POOL_MAX,
    connectTimeoutS: config.DATABASE_CONNECT_TIMEOUT_S,
  });
  const sink = new PostgresStorageSink(handle);

  try {
    await sink.verifyConnection();
  } catch (error) {
    logFailure("system", "cannot reach the samples database", error, {
      hint:
        "Set DATABASE_URL, or the standard postgres variables (PGHOST, PGPORT, PGDATABASE, PGUSER, PGPASSWORD), " +
        "see https://www.postgresql.org/docs/current/libpq-envars.html",
      pgHost: config.PGHOST,
    });
    await sink.close();
    throw error;
  }

  const hooks = new ShutdownHookList();
  const reporter = new Reporter({ ...options, sink, hooks });

  if (options.installProcessHooks ?? true) {
    const uninstall = installProcessHooks(hooks);
    hooks.register("process-hooks", async () => uninstall());
  }

  await reporter.start();
  return reporter;
}

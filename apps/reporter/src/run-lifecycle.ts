/**
 * Run Lifecycle Tracker
 *
 * Owns the run id and, on coordinating nodes, the testrun row:
 *
 *   created --start()--> running --finish()--> closed
 *
 * A coordinator (standalone process or distributed leader) writes the start
 * record once and the end record once, then logs a dashboard link for the
 * run's time window. Followers tag their samples with the shared run id and
 * never write lifecycle rows.
 */

import {
  buildDashboardUrl,
  detectRunRole,
  isCoordinator,
  parseClientCount,
  resolveRunId,
  type Run,
  type RunRole,
} from "./domain/index.js";
import type { StorageSink } from "./storage-sink.js";
import { log } from "./logger.js";

export interface RunLifecycleOptions {
  testplan: string;
  sink: StorageSink;
  /** Command-line arguments inspected for role markers and client count */
  argv: readonly string[];
  /** Run id supplied by the swarm launcher (LOADTEST_RUN_ID) */
  externalRunId?: string;
  profileName?: string;
  description?: string;
  targetRps?: string;
  /** Base of the dashboard link; no link is logged without it */
  dashboardUrl?: string;
  /** Clock, for tests */
  now?: () => Date;
}

export type RunLifecycleState = "created" | "running" | "closed";

export class RunLifecycleTracker {
  readonly role: RunRole;
  readonly run: Run;
  private state: RunLifecycleState = "created";
  private readonly now: () => Date;

  constructor(private readonly options: RunLifecycleOptions) {
    this.now = options.now ?? (() => new Date());
    this.role = detectRunRole(options.argv);

    const runId = resolveRunId(this.role, options.externalRunId, this.now());
    this.run = {
      runId,
      testplan: options.testplan,
      profileName: options.profileName ?? "",
      numClients: parseClientCount(options.argv),
      targetRps: options.targetRps ?? "0",
      description: options.description ?? "",
      startTime: runId,
      endTime: null,
    };
  }

  get isCoordinator(): boolean {
    return isCoordinator(this.role);
  }

  getState(): RunLifecycleState {
    return this.state;
  }

  /**
   * Record the run start (coordinator only). Later calls are no-ops
   */
  async start(): Promise<void> {
    if (this.state !== "created") {
      return;
    }
    this.state = "running";

    log.run.info(
      { runId: this.run.runId.toISOString(), role: this.role, testplan: this.run.testplan },
      "run started"
    );

    if (this.isCoordinator) {
      await this.options.sink.writeRunStart(this.run);
    }
  }

  /**
   * Record the run end and log the dashboard link (coordinator only).
   * Later calls are no-ops; returns the link when one was produced.
   * A run that never started has no testrun row to close.
   */
  async finish(): Promise<string | null> {
    if (this.state === "closed") {
      return null;
    }
    const wasRunning = this.state === "running";
    this.state = "closed";

    const endTime = this.now();
    this.run.endTime = endTime;

    if (!this.isCoordinator) {
      log.run.info({ runId: this.run.runId.toISOString(), role: this.role }, "run finished");
      return null;
    }

    if (!wasRunning) {
      log.run.warn({ runId: this.run.runId.toISOString() }, "run closed before it started, no end record written");
      return null;
    }

    await this.options.sink.writeRunEnd(this.run, endTime);

    if (!this.options.dashboardUrl) {
      log.run.info({ runId: this.run.runId.toISOString() }, "run finished");
      return null;
    }

    const url = buildDashboardUrl(this.options.dashboardUrl, this.run.testplan, this.run.runId, endTime);
    log.run.info({ runId: this.run.runId.toISOString(), url }, `Report: ${url}`);
    return url;
  }
}

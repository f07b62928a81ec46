/**
 * Shutdown sequencing.
 *
 * Two paths lead to the exit sequence: the host's `quitting` notification
 * (`quit()`), and the process going down (signals / beforeExit, via the hook
 * list). Both end in the memoized `exit()`, so a signal arriving while
 * `quit()` waits on the flusher joins the same teardown and the process only
 * exits once the final flush and close are done.
 */

import type { EventEmitter } from "node:events";
import type { BackgroundFlusher } from "./background-flusher.js";
import type { RunLifecycleTracker } from "./run-lifecycle.js";
import type { StorageSink } from "./storage-sink.js";
import { log, logFailure } from "./logger.js";

// =============================================================================
// Hook list
// =============================================================================

export type ShutdownHook = () => Promise<void>;

/**
 * Owned list of teardown hooks. Nothing is registered globally; whoever owns
 * the list decides when `runAll()` is called.
 */
export class ShutdownHookList {
  private hooks: Array<{ name: string; hook: ShutdownHook }> = [];

  register(name: string, hook: ShutdownHook): void {
    this.hooks.push({ name, hook });
  }

  size(): number {
    return this.hooks.length;
  }

  /**
   * Take every registered hook and run them in order. A failing hook is
   * logged and the rest still run. Hooks run at most once.
   */
  async runAll(): Promise<void> {
    const hooks = this.hooks;
    this.hooks = [];

    for (const { name, hook } of hooks) {
      try {
        await hook();
      } catch (error) {
        logFailure("shutdown", "shutdown hook failed", error, { hook: name });
      }
    }
  }
}

// =============================================================================
// Process binding
// =============================================================================

const SHUTDOWN_TIMEOUT_MS = 30000;

export interface ProcessHookOptions {
  /** Defaults to process.exit */
  exit?: (code: number) => void;
  /** Hard deadline for the hooks once a signal arrived (default: 30s) */
  timeoutMs?: number;
  /** Where signals are received (default: process) */
  target?: EventEmitter;
}

/**
 * Run the hook list on SIGINT / SIGTERM (then exit) and on beforeExit.
 * A second signal while the hooks are running forces exit with code 1.
 * Returns a function that removes the listeners again.
 */
export function installProcessHooks(
  hooks: ShutdownHookList,
  options: ProcessHookOptions = {}
): () => void {
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const timeoutMs = options.timeoutMs ?? SHUTDOWN_TIMEOUT_MS;
  const target = options.target ?? process;
  let shutdownInProgress = false;

  async function initiateShutdown(signal: NodeJS.Signals): Promise<void> {
    if (shutdownInProgress) {
      log.shutdown.warn({ signal }, "shutdown already in progress, forcing exit");
      exit(1);
      return;
    }
    shutdownInProgress = true;

    log.shutdown.info({ signal }, "shutting down");

    const forceExitTimer = setTimeout(() => {
      log.shutdown.error({ signal }, "shutdown timeout exceeded, forcing exit");
      exit(1);
    }, timeoutMs);
    forceExitTimer.unref();

    await hooks.runAll();
    clearTimeout(forceExitTimer);
    exit(0);
  }

  const onSignal = (signal: NodeJS.Signals) => {
    initiateShutdown(signal).catch((error) => {
      logFailure("shutdown", "shutdown error", error, { signal });
      exit(1);
    });
  };

  const onBeforeExit = () => {
    hooks.runAll().catch((error) => {
      logFailure("shutdown", "shutdown error", error, { signal: "beforeExit" });
    });
  };

  target.on("SIGTERM", onSignal);
  target.on("SIGINT", onSignal);
  target.on("beforeExit", onBeforeExit);

  return () => {
    target.off("SIGTERM", onSignal);
    target.off("SIGINT", onSignal);
    target.off("beforeExit", onBeforeExit);
  };
}

// =============================================================================
// Coordinator
// =============================================================================

export type ShutdownState = "active" | "quitting" | "exiting" | "terminated";

export class ShutdownCoordinator {
  private state: ShutdownState = "active";
  private quitPromise: Promise<void> | null = null;
  private exitPromise: Promise<void> | null = null;

  constructor(
    private readonly flusher: BackgroundFlusher,
    private readonly tracker: RunLifecycleTracker,
    private readonly sink: StorageSink,
    private readonly hooks: ShutdownHookList
  ) {
    this.hooks.register("reporter-exit", () => this.exit());
  }

  getState(): ShutdownState {
    return this.state;
  }

  /**
   * Handle the host's quitting notification: let the flusher drain the last
   * epoch, wait for it, then run the exit sequence.
   */
  quit(): Promise<void> {
    if (!this.quitPromise) {
      this.quitPromise = this.doQuit();
    }
    return this.quitPromise;
  }

  private async doQuit(): Promise<void> {
    if (this.state === "active") {
      this.state = "quitting";
    }

    this.flusher.finish();

    log.shutdown.debug({}, "waiting for final flush");
    await this.flusher.join();

    await this.exit();
  }

  /**
   * Drain what is left, finish the run record, then close storage. Runs
   * once; later calls return the first call's promise.
   */
  exit(): Promise<void> {
    if (!this.exitPromise) {
      this.exitPromise = this.doExit();
    }
    return this.exitPromise;
  }

  private async doExit(): Promise<void> {
    this.state = "exiting";

    // Reached straight from a process hook the loop may still be running
    this.flusher.finish();
    await this.flusher.join();

    try {
      await this.tracker.finish();
    } catch (error) {
      logFailure("shutdown", "failed to finish run record", error, {});
    }

    await this.sink.close();

    this.state = "terminated";
    log.shutdown.info({}, "reporter stopped");
  }
}

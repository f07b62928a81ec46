import {
  buildFailureSample,
  buildSuccessSample,
  type DrainableBuffer,
  type RequestFailure,
  type RequestSuccess,
  type Sample,
} from "./domain/index.js";
import type { LoadTestEvents } from "./event-bus.js";
import { currentExecutionContextId, type ExecutionContextProvider } from "./execution-context.js";
import { log, logFailure } from "./logger.js";
import { handlerErrorsTotal, samplesBufferedTotal } from "./metrics.js";

export interface EventSubscriberOptions {
  events: LoadTestEvents;
  buffer: DrainableBuffer<Sample>;
  runId: Date;
  testplan: string;
  origin: string;
  /** Invoked on `quitting`; the host waits for the returned promise */
  onQuitting: () => Promise<void>;
  executionContext?: ExecutionContextProvider;
  /** Record prom-client counters (default: false) */
  metrics?: boolean;
}

/**
 * Turns host notifications into buffered samples.
 *
 * The request handlers only build a sample and push it; they never await or
 * touch the database. An error raised while recording is logged and counted
 * here rather than thrown back into the host's request loop.
 */
export class EventSubscriber {
  private unsubscribers: Array<() => void> = [];
  private readonly executionContext: ExecutionContextProvider;

  constructor(private readonly options: EventSubscriberOptions) {
    this.executionContext = options.executionContext ?? currentExecutionContextId;
  }

  attach(): void {
    if (this.unsubscribers.length > 0) {
      return; // Already attached
    }

    const { events } = this.options;
    this.unsubscribers = [
      events.on("requestSuccess", (event) => this.onRequestSuccess(event)),
      events.on("requestFailure", (event) => this.onRequestFailure(event)),
      events.on("quitting", () => this.options.onQuitting()),
    ];

    log.reporter.debug({ testplan: this.options.testplan }, "listeners attached");
  }

  detach(): void {
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];
  }

  isAttached(): boolean {
    return this.unsubscribers.length > 0;
  }

  onRequestSuccess(event: RequestSuccess): void {
    try {
      this.record(buildSuccessSample(this.sampleContext(), event));
    } catch (error) {
      this.handlerFailed("requestSuccess", error, event.name);
    }
  }

  onRequestFailure(event: RequestFailure): void {
    try {
      this.record(buildFailureSample(this.sampleContext(), event));
    } catch (error) {
      this.handlerFailed("requestFailure", error, event.name);
    }
  }

  private sampleContext() {
    return {
      runId: this.options.runId,
      testplan: this.options.testplan,
      origin: this.options.origin,
      executionContextId: this.executionContext(),
    };
  }

  private record(sample: Sample): void {
    this.options.buffer.append(sample);
    if (this.options.metrics) {
      samplesBufferedTotal.inc({ outcome: sample.success ? "success" : "failure" });
    }
  }

  private handlerFailed(event: string, error: unknown, name: string): void {
    if (this.options.metrics) {
      handlerErrorsTotal.inc({ event });
    }
    logFailure("reporter", "failed to record sample", error, { event, name });
  }
}

import { inspect } from "node:util";

/** Payload of a successful request notification */
export interface RequestSuccess {
  /** Request category, e.g. "GET" or "grpc" */
  kind: string;
  name: string;
  /** Milliseconds */
  responseTime: number;
  /** Bytes; hosts that cannot measure it pass 0 */
  responseLength: number;
}

/** Payload of a failed request notification */
export interface RequestFailure {
  kind: string;
  name: string;
  responseTime: number;
  exception: unknown;
}

/** Values shared by every sample of a run */
export interface SampleContext {
  runId: Date;
  testplan: string;
  /** Host name of the load generator */
  origin: string;
  executionContextId: number;
}

interface SampleBase {
  readonly time: Date;
  readonly runId: Date;
  readonly executionContextId: number;
  readonly origin: string;
  readonly name: string;
  readonly kind: string;
  readonly responseTime: number;
  readonly testplan: string;
}

export interface SuccessSample extends SampleBase {
  readonly success: true;
  readonly responseLength: number;
  readonly exception: null;
}

export interface FailureSample extends SampleBase {
  readonly success: false;
  readonly responseLength: null;
  readonly exception: string;
}

/** One completed request; `responseLength` and `exception` follow `success` */
export type Sample = SuccessSample | FailureSample;

export const UNKNOWN_EXCEPTION = "unknown";

/**
 * Text stored in the `exception` column.
 *
 * Errors render as `Name("message")`, strings as themselves, anything else
 * through util.inspect. A missing exception still yields a value, since a
 * failed sample always carries one.
 */
export function formatException(exception: unknown): string {
  if (exception instanceof Error) {
    return `${exception.name}(${JSON.stringify(exception.message)})`;
  }
  if (exception === undefined || exception === null || exception === "") {
    return UNKNOWN_EXCEPTION;
  }
  if (typeof exception === "string") {
    return exception;
  }
  return inspect(exception, { depth: 2, breakLength: Infinity });
}

export function buildSuccessSample(
  ctx: SampleContext,
  event: RequestSuccess,
  time: Date = new Date()
): SuccessSample {
  return Object.freeze({
    time,
    runId: ctx.runId,
    executionContextId: ctx.executionContextId,
    origin: ctx.origin,
    name: event.name,
    kind: event.kind,
    responseTime: event.responseTime,
    testplan: ctx.testplan,
    success: true,
    responseLength: Math.max(0, Math.trunc(event.responseLength)),
    exception: null,
  });
}

export function buildFailureSample(
  ctx: SampleContext,
  event: RequestFailure,
  time: Date = new Date()
): FailureSample {
  return Object.freeze({
    time,
    runId: ctx.runId,
    executionContextId: ctx.executionContextId,
    origin: ctx.origin,
    name: event.name,
    kind: event.kind,
    responseTime: event.responseTime,
    testplan: ctx.testplan,
    success: false,
    responseLength: null,
    exception: formatException(event.exception),
  });
}

import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import { EventSubscriber } from "../../event-subscriber.js";
import { LoadTestEventBus } from "../../event-bus.js";
import { SwapBuffer, type DrainableBuffer, type Sample } from "../../domain/index.js";
import { runInExecutionContext } from "../../execution-context.js";
import { RUN_ID } from "../../../test/helpers.js";

describe("EventSubscriber", () => {
  let bus: LoadTestEventBus;
  let buffer: SwapBuffer<Sample>;
  let onQuitting: Mock<() => Promise<void>>;

  function createSubscriber(overrides: Partial<ConstructorParameters<typeof EventSubscriber>[0]> = {}) {
    return new EventSubscriber({
      events: bus,
      buffer,
      runId: RUN_ID,
      testplan: "checkout",
      origin: "loadgen-1",
      onQuitting,
      ...overrides,
    });
  }

  beforeEach(() => {
    bus = new LoadTestEventBus();
    buffer = new SwapBuffer<Sample>();
    onQuitting = vi.fn(async () => {});
  });

  it("should buffer a success sample", () => {
    createSubscriber({ executionContext: () => 3 }).attach();

    bus.emit("requestSuccess", { kind: "GET", name: "/cart", responseTime: 20, responseLength: 150 });

    const [sample] = buffer.drainAll();
    expect(sample).toMatchObject({
      runId: RUN_ID,
      testplan: "checkout",
      origin: "loadgen-1",
      executionContextId: 3,
      name: "/cart",
      kind: "GET",
      responseTime: 20,
      success: true,
      responseLength: 150,
      exception: null,
    });
    expect(sample.time).toBeInstanceOf(Date);
  });

  it("should buffer a failure sample", () => {
    createSubscriber({ executionContext: () => 3 }).attach();

    bus.emit("requestFailure", { kind: "POST", name: "/pay", responseTime: 800, exception: new Error("timeout") });

    const [sample] = buffer.drainAll();
    expect(sample.success).toBe(false);
    expect(sample.responseLength).toBeNull();
    expect(sample.exception).toBe('Error("timeout")');
  });

  it("should take the id from the active execution context", () => {
    createSubscriber().attach();

    runInExecutionContext(() => {
      bus.emit("requestSuccess", { kind: "GET", name: "/", responseTime: 1, responseLength: 1 });
    }, 12);
    bus.emit("requestSuccess", { kind: "GET", name: "/", responseTime: 1, responseLength: 1 });

    expect(buffer.drainAll().map((sample) => sample.executionContextId)).toEqual([12, -1]);
  });

  it("should forward quitting and hand its promise to the host", async () => {
    createSubscriber().attach();

    await bus.quit();

    expect(onQuitting).toHaveBeenCalledTimes(1);
  });

  it("should attach only once", () => {
    const subscriber = createSubscriber();
    subscriber.attach();
    subscriber.attach();

    expect(bus.listenerCount("requestSuccess")).toBe(1);
    expect(subscriber.isAttached()).toBe(true);
  });

  it("should stop recording after detach", () => {
    const subscriber = createSubscriber();
    subscriber.attach();
    subscriber.detach();

    bus.emit("requestSuccess", { kind: "GET", name: "/", responseTime: 1, responseLength: 1 });

    expect(buffer.isEmpty()).toBe(true);
    expect(bus.listenerCount("quitting")).toBe(0);
  });

  it("should not throw into the host when recording fails", () => {
    const failing: DrainableBuffer<Sample> = {
      append: () => {
        throw new Error("buffer exploded");
      },
      appendMany: () => {},
      drainAll: () => [],
      isEmpty: () => true,
      size: () => 0,
    };
    createSubscriber({ buffer: failing, metrics: true }).attach();

    expect(() =>
      bus.emit("requestSuccess", { kind: "GET", name: "/", responseTime: 1, responseLength: 1 })
    ).not.toThrow();
  });
});

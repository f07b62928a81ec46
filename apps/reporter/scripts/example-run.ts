#!/usr/bin/env node

/**
 * Synthetic load run wired to the reporter.
 *
 * Simulated users "request" nothing but a timer, fail now and then, and every
 * outcome is published on the event bus the reporter listens to. Useful for
 * checking a database/dashboard setup end to end.
 *
 * Usage:
 *   DATABASE_URL=postgres://... npm run example -w @loadtrace/reporter -- --users 20 --duration 30
 *   npm run example -w @loadtrace/reporter -- --single     # one request, no execution context
 */

import { parseArgs } from "node:util";
import { setTimeout as sleep } from "node:timers/promises";
import { createReporter, LoadTestEventBus, runInExecutionContext } from "../src/index.js";
import { log } from "../src/logger.js";

const { values } = parseArgs({
  options: {
    users: { type: "string", short: "u", default: "10" },
    duration: { type: "string", default: "10" },
    "failure-rate": { type: "string", default: "0.05" },
    testplan: { type: "string", default: "example" },
    single: { type: "boolean", default: false },
  },
  strict: false,
  allowPositionals: true,
});

const users = Number(values.users);
const durationS = Number(values.duration);
const failureRate = Number(values["failure-rate"]);
const testplan = String(values.testplan);

async function issueRequest(bus: LoadTestEventBus, name: string): Promise<void> {
  const started = performance.now();
  await sleep(20 + Math.random() * 80);
  const responseTime = performance.now() - started;

  if (Math.random() < failureRate) {
    bus.emit("requestFailure", {
      kind: "GET",
      name,
      responseTime,
      exception: new Error("simulated 503"),
    });
  } else {
    bus.emit("requestSuccess", {
      kind: "GET",
      name,
      responseTime,
      responseLength: Math.floor(Math.random() * 4096),
    });
  }
}

async function main(): Promise<void> {
  const bus = new LoadTestEventBus();
  const reporter = await createReporter({
    testplan,
    events: bus,
    profileName: values.single ? "single" : "synthetic",
    description: `${users} users for ${durationS}s`,
  });

  if (values.single) {
    await issueRequest(bus, "/debug");
    await bus.quit();
    return;
  }

  const deadline = Date.now() + durationS * 1000;
  const userLoops = Array.from({ length: users }, (_, index) =>
    runInExecutionContext(async () => {
      while (Date.now() < deadline) {
        await issueRequest(bus, index % 2 === 0 ? "/" : "/items");
      }
    })
  );

  await Promise.all(userLoops);
  log.system.info({ stats: reporter.getStats() }, "load finished");
  await bus.quit();
}

main().catch((error) => {
  log.system.error({ error: error instanceof Error ? error.message : String(error) }, "example run failed");
  process.exit(1);
});

import { describe, it, expect } from "vitest";
import {
  buildDashboardUrl,
  detectRunRole,
  isCoordinator,
  parseClientCount,
  parseRunId,
  resolveRunId,
} from "../../../domain/run/index.js";

const NOW = new Date("2024-05-01T12:00:00.000Z");

describe("detectRunRole", () => {
  it("should be standalone without markers", () => {
    expect(detectRunRole(["node", "run.js", "-c", "10"])).toBe("standalone");
  });

  it("should detect the leader marker", () => {
    expect(detectRunRole(["node", "run.js", "--master"])).toBe("leader");
  });

  it("should detect follower markers", () => {
    expect(detectRunRole(["node", "run.js", "--worker"])).toBe("follower");
    expect(detectRunRole(["node", "run.js", "--slave"])).toBe("follower");
  });

  it("should treat only followers as non-coordinators", () => {
    expect(isCoordinator("standalone")).toBe(true);
    expect(isCoordinator("leader")).toBe(true);
    expect(isCoordinator("follower")).toBe(false);
  });
});

describe("parseClientCount", () => {
  it("should default to 1", () => {
    expect(parseClientCount(["node", "run.js"])).toBe(1);
  });

  it("should read the value after -c", () => {
    expect(parseClientCount(["node", "run.js", "-c", "50"])).toBe(50);
  });

  it("should read --users=N", () => {
    expect(parseClientCount(["node", "run.js", "--users=25"])).toBe(25);
  });

  it("should let the last flag win", () => {
    expect(parseClientCount(["-c", "5", "--users", "8"])).toBe(8);
  });

  it("should reject a non-numeric count", () => {
    expect(() => parseClientCount(["-c", "many"])).toThrow('Invalid client count "many"');
  });

  it("should reject a flag with no value", () => {
    expect(() => parseClientCount(["-c"])).toThrow("Invalid client count");
  });
});

describe("parseRunId", () => {
  it("should parse ISO timestamps", () => {
    expect(parseRunId("2024-05-01T10:30:00Z").toISOString()).toBe("2024-05-01T10:30:00.000Z");
  });

  it("should parse epoch seconds", () => {
    expect(parseRunId("1714559400").toISOString()).toBe("2024-05-01T10:30:00.000Z");
  });

  it("should parse epoch milliseconds", () => {
    expect(parseRunId("1714559400000").toISOString()).toBe("2024-05-01T10:30:00.000Z");
  });

  it("should reject garbage", () => {
    expect(() => parseRunId("yesterday")).toThrow('Invalid run id "yesterday"');
  });
});

describe("resolveRunId", () => {
  it("should mint a run id for standalone runs", () => {
    expect(resolveRunId("standalone", "2020-01-01T00:00:00Z", NOW)).toBe(NOW);
  });

  it("should reuse the external run id on followers", () => {
    expect(resolveRunId("follower", "2024-05-01T10:30:00Z", NOW).toISOString()).toBe(
      "2024-05-01T10:30:00.000Z"
    );
  });

  it("should reuse the external run id on the leader", () => {
    expect(resolveRunId("leader", "2024-05-01T10:30:00Z", NOW).toISOString()).toBe(
      "2024-05-01T10:30:00.000Z"
    );
  });

  it("should mint a run id for a leader without one", () => {
    expect(resolveRunId("leader", undefined, NOW)).toBe(NOW);
  });

  it("should fail on a follower without one", () => {
    expect(() => resolveRunId("follower", undefined, NOW)).toThrow("LOADTEST_RUN_ID must be set");
  });
});

describe("buildDashboardUrl", () => {
  it("should cover the run window plus one second", () => {
    const start = new Date(1714559400 * 1000);
    const end = new Date(1714559460 * 1000);

    expect(buildDashboardUrl("http://grafana.test/d/abc?orgId=1", "checkout", start, end)).toBe(
      "http://grafana.test/d/abc?orgId=1&var-testplan=checkout&from=1714559400000&to=1714559461000"
    );
  });

  it("should encode the testplan", () => {
    const at = new Date(0);
    expect(buildDashboardUrl("http://g.test/d?x=1", "check out", at, at)).toBe(
      "http://g.test/d?x=1&var-testplan=check%20out&from=0&to=1000"
    );
  });
});

/**
 * Run identity and role resolution.
 *
 * A run is either standalone, or distributed across one leader and any number
 * of followers. The leader and a standalone process are coordinators: they own
 * the testrun row. Followers only tag their samples with the shared run id.
 */

export type RunRole = "standalone" | "leader" | "follower";

export const LEADER_FLAG = "--master";
export const FOLLOWER_FLAGS: readonly string[] = ["--worker", "--slave"];
export const CLIENT_COUNT_FLAGS: readonly string[] = ["-c", "--clients", "-u", "--users"];

export interface Run {
  runId: Date;
  testplan: string;
  profileName: string;
  numClients: number;
  /** Informational target rate, stored as given */
  targetRps: string;
  description: string;
  startTime: Date;
  endTime: Date | null;
}

export function detectRunRole(argv: readonly string[]): RunRole {
  if (argv.some((arg) => FOLLOWER_FLAGS.includes(arg))) return "follower";
  if (argv.includes(LEADER_FLAG)) return "leader";
  return "standalone";
}

export function isCoordinator(role: RunRole): boolean {
  return role !== "follower";
}

/**
 * Number of simulated clients from `-c 50`, `--users 50` or `--users=50`.
 * The last occurrence wins; 1 when absent.
 */
export function parseClientCount(argv: readonly string[]): number {
  let raw: string | undefined;

  for (let index = 0; index < argv.length; index++) {
    const arg = argv[index];
    if (CLIENT_COUNT_FLAGS.includes(arg)) {
      raw = argv[index + 1] ?? "";
      continue;
    }
    const eq = arg.indexOf("=");
    if (eq > 0 && CLIENT_COUNT_FLAGS.includes(arg.slice(0, eq))) {
      raw = arg.slice(eq + 1);
    }
  }

  if (raw === undefined) return 1;

  const count = Number(raw);
  if (!Number.isInteger(count) || count < 1) {
    throw new Error(`Invalid client count "${raw}": expected a positive integer after -c/--users`);
  }
  return count;
}

/**
 * Parse an externally supplied run id: an ISO-8601 timestamp, or epoch
 * seconds / milliseconds.
 */
export function parseRunId(value: string): Date {
  const trimmed = value.trim();
  let parsed: Date;

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    const numeric = Number(trimmed);
    // Below 1e11 the value is epoch seconds
    parsed = new Date(numeric < 1e11 ? numeric * 1000 : numeric);
  } else {
    parsed = new Date(trimmed);
  }

  if (Number.isNaN(parsed.getTime())) {
    throw new Error(`Invalid run id "${value}": expected an ISO-8601 timestamp or epoch time`);
  }
  return parsed;
}

/**
 * Pick the run id for this process.
 *
 * Followers must reuse the id the launcher handed to the leader. The leader
 * uses it when present and otherwise mints one; standalone runs always mint.
 */
export function resolveRunId(role: RunRole, externalRunId: string | undefined, now: Date): Date {
  if (role === "standalone") {
    return now;
  }
  if (externalRunId !== undefined) {
    return parseRunId(externalRunId);
  }
  if (role === "follower") {
    throw new Error(
      "LOADTEST_RUN_ID must be set on follower nodes: it is the run id generated by the leader"
    );
  }
  return now;
}

/**
 * Dashboard link covering the run: `from` is the start, `to` is one second
 * past the end so the last samples are inside the window.
 */
export function buildDashboardUrl(
  baseUrl: string,
  testplan: string,
  start: Date,
  end: Date
): string {
  const from = start.getTime();
  const to = end.getTime() + 1000;
  return `${baseUrl}&var-testplan=${encodeURIComponent(testplan)}&from=${from}&to=${to}`;
}

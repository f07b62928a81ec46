import {
  pgTable,
  text,
  timestamp,
  integer,
  boolean,
  doublePrecision,
  index,
} from "drizzle-orm/pg-core";

// Request samples - one row per completed request.
// Converted to a TimescaleDB hypertable on "time" (see sql/timescale.sql).
export const request = pgTable(
  "request",
  {
    time: timestamp("time", { withTimezone: true }).notNull(),
    runId: timestamp("run_id", { withTimezone: true }).notNull(),
    exception: text("exception"),
    executionContextId: integer("execution_context_id").notNull(),
    origin: text("origin").notNull(),
    name: text("name").notNull(),
    kind: text("kind").notNull(),
    responseLength: integer("response_length"),
    responseTime: doublePrecision("response_time"),
    success: boolean("success").notNull(),
    testplan: text("testplan"),
  },
  (table) => ({
    timeIdx: index("request_time_idx").on(table.time.desc()),
    runIdIdx: index("request_run_id_idx").on(table.runId),
  })
);

// Test runs - written by the coordinating node only
export const testrun = pgTable("testrun", {
  runId: timestamp("run_id", { withTimezone: true }).primaryKey(),
  testplan: text("testplan").notNull(),
  profileName: text("profile_name").default("").notNull(),
  numClients: integer("num_clients").default(1).notNull(),
  rps: text("rps").default("0").notNull(),
  description: text("description").default("").notNull(),
  endTime: timestamp("end_time", { withTimezone: true }),
});

// Dashboard annotations ("<testplan> started" / "<testplan> finished")
export const events = pgTable("events", {
  time: timestamp("time", { withTimezone: true }).notNull(),
  text: text("text").notNull(),
});

// Types
export type RequestRow = typeof request.$inferSelect;
export type NewRequestRow = typeof request.$inferInsert;
export type TestRun = typeof testrun.$inferSelect;
export type NewTestRun = typeof testrun.$inferInsert;
export type EventRow = typeof events.$inferSelect;
export type NewEventRow = typeof events.$inferInsert;

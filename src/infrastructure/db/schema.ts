import { pgTable, uuid, varchar, integer, text, timestamp, jsonb, index } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `executions` table.
 *
 * One row per acknowledged task attempt. `execution_id` is a server-generated
 * UUID; a redelivered task produces a second row with a higher `attempt`.
 */
export const executions = pgTable('executions', {
  execution_id: uuid('execution_id').primaryKey(),
  task_id: uuid('task_id').notNull(),
  function_id: uuid('function_id').notNull(),
  function_version: integer('function_version').notNull(),
  event_id: varchar('event_id', { length: 512 }).notNull(),
  event_key: varchar('event_key', { length: 255 }).notNull(),
  worker_id: varchar('worker_id', { length: 255 }).notNull(),
  outcome: varchar('outcome', { length: 32 }).notNull(),
  error: text('error'),
  result: jsonb('result'),
  duration_ms: integer('duration_ms').notNull(),
  attempt: integer('attempt').notNull(),
  finished_at: timestamp('finished_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_executions_function_id').on(table.function_id),
  index('idx_executions_event_id').on(table.event_id),
  index('idx_executions_outcome').on(table.outcome),
  index('idx_executions_finished_at').on(table.finished_at),
]);

/** Raw DDL run at startup so a fresh database works without drizzle-kit. */
export const EXECUTIONS_DDL = [
  `CREATE TABLE IF NOT EXISTS executions (
    execution_id     UUID PRIMARY KEY,
    task_id          UUID          NOT NULL,
    function_id      UUID          NOT NULL,
    function_version INTEGER       NOT NULL,
    event_id         VARCHAR(512)  NOT NULL,
    event_key        VARCHAR(255)  NOT NULL,
    worker_id        VARCHAR(255)  NOT NULL,
    outcome          VARCHAR(32)   NOT NULL,
    error            TEXT,
    result           JSONB,
    duration_ms      INTEGER       NOT NULL,
    attempt          INTEGER       NOT NULL,
    finished_at      TIMESTAMPTZ   NOT NULL DEFAULT NOW()
  )`,
  'CREATE INDEX IF NOT EXISTS idx_executions_function_id ON executions (function_id)',
  'CREATE INDEX IF NOT EXISTS idx_executions_event_id ON executions (event_id)',
  'CREATE INDEX IF NOT EXISTS idx_executions_outcome ON executions (outcome)',
  'CREATE INDEX IF NOT EXISTS idx_executions_finished_at ON executions (finished_at)',
] as const;

import { integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';
import { createDatabase, type DatabaseHandle } from '../../src/db/client.js';
import { calendarDate, dateTime } from '../../src/db/columns.js';

/** Fixture table covering every temporal column shape. */
export const events = sqliteTable('events', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull(),
  dueOn: calendarDate('due_on').notNull(),
  startsAt: dateTime('starts_at').notNull(),
  closedOn: calendarDate('closed_on'),
});

export type EventRow = typeof events.$inferSelect;
export type NewEventRow = typeof events.$inferInsert;

const MIGRATION_SQL = `
CREATE TABLE IF NOT EXISTS events (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL,
  due_on TEXT NOT NULL,
  starts_at TEXT NOT NULL,
  closed_on TEXT
);
`;

let handle: DatabaseHandle | null = null;

export function setupTestDatabase(): DatabaseHandle {
  if (!handle) {
    handle = createDatabase(':memory:', { migrationSql: MIGRATION_SQL });
  }
  return handle;
}

/**
 * Execute raw SQL on the test database, for rows drizzle would not write
 * (foreign formats, wrong storage classes).
 */
export function execRawSql(sql: string, ...params: unknown[]): void {
  if (!handle) {
    throw new Error('Test database not initialized');
  }
  handle.sqlite.prepare(sql).run(...params);
}

export function clearTestDatabase(): void {
  handle?.db.delete(events).run();
}

export function closeTestDatabase(): void {
  handle?.close();
  handle = null;
}

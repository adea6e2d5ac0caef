import { fileURLToPath } from 'node:url'
import { drizzle } from 'drizzle-orm/node-postgres'
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core'
import { Client } from 'pg'

// Common utilities
export * from './schema/_common'

// Schema exports
export * from './schema/shares'
export * from './schema/groups'
export * from './schema/notifications'

import * as sharesSchema from './schema/shares'
import * as groupsSchema from './schema/groups'
import * as notificationsSchema from './schema/notifications'

/**
 * Unified Drizzle schema registry for the sharing tables.
 */
export const schema = {
  shares: sharesSchema.shares,
  groups: groupsSchema.groups,
  groupUsers: groupsSchema.groupUsers,
  notifications: notificationsSchema.notifications,
}

export type Schema = typeof schema

/**
 * Driver-agnostic database handle.
 *
 * Production code runs on node-postgres; test suites hand in a PGlite-backed
 * instance with the same schema.
 */
export type Database = PgDatabase<PgQueryResultHKT, Schema>

/** Reference DDL for the tables in `schema`. */
export const schemaSqlPath = fileURLToPath(new URL('../sql/schema.sql', import.meta.url))

export type DatabaseConnection = {
  db: Database
  client: Client
  close: () => Promise<void>
}

/**
 * Opens one dedicated session.
 *
 * Repair steps keep server-side cursors open across statements, so they need a
 * single connection rather than a pool.
 */
export async function connectDatabase(connectionString: string): Promise<DatabaseConnection> {
  const client = new Client({ connectionString })
  await client.connect()

  return {
    db: drizzle(client, { schema }),
    client,
    close: () => client.end(),
  }
}

export async function checkDatabaseConnection(client: Client): Promise<boolean> {
  await client.query('SELECT 1')
  return true
}

import { readFileSync } from 'node:fs'
import { PGlite } from '@electric-sql/pglite'
import { asc } from 'drizzle-orm'
import { drizzle } from 'drizzle-orm/pglite'
import {
  groupUsers,
  groups,
  schema,
  schemaSqlPath,
  shares,
  type Database,
  type NewShare,
} from '@linkshare-repair/db'

export type TestDatabase = {
  db: Database
  client: PGlite
  reset: () => Promise<void>
  close: () => Promise<void>
}

/**
 * Fresh in-process Postgres with the sharing tables applied.
 */
export async function createTestDatabase(): Promise<TestDatabase> {
  const client = new PGlite()
  await client.exec(readFileSync(schemaSqlPath, 'utf8'))

  return {
    db: drizzle(client, { schema }),
    client,
    reset: async () => {
      await client.exec('TRUNCATE TABLE "share", "group_user", "groups", "notifications" RESTART IDENTITY CASCADE')
    },
    close: () => client.close(),
  }
}

export async function insertShare(db: Database, values: NewShare): Promise<number> {
  const [row] = await db.insert(shares).values(values).returning({ id: shares.id })
  return row.id
}

export async function listShareIds(db: Database): Promise<number[]> {
  const rows = await db.select({ id: shares.id }).from(shares).orderBy(asc(shares.id))
  return rows.map((row) => row.id)
}

export async function addGroupMembers(db: Database, gid: string, uids: string[]): Promise<void> {
  await db.insert(groups).values({ gid, displayName: gid }).onConflictDoNothing()
  if (uids.length > 0) {
    await db.insert(groupUsers).values(uids.map((uid) => ({ gid, uid })))
  }
}

/** Named cursors only; the unnamed portal of this query is listed too. */
export async function listOpenCursors(client: PGlite): Promise<string[]> {
  const result = await client.query<{ name: string }>(
    "SELECT name FROM pg_cursors WHERE name <> '' ORDER BY name",
  )
  return result.rows.map((row) => row.name)
}

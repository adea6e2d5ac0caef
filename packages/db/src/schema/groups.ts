import { pgTable, primaryKey, varchar } from 'drizzle-orm/pg-core'
import { uidRef } from './_common'

/** Group id of the built-in administrators group. */
export const ADMIN_GROUP_ID = 'admin'

export const groups = pgTable('groups', {
  gid: varchar('gid', { length: 64 }).primaryKey(),
  displayName: varchar('displayname', { length: 255 }).default('name').notNull(),
})

/**
 * group_user
 *
 * Membership rows; a user belongs to a group iff a row exists.
 */
export const groupUsers = pgTable('group_user', {
  gid: varchar('gid', { length: 64 }).notNull().references(() => groups.gid, { onDelete: 'cascade' }),
  uid: uidRef('uid').notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.gid, table.uid] }),
}))

export type GroupRow = typeof groups.$inferSelect
export type GroupUserRow = typeof groupUsers.$inferSelect

import { bigint, index, integer, pgTable, serial, smallint, varchar } from 'drizzle-orm/pg-core'
import { uidRef } from './_common'

/**
 * Numeric share kinds stored in `share.share_type`.
 *
 * Only the first three matter to the repair steps; the sharing backend also
 * writes remote, email and room shares with higher values.
 */
export const ShareType = {
  User: 1,
  Group: 2,
  Link: 3,
} as const

export type ShareTypeValue = (typeof ShareType)[keyof typeof ShareType]

/**
 * share
 *
 * One grant of access to a resource (`item_source`). Re-shares point at the
 * share they were derived from through `parent`.
 */
export const shares = pgTable('share', {
  id: serial('id').primaryKey(),

  shareType: smallint('share_type').default(0).notNull(),

  /** Recipient uid/gid for user and group shares, null for links. */
  shareWith: varchar('share_with', { length: 255 }),

  uidOwner: uidRef('uid_owner').default('').notNull(),
  uidInitiator: uidRef('uid_initiator'),

  /** Share this row was created from. No FK: rows are removed independently. */
  parent: integer('parent'),

  itemType: varchar('item_type', { length: 64 }).default('').notNull(),
  itemSource: varchar('item_source', { length: 255 }),
  fileSource: bigint('file_source', { mode: 'number' }),
  fileTarget: varchar('file_target', { length: 512 }),

  permissions: smallint('permissions').default(0).notNull(),

  /** Creation time, unix seconds. */
  stime: bigint('stime', { mode: 'number' }).default(0).notNull(),

  /** Public token for link shares. */
  token: varchar('token', { length: 32 }),
}, (table) => ({
  shareTypeIdx: index('share_type_index').on(table.itemType, table.shareType),
  parentIdx: index('parent_index').on(table.parent),
  tokenIdx: index('token_index').on(table.token),
}))

export type Share = typeof shares.$inferSelect
export type NewShare = typeof shares.$inferInsert

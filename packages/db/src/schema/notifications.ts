import { index, jsonb, pgTable, serial, timestamp, varchar } from 'drizzle-orm/pg-core'
import { createdAt, uidRef } from './_common'

/**
 * notifications
 *
 * Outbox of user notifications. Producers only insert; the delivery worker
 * renders and pushes rows out of process.
 */
export const notifications = pgTable('notifications', {
  notificationId: serial('notification_id').primaryKey(),

  /** App that owns the subject keys and knows how to render them. */
  app: varchar('app', { length: 32 }).notNull(),
  user: uidRef('user').notNull(),

  /** Time the event happened (not when the row was written). */
  timestamp: timestamp('timestamp', { withTimezone: true }).notNull(),

  objectType: varchar('object_type', { length: 64 }).notNull(),
  objectId: varchar('object_id', { length: 64 }).notNull(),

  subject: varchar('subject', { length: 64 }).notNull(),
  subjectParameters: jsonb('subject_parameters').$type<Record<string, unknown>>().default({}).notNull(),

  message: varchar('message', { length: 64 }).default('').notNull(),
  messageParameters: jsonb('message_parameters').$type<Record<string, unknown>>().default({}).notNull(),

  link: varchar('link', { length: 4000 }).default('').notNull(),
  icon: varchar('icon', { length: 4000 }).default('').notNull(),

  createdAt: createdAt(),
}, (table) => ({
  notificationsUserIdx: index('notifications_user_idx').on(table.user),
  notificationsObjectIdx: index('notifications_object_idx').on(table.objectType, table.objectId),
}))

export type NotificationRow = typeof notifications.$inferSelect
export type NewNotificationRow = typeof notifications.$inferInsert

import { timestamp, varchar } from 'drizzle-orm/pg-core'

/** Row creation timestamp (UTC timestamptz). */
export const createdAt = () => timestamp('created_at', { withTimezone: true }).defaultNow().notNull()

/**
 * User id reference.
 *
 * User ids are login names owned by the account backend, so the sharing tables
 * carry them as plain strings without FK constraints.
 */
export const uidRef = (name: string) => varchar(name, { length: 64 })

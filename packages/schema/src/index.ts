import { z } from 'zod'

// Environment
export const envSchema = z.object({
  DATABASE_URL: z.string().url(),
  LINKSHARE_CONFIG_PATH: z.string().min(1).optional(),
})

export type Env = z.infer<typeof envSchema>

/**
 * System config file.
 *
 * Free-form JSON object; each consumer reads the keys it knows through a
 * typed getter, so unknown keys are kept as-is.
 */
export const systemConfigSchema = z.record(z.string(), z.unknown())

export type SystemConfigValues = z.infer<typeof systemConfigSchema>

// Shares
/**
 * Raw row fetched from the affected-link-share cursor.
 *
 * Cursor fetches bypass Drizzle's column mapping, so the row arrives with
 * database column names and driver-dependent integer types.
 */
export const affectedShareRowSchema = z
  .object({
    id: z.coerce.number().int().positive(),
    uid_owner: z.string(),
    uid_initiator: z.string().nullable(),
  })
  .transform((row) => ({
    id: row.id,
    uidOwner: row.uid_owner,
    uidInitiator: row.uid_initiator,
  }))

export type AffectedShare = z.output<typeof affectedShareRowSchema>

export const cursorFetchResultSchema = z.object({
  rows: z.array(affectedShareRowSchema),
})

// Notifications
const notificationKey = z.string().min(1).max(64)
const notificationParameters = z.record(z.string(), z.unknown())

export const notificationPayloadSchema = z.object({
  app: z.string().min(1).max(32),
  user: notificationKey,
  dateTime: z.date(),
  objectType: notificationKey,
  objectId: notificationKey,
  subject: notificationKey,
  subjectParameters: notificationParameters.default({}),
  message: z.string().max(64).default(''),
  messageParameters: notificationParameters.default({}),
  link: z.string().max(4000).default(''),
  icon: z.string().max(4000).default(''),
})

export type NotificationPayload = z.output<typeof notificationPayloadSchema>
export type NotificationPayloadInput = z.input<typeof notificationPayloadSchema>

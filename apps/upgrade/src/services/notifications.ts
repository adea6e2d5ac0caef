import { notifications, type Database } from '@linkshare-repair/db'
import {
  notificationPayloadSchema,
  type NotificationPayload,
} from '@linkshare-repair/schema'

/**
 * Mutable notification builder.
 *
 * Producers typically build one instance, then change the target user and
 * submit it again per recipient; sinks must snapshot it with `toPayload()`.
 */
export class Notification {
  private app = ''
  private user = ''
  private dateTime: Date | null = null
  private objectType = ''
  private objectId = ''
  private subject = ''
  private subjectParameters: Record<string, unknown> = {}
  private message = ''
  private messageParameters: Record<string, unknown> = {}
  private link = ''
  private icon = ''

  setApp(app: string): this {
    this.app = app
    return this
  }

  setUser(user: string): this {
    this.user = user
    return this
  }

  setDateTime(dateTime: Date): this {
    this.dateTime = new Date(dateTime.getTime())
    return this
  }

  setObject(type: string, id: string): this {
    this.objectType = type
    this.objectId = id
    return this
  }

  setSubject(subject: string, parameters: Record<string, unknown> = {}): this {
    this.subject = subject
    this.subjectParameters = { ...parameters }
    return this
  }

  setMessage(message: string, parameters: Record<string, unknown> = {}): this {
    this.message = message
    this.messageParameters = { ...parameters }
    return this
  }

  setLink(link: string): this {
    this.link = link
    return this
  }

  setIcon(icon: string): this {
    this.icon = icon
    return this
  }

  getUser(): string {
    return this.user
  }

  /**
   * Validated copy of the current state. Throws a ZodError when a required
   * field (app, user, date, object, subject) is missing.
   */
  toPayload(): NotificationPayload {
    return notificationPayloadSchema.parse({
      app: this.app,
      user: this.user,
      dateTime: this.dateTime ?? undefined,
      objectType: this.objectType,
      objectId: this.objectId,
      subject: this.subject,
      subjectParameters: this.subjectParameters,
      message: this.message,
      messageParameters: this.messageParameters,
      link: this.link,
      icon: this.icon,
    })
  }
}

export interface NotificationManager {
  createNotification(): Notification
  notify(notification: Notification): Promise<void>
}

/**
 * Writes notifications into the `notifications` outbox table. Delivery
 * (push, mail, web) happens out of process.
 */
export class DatabaseNotificationManager implements NotificationManager {
  constructor(private readonly db: Database) {}

  createNotification(): Notification {
    return new Notification()
  }

  async notify(notification: Notification): Promise<void> {
    const payload = notification.toPayload()

    await this.db.insert(notifications).values({
      app: payload.app,
      user: payload.user,
      timestamp: payload.dateTime,
      objectType: payload.objectType,
      objectId: payload.objectId,
      subject: payload.subject,
      subjectParameters: payload.subjectParameters,
      message: payload.message,
      messageParameters: payload.messageParameters,
      link: payload.link,
      icon: payload.icon,
    })
  }
}

import type { NotificationPayload } from '@linkshare-repair/schema'
import type { RepairOutput } from '../repair/output'
import { Notification, type NotificationManager } from '../services/notifications'

/** Output sink that keeps every call as a readable line. */
export class RecordingOutput implements RepairOutput {
  readonly events: string[] = []

  info(message: string): void {
    this.events.push(`info: ${message}`)
  }

  warning(message: string): void {
    this.events.push(`warning: ${message}`)
  }

  startProgress(max = 0): void {
    this.events.push(`start: ${max}`)
  }

  advance(step = 1): void {
    this.events.push(`advance: ${step}`)
  }

  finishProgress(): void {
    this.events.push('finish')
  }
}

/**
 * In-memory notification sink. `failForUser` makes `notify` reject for that
 * recipient, after earlier recipients were recorded.
 */
export class RecordingNotificationManager implements NotificationManager {
  readonly sent: NotificationPayload[] = []

  constructor(private readonly failForUser?: string) {}

  createNotification(): Notification {
    return new Notification()
  }

  async notify(notification: Notification): Promise<void> {
    const payload = notification.toPayload()
    if (payload.user === this.failForUser) {
      throw new Error(`notification backend rejected ${payload.user}`)
    }
    this.sent.push(payload)
  }
}

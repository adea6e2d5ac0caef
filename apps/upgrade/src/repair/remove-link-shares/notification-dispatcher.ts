import type { NotificationManager } from '../../services/notifications'
import type { TimeFactory } from '../../services/time'

/**
 * Users to notify at the end of a run. Owned by the run; steps that find
 * affected users add to it.
 */
export type AffectedUserSet = Set<string>

export const REPAIR_NOTIFICATION = {
  app: 'core',
  objectType: 'repair',
  objectId: 'exposing_links',
  subject: 'repair_exposing_links',
} as const

export class NotificationDispatcher {
  constructor(
    private readonly notificationManager: NotificationManager,
    private readonly clock: TimeFactory,
  ) {}

  /** Shares without an initiator carry null; empty ids are not addressable. */
  addToNotify(users: AffectedUserSet, uid: string | null): void {
    if (!uid) return
    users.add(uid)
  }

  /**
   * One notification per user, all stamped with the same instant.
   * A failed submission propagates; users already notified stay notified.
   */
  async sendNotification(users: AffectedUserSet): Promise<void> {
    const time = this.clock.now()

    const notification = this.notificationManager.createNotification()
    notification
      .setApp(REPAIR_NOTIFICATION.app)
      .setDateTime(time)
      .setObject(REPAIR_NOTIFICATION.objectType, REPAIR_NOTIFICATION.objectId)
      .setSubject(REPAIR_NOTIFICATION.subject)

    for (const user of users) {
      notification.setUser(user)
      await this.notificationManager.notify(notification)
    }
  }
}

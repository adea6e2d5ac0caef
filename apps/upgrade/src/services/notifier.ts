import type { NotificationPayload } from '@linkshare-repair/schema'

export type PreparedNotification = NotificationPayload & {
  parsedSubject: string
  parsedMessage: string
}

export class UnknownNotificationError extends Error {
  app: string
  subject: string

  constructor(app: string, subject: string) {
    super(`No renderer for notification ${app}/${subject}`)
    this.name = 'UnknownNotificationError'
    this.app = app
    this.subject = subject
  }
}

type NotificationText = {
  subject: string
  message: string
}

/** Display text for the subjects the `core` app emits. */
const CORE_SUBJECTS: Record<string, NotificationText> = {
  repair_exposing_links: {
    subject: 'Some of your link shares have been removed',
    message:
      'Due to a security bug we had to remove some of your link shares. Please see the link for more information.',
  },
}

/**
 * Renders a stored notification for display.
 *
 * Used by the delivery worker before pushing a row to a client; throws
 * `UnknownNotificationError` for notifications owned by another app.
 */
export function prepareNotification(notification: NotificationPayload): PreparedNotification {
  if (notification.app !== 'core') {
    throw new UnknownNotificationError(notification.app, notification.subject)
  }

  const text = CORE_SUBJECTS[notification.subject]
  if (!text) {
    throw new UnknownNotificationError(notification.app, notification.subject)
  }

  return {
    ...notification,
    parsedSubject: text.subject,
    parsedMessage: text.message,
  }
}

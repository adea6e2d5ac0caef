/**
 * @fileoverview NotificationDispatcher tests
 *
 * @description
 * Dedup of the notify set and one-notification-per-user fan-out, with an
 * in-memory notification sink.
 *
 * @architecture
 * Tests: src/repair/remove-link-shares/__tests__/notification-dispatcher.test.ts
 * Tests: notification-dispatcher.ts
 */

import { describe, expect, it, vi } from 'vitest'
import { fixedClock } from '../../../services/time'
import { RecordingNotificationManager } from '../../../test-utils/recorders'
import { NotificationDispatcher, type AffectedUserSet } from '../notification-dispatcher'

const EVENT_TIME = new Date('2026-03-01T12:00:00.000Z')

describe('notification-dispatcher.ts', () => {
  describe('addToNotify', () => {
    it('should collapse duplicate users', () => {
      const dispatcher = new NotificationDispatcher(new RecordingNotificationManager(), fixedClock(EVENT_TIME))
      const users: AffectedUserSet = new Set()

      dispatcher.addToNotify(users, 'bob')
      dispatcher.addToNotify(users, 'bob')
      dispatcher.addToNotify(users, 'carol')

      expect([...users]).toEqual(['bob', 'carol'])
    })

    it('should skip missing and empty user ids', () => {
      const dispatcher = new NotificationDispatcher(new RecordingNotificationManager(), fixedClock(EVENT_TIME))
      const users: AffectedUserSet = new Set()

      dispatcher.addToNotify(users, null)
      dispatcher.addToNotify(users, '')

      expect(users.size).toBe(0)
    })
  })

  describe('sendNotification', () => {
    it('should send one notification per user', async () => {
      const manager = new RecordingNotificationManager()
      const dispatcher = new NotificationDispatcher(manager, fixedClock(EVENT_TIME))
      const users: AffectedUserSet = new Set()
      dispatcher.addToNotify(users, 'bob')
      dispatcher.addToNotify(users, 'bob')

      await dispatcher.sendNotification(users)

      expect(manager.sent).toEqual([
        {
          app: 'core',
          user: 'bob',
          dateTime: EVENT_TIME,
          objectType: 'repair',
          objectId: 'exposing_links',
          subject: 'repair_exposing_links',
          subjectParameters: {},
          message: '',
          messageParameters: {},
          link: '',
          icon: '',
        },
      ])
    })

    it('should read the clock once for all recipients', async () => {
      const manager = new RecordingNotificationManager()
      const now = vi.fn(() => new Date(EVENT_TIME.getTime()))
      const dispatcher = new NotificationDispatcher(manager, { now })

      await dispatcher.sendNotification(new Set(['bob', 'carol', 'dave']))

      expect(now).toHaveBeenCalledTimes(1)
      expect(manager.sent.map((payload) => payload.user)).toEqual(['bob', 'carol', 'dave'])
      expect(new Set(manager.sent.map((payload) => payload.dateTime.toISOString()))).toEqual(
        new Set(['2026-03-01T12:00:00.000Z']),
      )
    })

    it('should send nothing for an empty set', async () => {
      const manager = new RecordingNotificationManager()

      await new NotificationDispatcher(manager, fixedClock(EVENT_TIME)).sendNotification(new Set())

      expect(manager.sent).toEqual([])
    })

    it('should propagate a failed submission after earlier recipients', async () => {
      const manager = new RecordingNotificationManager('carol')
      const dispatcher = new NotificationDispatcher(manager, fixedClock(EVENT_TIME))

      await expect(dispatcher.sendNotification(new Set(['bob', 'carol', 'dave']))).rejects.toThrow(
        'notification backend rejected carol',
      )
      expect(manager.sent.map((payload) => payload.user)).toEqual(['bob'])
    })
  })
})

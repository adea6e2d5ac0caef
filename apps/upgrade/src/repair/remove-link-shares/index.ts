import { ADMIN_GROUP_ID, type Database } from '@linkshare-repair/db'
import { DatabaseGroupManager, type GroupManager } from '../../services/groups'
import { DatabaseNotificationManager, type NotificationManager } from '../../services/notifications'
import type { SystemConfigReader } from '../../services/system-config'
import { systemClock, type TimeFactory } from '../../services/time'
import type { RepairOutput } from '../output'
import type { RepairStep } from '../repair-step'
import { NotificationDispatcher, type AffectedUserSet } from './notification-dispatcher'
import { ShareQueryEngine } from './share-query'
import { ShareRemediator } from './share-remediator'
import { VersionGate } from './version-gate'

export { AffectedShareCursor, ShareQueryEngine } from './share-query'
export { ShareRemediator } from './share-remediator'
export { NotificationDispatcher, REPAIR_NOTIFICATION, type AffectedUserSet } from './notification-dispatcher'
export { VersionGate } from './version-gate'

/**
 * Where a run currently is (or stopped). `skipped` and `done` are terminal.
 */
export type RemoveLinkSharesState =
  | 'idle'
  | 'gated'
  | 'counting'
  | 'remediating'
  | 'notifying-admins'
  | 'notifying'
  | 'done'
  | 'skipped'

export type RemoveLinkSharesDeps = {
  versionGate: VersionGate
  shareQueries: ShareQueryEngine
  remediator: ShareRemediator
  dispatcher: NotificationDispatcher
  groupManager: GroupManager
}

/**
 * Removes link shares that re-expose an item already shared with a user or
 * group (the link was created as a child of that share), then tells every
 * affected owner/initiator and every admin.
 *
 * Flow:
 * 1) gate on the pre-upgrade version, then count; skip when either says no
 * 2) stream affected link shares, collect their users, delete each one
 * 3) add the admin group's members
 * 4) send one notification per collected user
 *
 * Deletes are not wrapped in a transaction. A run that fails midway leaves the
 * remaining shares for the next run to pick up.
 */
export class RemoveLinkShares implements RepairStep {
  private state: RemoveLinkSharesState = 'idle'

  constructor(private readonly deps: RemoveLinkSharesDeps) {}

  getName(): string {
    return 'Remove potentially over exposing share links'
  }

  getState(): RemoveLinkSharesState {
    return this.state
  }

  async run(output: RepairOutput): Promise<void> {
    this.state = 'idle'
    const usersToNotify: AffectedUserSet = new Set()

    this.state = 'gated'
    if (!this.deps.versionGate.shouldRun()) {
      this.skip(output)
      return
    }

    this.state = 'counting'
    const total = await this.deps.shareQueries.countAffected()
    if (total === 0) {
      this.skip(output)
      return
    }

    output.info('Removing potentially over exposing link shares')
    await this.repair(output, total, usersToNotify)
    output.info('Removed potentially over exposing link shares')
    this.state = 'done'
  }

  private skip(output: RepairOutput): void {
    this.state = 'skipped'
    output.info('No need to remove link shares.')
  }

  private async repair(output: RepairOutput, total: number, usersToNotify: AffectedUserSet): Promise<void> {
    const { dispatcher, remediator, shareQueries, groupManager } = this.deps

    this.state = 'remediating'
    output.startProgress(total)
    for await (const share of shareQueries.streamAffected()) {
      dispatcher.addToNotify(usersToNotify, share.uidOwner)
      dispatcher.addToNotify(usersToNotify, share.uidInitiator)
      await remediator.deleteShare(share.id)
      output.advance()
    }
    output.finishProgress()

    this.state = 'notifying-admins'
    const adminGroup = await groupManager.get(ADMIN_GROUP_ID)
    if (adminGroup) {
      for (const user of await adminGroup.getUsers()) {
        dispatcher.addToNotify(usersToNotify, user.uid)
      }
    } else {
      output.warning(`Group "${ADMIN_GROUP_ID}" not found; only share owners and initiators will be notified`)
    }

    this.state = 'notifying'
    output.info('Sending notifications to admins and affected users')
    await dispatcher.sendNotification(usersToNotify)
  }
}

export type CreateRemoveLinkSharesOptions = {
  db: Database
  config: SystemConfigReader
  groupManager?: GroupManager
  notificationManager?: NotificationManager
  clock?: TimeFactory
  batchSize?: number
}

/**
 * Wires the step against one database session, with the database-backed
 * group directory and notification outbox unless others are given.
 */
export function createRemoveLinkShares(options: CreateRemoveLinkSharesOptions): RemoveLinkShares {
  const { db, config } = options

  return new RemoveLinkShares({
    versionGate: new VersionGate(config),
    shareQueries: new ShareQueryEngine(db, { batchSize: options.batchSize }),
    remediator: new ShareRemediator(db),
    dispatcher: new NotificationDispatcher(
      options.notificationManager ?? new DatabaseNotificationManager(db),
      options.clock ?? systemClock,
    ),
    groupManager: options.groupManager ?? new DatabaseGroupManager(db),
  })
}

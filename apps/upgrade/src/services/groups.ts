import { asc, eq } from 'drizzle-orm'
import { groupUsers, groups, type Database } from '@linkshare-repair/db'

export type GroupMember = {
  uid: string
}

export interface Group {
  readonly gid: string
  readonly displayName: string
  getUsers(): Promise<GroupMember[]>
}

export interface GroupManager {
  /** Resolves a group by id, or null when it does not exist. */
  get(gid: string): Promise<Group | null>
}

class DatabaseGroup implements Group {
  constructor(
    private readonly db: Database,
    readonly gid: string,
    readonly displayName: string,
  ) {}

  async getUsers(): Promise<GroupMember[]> {
    const rows = await this.db
      .select({ uid: groupUsers.uid })
      .from(groupUsers)
      .where(eq(groupUsers.gid, this.gid))
      .orderBy(asc(groupUsers.uid))

    return rows.map((row) => ({ uid: row.uid }))
  }
}

/**
 * Group directory backed by `groups` / `group_user`.
 */
export class DatabaseGroupManager implements GroupManager {
  constructor(private readonly db: Database) {}

  async get(gid: string): Promise<Group | null> {
    const [row] = await this.db
      .select({ gid: groups.gid, displayName: groups.displayName })
      .from(groups)
      .where(eq(groups.gid, gid))
      .limit(1)

    return row ? new DatabaseGroup(this.db, row.gid, row.displayName) : null
  }
}

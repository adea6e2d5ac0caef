import { and, count, eq, inArray, isNotNull, or, sql, type SQL } from 'drizzle-orm'
import { alias } from 'drizzle-orm/pg-core'
import { ShareType, shares, type Database } from '@linkshare-repair/db'
import { cursorFetchResultSchema, type AffectedShare } from '@linkshare-repair/schema'

const DEFAULT_BATCH_SIZE = 100

let cursorSequence = 0

/**
 * Link shares whose parent is a user or group share on the same item.
 *
 * `s1` is the candidate link share (the row to delete), `s2` its parent.
 */
function affectedLinkShareSource(db: Database) {
  const s1 = db
    .select()
    .from(shares)
    .where(and(isNotNull(shares.parent), eq(shares.shareType, ShareType.Link)))
    .as('s1')
  const s2 = alias(shares, 's2')

  return {
    s1,
    s2,
    joinOn: eq(s1.parent, s2.id),
    where: and(
      or(eq(s2.shareType, ShareType.User), eq(s2.shareType, ShareType.Group)),
      eq(s1.itemSource, s2.itemSource),
    ),
  }
}

/**
 * Server-side cursor over affected link shares.
 *
 * Declared `WITH HOLD` so it survives the autocommit of each statement run on
 * the same session (the deletes). The cursor is declared on the first fetch
 * and must be released with `close()`; async iteration does that on
 * exhaustion, `break` and errors.
 */
export class AffectedShareCursor implements AsyncIterable<AffectedShare> {
  private state: 'pending' | 'open' | 'closed' = 'pending'
  private buffer: AffectedShare[] = []
  private exhausted = false
  private closeError: unknown = null

  constructor(
    private readonly db: Database,
    private readonly query: SQL,
    readonly name: string,
    private readonly batchSize: number = DEFAULT_BATCH_SIZE,
  ) {}

  isOpen(): boolean {
    return this.state === 'open'
  }

  /** Error raised by `CLOSE` while iteration was already failing, if any. */
  getCloseError(): unknown {
    return this.closeError
  }

  /** Next row, or null once the result set (or the cursor) is done. */
  async fetch(): Promise<AffectedShare | null> {
    if (this.state === 'closed') return null

    if (this.buffer.length === 0 && !this.exhausted) {
      await this.open()
      const result = await this.db.execute(
        sql`fetch forward ${sql.raw(String(this.batchSize))} from ${sql.identifier(this.name)}`,
      )
      const { rows } = cursorFetchResultSchema.parse(result)
      this.buffer = rows
      if (rows.length < this.batchSize) this.exhausted = true
    }

    return this.buffer.shift() ?? null
  }

  async close(): Promise<void> {
    const wasOpen = this.state === 'open'
    this.state = 'closed'
    this.buffer = []
    if (wasOpen) {
      await this.db.execute(sql`close ${sql.identifier(this.name)}`)
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<AffectedShare> {
    let failed = false
    try {
      for (;;) {
        const share = await this.fetch()
        if (!share) return
        yield share
      }
    } catch (error) {
      failed = true
      throw error
    } finally {
      if (failed) {
        await this.closeAfterFailure()
      } else {
        await this.close()
      }
    }
  }

  /**
   * The failure that ended iteration is what the caller must see; a `CLOSE`
   * error on top of it is kept on the cursor instead.
   */
  private async closeAfterFailure(): Promise<void> {
    try {
      await this.close()
    } catch (closeError) {
      this.closeError = closeError
    }
  }

  private async open(): Promise<void> {
    if (this.state !== 'pending') return

    // DECLARE takes no bind parameters, so the literals are inlined.
    await this.db.execute(
      sql`declare ${sql.identifier(this.name)} no scroll cursor with hold for ${this.query}`.inlineParams(),
    )
    this.state = 'open'
  }
}

export type ShareQueryEngineOptions = {
  batchSize?: number
}

/**
 * Read-only queries over the unsafe share chains.
 */
export class ShareQueryEngine {
  private readonly batchSize: number

  constructor(
    private readonly db: Database,
    options: ShareQueryEngineOptions = {},
  ) {
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE
    if (!Number.isInteger(this.batchSize) || this.batchSize <= 0) {
      throw new Error(`ShareQueryEngine: batchSize must be a positive integer, got ${this.batchSize}`)
    }
  }

  async countAffected(): Promise<number> {
    const { s1, s2, joinOn, where } = affectedLinkShareSource(this.db)
    const affectedIds = this.db.select({ id: s1.id }).from(s1).innerJoin(s2, joinOn).where(where)

    const [row] = await this.db
      .select({ total: count() })
      .from(shares)
      .where(inArray(shares.id, affectedIds))

    return row?.total ?? 0
  }

  /** Affected rows as `{ id, uid_owner, uid_initiator }` of the link share. */
  affectedSharesQuery() {
    const { s1, s2, joinOn, where } = affectedLinkShareSource(this.db)

    return this.db
      .select({ id: s1.id, uidOwner: s1.uidOwner, uidInitiator: s1.uidInitiator })
      .from(s1)
      .innerJoin(s2, joinOn)
      .where(where)
      .orderBy(s1.id)
  }

  streamAffected(): AffectedShareCursor {
    cursorSequence += 1
    return new AffectedShareCursor(
      this.db,
      this.affectedSharesQuery().getSQL(),
      `affected_link_shares_${cursorSequence}`,
      this.batchSize,
    )
  }
}

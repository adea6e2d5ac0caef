import { eq } from 'drizzle-orm'
import { shares, type Database } from '@linkshare-repair/db'

export class ShareRemediator {
  constructor(private readonly db: Database) {}

  /** Deleting an id that no longer exists is a no-op. */
  async deleteShare(id: number): Promise<void> {
    await this.db.delete(shares).where(eq(shares.id, id))
  }
}

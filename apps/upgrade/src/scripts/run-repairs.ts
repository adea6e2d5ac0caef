import 'dotenv/config'
import { checkDatabaseConnection, connectDatabase } from '@linkshare-repair/db'
import { envSchema } from '@linkshare-repair/schema'
import { ConsoleOutput } from '../repair/output'
import { runRepairSteps, type RepairStep } from '../repair/repair-step'
import { createRemoveLinkShares } from '../repair/remove-link-shares'
import { DEFAULT_CONFIG_PATH, SystemConfig } from '../services/system-config'

/**
 * Runs the upgrade repair steps against `DATABASE_URL`.
 *
 * Invoked once by the upgrade procedure, after migrations. Exit code 1 means
 * a step failed; whatever it already committed stays committed.
 */
async function main() {
  const env = envSchema.parse(process.env)
  const config = new SystemConfig(env.LINKSHARE_CONFIG_PATH ?? DEFAULT_CONFIG_PATH)
  const connection = await connectDatabase(env.DATABASE_URL)

  try {
    await checkDatabaseConnection(connection.client)

    const steps: RepairStep[] = [createRemoveLinkShares({ db: connection.db, config })]
    await runRepairSteps(steps, new ConsoleOutput('run-repairs'))
    console.log('[run-repairs] All repair steps completed.')
  } finally {
    await connection.close()
  }
}

main().catch((error) => {
  console.error('[run-repairs] failed')
  console.error(error)
  process.exit(1)
})

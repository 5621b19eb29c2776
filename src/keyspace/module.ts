import { getDatabaseConfig } from '../database/config.ts'
import { initializeDatabase, shutdownDatabase } from '../database/client.ts'
import { loadCassandraDriver } from '../database/driver.ts'
import { errorMessage } from '../plumbing/errors.ts'
import { log } from '../plumbing/logger.ts'
import { parseModuleParams, type RawModuleParams } from './params.ts'
import { reconcileKeyspace } from './reconciler.ts'
import type { DesiredState, ModuleResult } from './types.ts'

const keyspaceName = (desired: DesiredState): string =>
  desired.state === 'present' ? desired.keyspace.name : desired.name

/**
 * Runs one reconciliation: validate parameters, check the driver is available,
 * open the session, reconcile, close the session. Every failure is reported
 * as a result record rather than thrown.
 */
export const runKeyspaceModule = async (
  raw: RawModuleParams,
): Promise<ModuleResult> => {
  try {
    const params = parseModuleParams(raw)
    const driver = await loadCassandraDriver()
    const name = keyspaceName(params.desired)

    const client = await initializeDatabase(
      driver,
      getDatabaseConfig(params.login),
    )
    try {
      const changed = await reconcileKeyspace(
        client,
        params.desired,
        params.checkMode,
      )
      log({
        message: 'Keyspace reconciled',
        keyspace: name,
        state: params.desired.state,
        checkMode: params.checkMode,
        changed,
      })
      return { changed, name }
    } finally {
      await shutdownDatabase()
    }
  } catch (error) {
    log({
      message: 'Keyspace module failed',
      error: error instanceof Error ? error.name : 'Error',
    })
    return { failed: true, msg: errorMessage(error) }
  }
}

#!/usr/bin/env node
import 'dotenv/config'
import { errorMessage } from '../plumbing/errors.ts'
import { readModuleArgs } from './args.ts'
import { runKeyspaceModule } from './module.ts'
import type { ModuleResult } from './types.ts'

const main = async (): Promise<void> => {
  let result: ModuleResult
  try {
    const raw = await readModuleArgs(process.argv.slice(2), process.env)
    result = await runKeyspaceModule(raw)
  } catch (error) {
    result = { failed: true, msg: errorMessage(error) }
  }

  console.log(JSON.stringify(result))
  if ('failed' in result) {
    process.exitCode = 1
  }
}

main().catch((error) => {
  console.error('Fatal error:', error)
  process.exit(1)
})

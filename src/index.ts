#!/usr/bin/env node
import { runGatewayCli } from "./cli/runner.js"
import { logger } from "./logging/logger.js"

const main = async (): Promise<void> => {
  process.exitCode = await runGatewayCli(process.argv.slice(2))
}

main().catch((error: unknown) => {
  logger.error(
    { error: error instanceof Error ? error.message : String(error) },
    "Gateway CLI failed"
  )
  process.exitCode = 1
})

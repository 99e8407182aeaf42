import { loadEnv } from './config/env.js'
import { runDemos } from './demos.js'
import { createLogger } from './utils/logger.js'

const logger = createLogger('cli')

/**
 * CLI body: load config, run the named demos, and turn a failure into a
 * logged error plus a non-zero exit code.
 */
export function main(argv: string[]): void {
  loadEnv()

  try {
    runDemos(argv)
  } catch (error) {
    logger.error('Demo run failed', undefined, error instanceof Error ? error : new Error(String(error)))
    process.exitCode = 1
  }
}

/**
 * Command-line wrapper around `main`
 * @module cli/run
 */

import { main } from './main'
import type { SolverOptions } from '../types/config'
import { createConsoleLogger } from '../utils/logger'
import { describeError } from '../utils/errors'

/**
 * Runs both parts with a stderr logger and reports failures as
 * `Error: <message>` on standard error.
 *
 * @returns The process exit status: 0 on success, 1 on any failure
 */
export async function runCli(options: SolverOptions = {}): Promise<number> {
  try {
    await main({ logger: createConsoleLogger('warn'), ...options })
    return 0
  } catch (error) {
    console.error(`Error: ${describeError(error)}`)
    return 1
  }
}

import type { Logger } from '../utils/logger'
import { createSilentLogger } from '../utils/logger'

/**
 * Input file read by both parts, relative to the current working directory.
 */
export const DEFAULT_INPUT_PATH = '1.txt'

/**
 * Receives each human-readable result line.
 */
export type OutputSink = (line: string) => void

/**
 * Options accepted by `part1`, `part2` and `main`.
 * The executable only swaps in a console logger.
 */
export interface SolverOptions {
  /** Path of the two-column input file (default: `'1.txt'`) */
  inputPath?: string
  /** Where result lines are written (default: `console.log`) */
  output?: OutputSink
  /** Diagnostics logger (default: silent) */
  logger?: Logger
}

/**
 * Solver options with every default applied.
 */
export type ResolvedSolverOptions = Required<SolverOptions>

/**
 * Fills in defaults.
 */
export function resolveSolverOptions(
  options: SolverOptions = {}
): ResolvedSolverOptions {
  return {
    inputPath: options.inputPath ?? DEFAULT_INPUT_PATH,
    output: options.output ?? ((line: string) => console.log(line)),
    logger: options.logger ?? createSilentLogger(),
  }
}

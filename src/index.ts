// Parsing
export {
  readDataFromFile,
  parseLocationLists,
  parseLine,
  parseInteger,
} from './core/parser'

// Calculators
export { calculateTotalDistance } from './core/distance'
export { calculateSimilarityScore, buildFrequencyTable } from './core/similarity'

// Orchestration
export { part1, part2, main } from './cli/main'
export { runCli } from './cli/run'

// Types
export type { LocationLists, FrequencyTable } from './types/lists'
export {
  DEFAULT_INPUT_PATH,
  resolveSolverOptions,
  type SolverOptions,
  type ResolvedSolverOptions,
  type OutputSink,
} from './types/config'

// Logging
export {
  createConsoleLogger,
  createSilentLogger,
  createPrefixedLogger,
  type Logger,
  type LogLevel,
} from './utils/logger'

// Errors
export {
  LocationListsError,
  InputFileError,
  SummationOverflowError,
  describeError,
  isLocationListsError,
} from './utils/errors'

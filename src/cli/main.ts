/**
 * Runs both computations against the input file and prints their results
 * @module cli/main
 */

import { readDataFromFile } from '../core/parser'
import { calculateTotalDistance } from '../core/distance'
import { calculateSimilarityScore } from '../core/similarity'
import { resolveSolverOptions } from '../types/config'
import type { SolverOptions } from '../types/config'
import { createPrefixedLogger } from '../utils/logger'
import { isLocationListsError } from '../utils/errors'

/**
 * Reads the input file and prints the total distance between its columns.
 */
export async function part1(options: SolverOptions = {}): Promise<number> {
  const { inputPath, output, logger } = resolveSolverOptions(options)

  const { left, right } = await readDataFromFile(
    inputPath,
    createPrefixedLogger('part1', logger)
  )
  const totalDistance = calculateTotalDistance(left, right)

  output(`Total distance: ${totalDistance}`)
  return totalDistance
}

/**
 * Reads the input file and prints the similarity score of its columns.
 */
export async function part2(options: SolverOptions = {}): Promise<number> {
  const { inputPath, output, logger } = resolveSolverOptions(options)

  const { left, right } = await readDataFromFile(
    inputPath,
    createPrefixedLogger('part2', logger)
  )
  const similarityScore = calculateSimilarityScore(left, right)

  output(`Similarity score: ${similarityScore}`)
  return similarityScore
}

/**
 * Runs `part1` then `part2`. A failure in either is logged and rethrown;
 * `part2` does not run when `part1` fails.
 */
export async function main(
  options: SolverOptions = {}
): Promise<{ totalDistance: number; similarityScore: number }> {
  const { logger } = resolveSolverOptions(options)

  try {
    const totalDistance = await part1(options)
    const similarityScore = await part2(options)
    return { totalDistance, similarityScore }
  } catch (error) {
    logger.error(
      'Run failed',
      isLocationListsError(error)
        ? { code: error.code, ...error.context }
        : undefined
    )
    throw error
  }
}

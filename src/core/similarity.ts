import type { FrequencyTable } from '../types/lists'
import { SummationOverflowError } from '../utils/errors'

/**
 * Counts how many times each value occurs.
 */
export function buildFrequencyTable(values: readonly number[]): FrequencyTable {
  const table: FrequencyTable = new Map()
  for (const value of values) {
    table.set(value, (table.get(value) ?? 0) + 1)
  }
  return table
}

/**
 * Similarity score of two lists: every left value multiplied by the number
 * of times it appears in the right list, summed. Duplicates on the left
 * count once per occurrence; values absent from the right contribute 0.
 *
 * @throws {SummationOverflowError} If the sum leaves the safe integer range
 *
 * @example
 * ```typescript
 * calculateSimilarityScore([3, 4, 2, 1, 3, 3], [4, 3, 5, 3, 9, 3]) // 31
 * ```
 */
export function calculateSimilarityScore(
  left: readonly number[],
  right: readonly number[]
): number {
  const rightCounts = buildFrequencyTable(right)

  let score = 0
  for (const value of left) {
    score += value * (rightCounts.get(value) ?? 0)
    if (!Number.isSafeInteger(score)) {
      throw new SummationOverflowError('calculateSimilarityScore', { value })
    }
  }

  return score
}

import { SummationOverflowError } from '../utils/errors'

const ascending = (a: number, b: number): number => a - b

/**
 * Total distance between two lists once each is sorted ascending.
 *
 * Elements are paired by rank and the absolute differences summed. The
 * inputs are not mutated. Pairing stops at the end of the shorter list.
 *
 * @returns A non-negative integer
 * @throws {SummationOverflowError} If the sum leaves the safe integer range
 *
 * @example
 * ```typescript
 * calculateTotalDistance([3, 4, 2, 1, 3, 3], [4, 3, 5, 3, 9, 3]) // 11
 * ```
 */
export function calculateTotalDistance(
  left: readonly number[],
  right: readonly number[]
): number {
  const sortedLeft = [...left].sort(ascending)
  const sortedRight = [...right].sort(ascending)
  const pairCount = Math.min(sortedLeft.length, sortedRight.length)

  let total = 0
  for (let i = 0; i < pairCount; i++) {
    total += Math.abs(sortedLeft[i] - sortedRight[i])
    if (!Number.isSafeInteger(total)) {
      throw new SummationOverflowError('calculateTotalDistance', { pairIndex: i })
    }
  }

  return total
}

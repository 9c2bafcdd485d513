import { describe, it, expect } from 'vitest'
import {
  buildFrequencyTable,
  calculateSimilarityScore,
} from '../../../src/core/similarity'
import { SummationOverflowError } from '../../../src/utils/errors'

describe('buildFrequencyTable', () => {
  it('counts every occurrence', () => {
    const table = buildFrequencyTable([4, 3, 5, 3, 9, 3])

    expect(table.get(3)).toBe(3)
    expect(table.get(4)).toBe(1)
    expect(table.get(5)).toBe(1)
    expect(table.get(9)).toBe(1)
    expect(table.size).toBe(4)
  })

  it('returns an empty table for no values', () => {
    expect(buildFrequencyTable([]).size).toBe(0)
  })
})

describe('calculateSimilarityScore', () => {
  it('weights each left value by its right-side frequency', () => {
    expect(
      calculateSimilarityScore([3, 4, 2, 1, 3, 3], [4, 3, 5, 3, 9, 3])
    ).toBe(31)
  })

  it('counts duplicates on the left independently', () => {
    expect(calculateSimilarityScore([7, 7], [7])).toBe(14)
  })

  it('is zero against an empty right list', () => {
    expect(calculateSimilarityScore([1, 2, 3], [])).toBe(0)
  })

  it('is zero for an empty left list', () => {
    expect(calculateSimilarityScore([], [1, 2, 3])).toBe(0)
  })

  it('ignores left values absent from the right', () => {
    expect(calculateSimilarityScore([1, 2], [3, 4])).toBe(0)
  })

  it('can be negative for negative values', () => {
    expect(calculateSimilarityScore([-2, 5], [-2, -2])).toBe(-4)
  })

  it('does not depend on order', () => {
    expect(calculateSimilarityScore([3, 3, 1], [1, 3])).toBe(
      calculateSimilarityScore([1, 3, 3], [3, 1])
    )
  })
})

describe('calculateSimilarityScore overflow', () => {
  it('throws when the score is no longer exactly representable', () => {
    // each left value contributes 2147483647 * 2^20; the fifth passes 2^53
    const right = new Array<number>(1_048_576).fill(2147483647)
    const left = new Array<number>(5).fill(2147483647)

    expect(() => calculateSimilarityScore(left, right)).toThrow(
      SummationOverflowError
    )
  })

  it('stays exact just below the limit', () => {
    const right = new Array<number>(1_048_576).fill(2147483647)
    const left = new Array<number>(4).fill(2147483647)

    expect(calculateSimilarityScore(left, right)).toBe(9007199250546688)
  })
})

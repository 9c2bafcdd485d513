/**
 * The two columns read from an input file.
 * `left[i]` and `right[i]` come from the same input line.
 */
export interface LocationLists {
  left: number[]
  right: number[]
}

/**
 * Occurrence count of every value in a sequence
 */
export type FrequencyTable = Map<number, number>

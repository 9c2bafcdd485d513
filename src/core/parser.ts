import { isUtf8 } from 'buffer'
import { open } from 'fs/promises'
import type { FileHandle } from 'fs/promises'
import type { LocationLists } from '../types/lists'
import type { Logger } from '../utils/logger'
import { createSilentLogger } from '../utils/logger'
import { InputFileError, describeError } from '../utils/errors'

const INT32_MIN = -2147483648
const INT32_MAX = 2147483647
const INTEGER_TOKEN = /^[+-]?[0-9]+$/
// Unicode White_Space: includes U+0085, excludes U+FEFF
const WHITESPACE = /\p{White_Space}+/u
const LINE_FEED = 0x0a

/**
 * Parses a token as a signed 32-bit integer.
 *
 * @returns The integer, or `undefined` when the token is not a decimal
 *   integer or falls outside the 32-bit range
 */
export function parseInteger(token: string): number | undefined {
  if (!INTEGER_TOKEN.test(token)) return undefined

  const value = Number(token)
  if (value < INT32_MIN || value > INT32_MAX) return undefined
  // Normalizes -0
  return value === 0 ? 0 : value
}

/**
 * Extracts the (left, right) pair carried by one line.
 *
 * Tokens that fail to parse are dropped first; the line yields a pair only
 * when exactly two integers remain. `a 1 b 2` yields `[1, 2]`, while `1 x`
 * and `1 2 3` yield nothing.
 */
export function parseLine(line: string): [number, number] | undefined {
  const numbers: number[] = []

  for (const token of line.split(WHITESPACE)) {
    const value = parseInteger(token)
    if (value !== undefined) numbers.push(value)
  }

  if (numbers.length !== 2) return undefined
  return [numbers[0], numbers[1]]
}

function appendLine(lists: LocationLists, line: string | undefined): boolean {
  const pair = line === undefined ? undefined : parseLine(line)
  if (!pair) return false

  lists.left.push(pair[0])
  lists.right.push(pair[1])
  return true
}

/**
 * Parses in-memory two-column content into left and right lists.
 *
 * Lines end at `\n` only. A `\r` before it, or anywhere else, is whitespace.
 */
export function parseLocationLists(content: string): LocationLists {
  const lists: LocationLists = { left: [], right: [] }

  for (const line of content.split('\n')) {
    appendLine(lists, line)
  }

  return lists
}

/**
 * Splits raw file content at `\n` bytes and decodes each line on its own.
 * Lines that are not valid UTF-8 come back as `undefined`; a final empty
 * chunk after the last `\n` is not a line.
 */
function decodeLines(content: Buffer): Array<string | undefined> {
  const lines: Array<string | undefined> = []
  let start = 0

  while (start < content.length) {
    const newline = content.indexOf(LINE_FEED, start)
    const end = newline === -1 ? content.length : newline
    const bytes = content.subarray(start, end)

    lines.push(isUtf8(bytes) ? bytes.toString('utf8') : undefined)
    start = end + 1
  }

  return lines
}

async function closeAfterFailure(
  handle: FileHandle,
  path: string,
  logger: Logger
): Promise<void> {
  try {
    await handle.close()
  } catch (error) {
    logger.warn('Failed to close input file', {
      path,
      error: describeError(error),
    })
  }
}

/**
 * Reads a two-column file into left and right lists.
 *
 * Lines are split and parsed like {@link parseLocationLists}; lines holding
 * invalid UTF-8 are skipped along with the malformed ones. Failing to open
 * or read the file rejects with an {@link InputFileError}; no partial lists
 * are returned.
 *
 * @param path - File to read, relative paths resolve against the working directory
 * @param logger - Receives a debug summary of read and skipped lines
 */
export async function readDataFromFile(
  path: string,
  logger: Logger = createSilentLogger()
): Promise<LocationLists> {
  let handle: FileHandle
  try {
    handle = await open(path, 'r')
  } catch (error) {
    throw new InputFileError(path, error)
  }

  let content: Buffer
  try {
    content = await handle.readFile()
  } catch (error) {
    await closeAfterFailure(handle, path, logger)
    throw new InputFileError(path, error)
  }
  try {
    await handle.close()
  } catch (error) {
    throw new InputFileError(path, error)
  }

  const lines = decodeLines(content)
  const lists: LocationLists = { left: [], right: [] }
  let skippedCount = 0

  for (const line of lines) {
    if (!appendLine(lists, line)) skippedCount++
  }

  logger.debug('Read input file', {
    path,
    lines: lines.length,
    pairs: lists.left.length,
    skipped: skippedCount,
  })

  return lists
}

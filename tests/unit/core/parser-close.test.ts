import { describe, it, expect, vi } from 'vitest'
import { readDataFromFile } from '../../../src/core/parser'
import { InputFileError } from '../../../src/utils/errors'
import type { Logger } from '../../../src/utils/logger'

vi.mock('fs/promises', () => ({
  open: vi.fn(async () => ({
    readFile: async () => {
      throw Object.assign(new Error('EIO: i/o error, read'), { code: 'EIO' })
    },
    close: async () => {
      throw new Error('close failed')
    },
  })),
}))

describe('readDataFromFile when closing fails', () => {
  it('reports the read failure and logs the close failure', async () => {
    const logger: Logger = {
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    }

    const error = await readDataFromFile('1.txt', logger).catch(
      (e: unknown) => e
    )

    expect(error).toBeInstanceOf(InputFileError)
    if (!(error instanceof InputFileError)) return
    expect(error.message).toBe(
      "Cannot read input file '1.txt': EIO: i/o error, read"
    )
    expect(error.context?.systemCode).toBe('EIO')
    expect(logger.warn).toHaveBeenCalledWith('Failed to close input file', {
      path: '1.txt',
      error: 'close failed',
    })
  })
})

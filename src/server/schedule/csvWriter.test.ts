import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import * as fs from 'fs'
import { stringifyCsv, writeScheduleCsv } from './csvWriter'
import { ExportError } from '@/lib/errors'

vi.mock('fs', () => ({
  promises: {
    writeFile: vi.fn(),
  },
}))

describe('csvWriter', () => {
  describe('stringifyCsv', () => {
    it('should join cells with commas and end every record with CRLF', () => {
      expect(stringifyCsv([['', 'a', 'b'], ['c', '', '']])).toBe(',a,b\r\nc,,\r\n')
    })

    it('should quote cells containing delimiters, quotes, or newlines', () => {
      expect(stringifyCsv([['a,b', 'say "hi"', 'line\nbreak', 'cr\rx']])).toBe(
        '"a,b","say ""hi""","line\nbreak","cr\rx"\r\n'
      )
    })

    it('should leave parentheses and ampersands alone', () => {
      expect(stringifyCsv([['Echelon 2 & 3', 'AOs (Tent A)']])).toBe('Echelon 2 & 3,AOs (Tent A)\r\n')
    })

    it('should return an empty string for no rows', () => {
      expect(stringifyCsv([])).toBe('')
    })
  })

  describe('writeScheduleCsv', () => {
    beforeEach(() => {
      vi.spyOn(console, 'log').mockImplementation(() => {})
      vi.mocked(fs.promises.writeFile).mockReset()
    })

    afterEach(() => {
      vi.restoreAllMocks()
    })

    it('should write the CSV text as UTF-8', async () => {
      vi.mocked(fs.promises.writeFile).mockResolvedValue(undefined)
      await writeScheduleCsv('out.csv', [['', '0900'], ['Staff', 'Brief']])
      expect(fs.promises.writeFile).toHaveBeenCalledWith('out.csv', ',0900\r\nStaff,Brief\r\n', 'utf-8')
      expect(console.log).toHaveBeenCalledWith('[ScheduleExport] Wrote 2 rows to out.csv')
    })

    it('should wrap write failures in ExportError', async () => {
      const cause = new Error('EACCES')
      vi.mocked(fs.promises.writeFile).mockRejectedValue(cause)

      const error = await writeScheduleCsv('locked.csv', [['x']]).catch((e: unknown) => e)
      expect(error).toBeInstanceOf(ExportError)
      expect(error instanceof ExportError ? error.filePath : null).toBe('locked.csv')
      expect(error instanceof ExportError ? error.cause : null).toBe(cause)
      expect(console.log).not.toHaveBeenCalled()
    })
  })
})

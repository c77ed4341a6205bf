import { describe, it, expect } from 'vitest'
import {
  AppError,
  PreconditionError,
  ConfigurationError,
  ScheduleLoadError,
  ExportError,
  isAppError,
  toAppError,
} from './errors'

describe('errors', () => {
  describe('AppError', () => {
    it('should set message, code, and name', () => {
      const err = new AppError('test message', 'TEST_CODE')
      expect(err.message).toBe('test message')
      expect(err.code).toBe('TEST_CODE')
      expect(err.name).toBe('AppError')
    })

    it('should store cause', () => {
      const cause = new Error('original')
      const err = new AppError('wrapped', 'WRAP', cause)
      expect(err.cause).toBe(cause)
    })

    it('should be instanceof Error', () => {
      const err = new AppError('msg', 'CODE')
      expect(err).toBeInstanceOf(Error)
      expect(err).toBeInstanceOf(AppError)
    })
  })

  describe('PreconditionError', () => {
    it('should set correct code/name', () => {
      const err = new PreconditionError('time period not set')
      expect(err.code).toBe('PRECONDITION_ERROR')
      expect(err.name).toBe('PreconditionError')
      expect(err).toBeInstanceOf(AppError)
    })
  })

  describe('ConfigurationError', () => {
    it('should store the offending field', () => {
      const err = new ConfigurationError('bad interval', 'intervalMinutes')
      expect(err.field).toBe('intervalMinutes')
      expect(err.code).toBe('CONFIGURATION_ERROR')
      expect(err.name).toBe('ConfigurationError')
      expect(err).toBeInstanceOf(AppError)
    })

    it('should allow field to be omitted', () => {
      expect(new ConfigurationError('bad').field).toBeUndefined()
    })
  })

  describe('ScheduleLoadError', () => {
    it('should store filePath and cause', () => {
      const cause = new Error('ENOENT')
      const err = new ScheduleLoadError('data/missing.json', 'not found', cause)
      expect(err.filePath).toBe('data/missing.json')
      expect(err.cause).toBe(cause)
      expect(err.code).toBe('SCHEDULE_LOAD_ERROR')
      expect(err.name).toBe('ScheduleLoadError')
    })
  })

  describe('ExportError', () => {
    it('should store filePath and set correct code/name', () => {
      const err = new ExportError('out.csv', 'write failed')
      expect(err.filePath).toBe('out.csv')
      expect(err.code).toBe('EXPORT_ERROR')
      expect(err.name).toBe('ExportError')
      expect(err).toBeInstanceOf(AppError)
    })
  })

  describe('isAppError', () => {
    it('should return true for AppError instances', () => {
      expect(isAppError(new AppError('msg', 'CODE'))).toBe(true)
      expect(isAppError(new PreconditionError('msg'))).toBe(true)
      expect(isAppError(new ExportError('a.csv', 'msg'))).toBe(true)
    })

    it('should return false for non-AppError values', () => {
      expect(isAppError(new Error('msg'))).toBe(false)
      expect(isAppError('string')).toBe(false)
      expect(isAppError(null)).toBe(false)
      expect(isAppError(undefined)).toBe(false)
    })
  })

  describe('toAppError', () => {
    it('should return AppError as-is', () => {
      const err = new ConfigurationError('test')
      expect(toAppError(err)).toBe(err)
    })

    it('should wrap Error in AppError with UNKNOWN_ERROR code', () => {
      const err = new Error('original')
      const result = toAppError(err)
      expect(result).toBeInstanceOf(AppError)
      expect(result.message).toBe('original')
      expect(result.code).toBe('UNKNOWN_ERROR')
      expect(result.cause).toBe(err)
    })

    it('should use custom default message for non-Error values', () => {
      const result = toAppError(null, 'custom default')
      expect(result.message).toBe('custom default')
      expect(result.code).toBe('UNKNOWN_ERROR')
    })
  })
})

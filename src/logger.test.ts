import { afterEach, describe, expect, it, vi } from 'vitest'
import { createLogger, silentLogger } from './logger.js'

afterEach(() => {
    vi.restoreAllMocks()
})

describe('createLogger', () => {
    it('writes JSON records to stderr, never stdout', () => {
        const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
        const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)

        createLogger({ format: 'json', name: 'unit' }).info('시작')

        expect(stdout).not.toHaveBeenCalled()
        expect(stderr).toHaveBeenCalledTimes(1)
        const record: unknown = JSON.parse(String(stderr.mock.calls[0]?.[0]))
        expect(record).toMatchObject({ 0: '시작', _meta: { name: 'unit', logLevelName: 'INFO' } })
    })

    it('drops records below the minimum level', () => {
        const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)

        createLogger({ format: 'json', minLevel: 4 }).info('무시')

        expect(stderr).not.toHaveBeenCalled()
    })

    it('stays silent in hidden mode', () => {
        const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)

        createLogger({ format: 'hidden' }).error('숨김')

        expect(stderr).not.toHaveBeenCalled()
    })

    it('keeps the shared silent logger and its sub-loggers quiet', () => {
        const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
        const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)

        silentLogger.error('숨김')
        silentLogger.getSubLogger({ name: 'files' }).warn('차단')

        expect(stderr).not.toHaveBeenCalled()
        expect(stdout).not.toHaveBeenCalled()
    })
})

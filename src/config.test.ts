import os from 'os'
import path from 'path'
import { describe, expect, it } from 'vitest'
import { ZodError } from 'zod'
import { loadConfig } from './config.js'

describe('loadConfig', () => {
    it('fills defaults for an empty environment', () => {
        const config = loadConfig({})

        expect(config.weather).toEqual({
            apiKey: undefined,
            baseUrl: 'https://api.openweathermap.org/data/2.5'
        })
        expect(config.workspaceRoot).toBe(path.join(os.homedir(), 'mcp_workspace'))
        expect(config.database).toEqual({
            server: 'localhost',
            port: 1433,
            database: 'ITLog',
            username: 'sa',
            password: undefined,
            trustServerCertificate: true
        })
        expect(path.basename(config.notesDbPath)).toBe('notes.db')
        expect(config.logging).toEqual({ minLevel: 3, format: 'pretty' })
    })

    it('treats blank values as unset', () => {
        const config = loadConfig({ OPENWEATHER_API_KEY: '   ', MSSQL_PASSWORD: '' })

        expect(config.weather.apiKey).toBeUndefined()
        expect(config.database.password).toBeUndefined()
    })

    it('reads explicit values', () => {
        const config = loadConfig({
            OPENWEATHER_API_KEY: 'test-secret',
            FILE_WORKSPACE: '~/sandbox',
            MSSQL_PORT: '14330',
            MSSQL_PASSWORD: 'test-password',
            MSSQL_TRUST_SERVER_CERTIFICATE: 'false',
            NOTES_DB_PATH: '/tmp/notes-test.db',
            LOG_LEVEL: 'debug',
            LOG_FORMAT: 'json'
        })

        expect(config.weather.apiKey).toBe('test-secret')
        expect(config.workspaceRoot).toBe(path.join(os.homedir(), 'sandbox'))
        expect(config.database.port).toBe(14330)
        expect(config.database.password).toBe('test-password')
        expect(config.database.trustServerCertificate).toBe(false)
        expect(config.notesDbPath).toBe(path.resolve('/tmp/notes-test.db'))
        expect(config.logging).toEqual({ minLevel: 2, format: 'json' })
    })

    it('accepts a numeric log level', () => {
        expect(loadConfig({ LOG_LEVEL: '5' }).logging.minLevel).toBe(5)
    })

    it('rejects an invalid port', () => {
        expect(() => loadConfig({ MSSQL_PORT: 'abc' })).toThrow(ZodError)
        expect(() => loadConfig({ MSSQL_PORT: '70000' })).toThrow(ZodError)
    })

    it('rejects an unknown log level', () => {
        expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(ZodError)
    })

    it('returns a frozen object', () => {
        expect(Object.isFrozen(loadConfig({}))).toBe(true)
    })
})

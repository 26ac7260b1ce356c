import { describe, expect, it } from 'vitest'
import { checkReadOnlyQuery } from './query-guard.js'

describe('checkReadOnlyQuery', () => {
    it('accepts a plain SELECT regardless of case and indentation', () => {
        expect(checkReadOnlyQuery('  select * from Sites')).toEqual({ ok: true })
    })

    it('rejects a query that does not start with SELECT', () => {
        expect(checkReadOnlyQuery('DROP TABLE Sites')).toEqual({
            ok: false,
            reason: 'not-select'
        })
        expect(checkReadOnlyQuery('WITH x AS (SELECT 1) SELECT * FROM x')).toEqual({
            ok: false,
            reason: 'not-select'
        })
    })

    it('requires SELECT as a whole word', () => {
        expect(checkReadOnlyQuery('SELECTED * FROM Sites')).toEqual({
            ok: false,
            reason: 'not-select'
        })
    })

    it('rejects a SELECT that carries a forbidden statement', () => {
        expect(checkReadOnlyQuery('SELECT 1; DROP TABLE Sites')).toEqual({
            ok: false,
            reason: 'forbidden-keyword',
            keyword: 'DROP'
        })
        expect(checkReadOnlyQuery("select 1; exec sp_who")).toEqual({
            ok: false,
            reason: 'forbidden-keyword',
            keyword: 'EXEC'
        })
    })

    it('does not flag column names that contain a keyword', () => {
        expect(
            checkReadOnlyQuery('SELECT updated_at, created_by FROM Events')
        ).toEqual({ ok: true })
    })

    it('uses the caller supplied keyword list', () => {
        expect(checkReadOnlyQuery('SELECT * FROM Secrets', ['SECRETS'])).toEqual({
            ok: false,
            reason: 'forbidden-keyword',
            keyword: 'SECRETS'
        })
    })
})

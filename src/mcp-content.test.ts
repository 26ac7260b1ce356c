import { describe, expect, it } from 'vitest'
import { errorResult, formatBytes, formatDateTime, textResult } from './mcp-content.js'

describe('tool results', () => {
    it('marks only error results', () => {
        expect(textResult('ok')).toEqual({ content: [{ type: 'text', text: 'ok' }] })
        expect(errorResult('bad')).toEqual({
            content: [{ type: 'text', text: 'bad' }],
            isError: true
        })
    })
})

describe('formatBytes', () => {
    it('picks a unit by size', () => {
        expect(formatBytes(512)).toBe('512 B')
        expect(formatBytes(1536)).toBe('1.5 KB')
        expect(formatBytes(3 * 1024 * 1024)).toBe('3.0 MB')
    })
})

describe('formatDateTime', () => {
    it('pads every field', () => {
        expect(formatDateTime(new Date(2026, 2, 4, 5, 6, 7))).toBe('2026-03-04 05:06:07')
    })
})

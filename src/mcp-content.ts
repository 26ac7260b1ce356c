import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js'

export function textResult(text: string): CallToolResult {
    return { content: [{ type: 'text', text }] }
}

export function errorResult(text: string): CallToolResult {
    return { content: [{ type: 'text', text }], isError: true }
}

export function formatBytes(size: number): string {
    if (size < 1024) return `${size} B`
    if (size < 1024 * 1024) return `${(size / 1024).toFixed(1)} KB`
    return `${(size / (1024 * 1024)).toFixed(1)} MB`
}

const pad = (value: number) => String(value).padStart(2, '0')

/** 로컬 시각을 `YYYY-MM-DD HH:mm:ss` 형식으로 변환 */
export function formatDateTime(date: Date): string {
    return (
        `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
        `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
    )
}

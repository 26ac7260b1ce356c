import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { z } from 'zod'
import { type AppLogger, silentLogger } from './logger.js'
import { errorResult, textResult } from './mcp-content.js'
import { DEFAULT_CATEGORY, type Note, type NoteStore, parseTags } from './note-store.js'

export function formatNote(note: Note, includeContent = true): string {
    const pin = note.pinned ? '📌 ' : ''
    let result = `${pin}[#${note.id}] ${note.title}`
    result += `\n  📂 카테고리: ${note.category}`
    result += `\n  📅 생성: ${note.createdAt}`
    if (note.createdAt !== note.updatedAt) {
        result += ` (수정: ${note.updatedAt})`
    }
    if (note.tags.length > 0) {
        result += `\n  🏷️ 태그: ${note.tags.map(tag => `#${tag}`).join(', ')}`
    }
    if (includeContent) {
        result += `\n  📝 내용:\n    ${note.content}`
    }
    return result
}

function formatNoteList(header: string, notes: Note[]): string[] {
    const lines = [header, '']
    for (const note of notes) {
        lines.push(formatNote(note, false), '')
    }
    return lines
}

const notFound = (id: number) => errorResult(`❌ 메모 #${id}를 찾을 수 없습니다.`)

export interface NotesServerOptions {
    store: NoteStore
    logger?: AppLogger
}

export function createNotesServer({ store, logger = silentLogger }: NotesServerOptions): McpServer {
    const log = logger.getSubLogger({ name: 'notes' })

    const server = new McpServer({
        name: 'notes-server',
        version: '1.0.0'
    })

    // 도구 (Create)
    server.tool(
        'create_note',
        '새 메모를 생성합니다.',
        {
            title: z.string().min(1).describe('메모 제목'),
            content: z.string().describe('메모 내용'),
            category: z.string().default(DEFAULT_CATEGORY).describe(`카테고리 (기본: "${DEFAULT_CATEGORY}")`),
            tags: z.string().default('').describe('쉼표로 구분된 태그 (예: "업무,중요,TODO")'),
            pinned: z.boolean().default(false).describe('상단 고정 여부')
        },
        ({ title, content, category, tags, pinned }) => {
            const note = store.create({ title, content, category, tags: parseTags(tags), pinned })
            log.debug('메모 생성', note.id)
            return textResult(
                `✅ 메모가 생성되었습니다! (ID: #${note.id})\n  제목: ${note.title}\n  카테고리: ${note.category}`
            )
        }
    )

    // 도구 (Read - List)
    server.tool(
        'list_notes',
        '메모 목록을 조회합니다.',
        {
            category: z.string().default('').describe('카테고리 필터'),
            tag: z.string().default('').describe('태그 필터'),
            pinned_only: z.boolean().default(false).describe('고정된 메모만 표시'),
            limit: z.number().int().min(1).max(500).default(20).describe('최대 표시 개수')
        },
        ({ category, tag, pinned_only, limit }) => {
            const notes = store.list({
                category: category || undefined,
                tag: tag || undefined,
                pinnedOnly: pinned_only,
                limit
            })
            if (notes.length === 0) {
                const filters: string[] = []
                if (category) filters.push(`카테고리: ${category}`)
                if (tag) filters.push(`태그: ${tag}`)
                if (pinned_only) filters.push('고정 메모만')
                return textResult(
                    '메모가 없습니다.' + (filters.length > 0 ? ` (필터: ${filters.join(', ')})` : '')
                )
            }
            const lines = formatNoteList('📋 메모 목록', notes)
            lines.push(`총 ${notes.length}개 메모`)
            return textResult(lines.join('\n'))
        }
    )

    // 도구 (Read - Detail)
    server.tool(
        'get_note',
        '메모의 상세 내용을 조회합니다.',
        { note_id: z.number().int().describe('메모 ID') },
        ({ note_id }) => {
            const note = store.get(note_id)
            if (!note) return notFound(note_id)
            return textResult(`📝 메모 상세\n${'='.repeat(40)}\n${formatNote(note)}`)
        }
    )

    // 도구 (Update)
    server.tool(
        'update_note',
        '기존 메모를 수정합니다. 변경할 필드만 전달하세요.',
        {
            note_id: z.number().int().describe('수정할 메모 ID'),
            title: z.string().default('').describe('새 제목 (빈 문자열이면 변경 안 함)'),
            content: z.string().default('').describe('새 내용 (빈 문자열이면 변경 안 함)'),
            category: z.string().default('').describe('새 카테고리 (빈 문자열이면 변경 안 함)'),
            tags: z.string().default('').describe('새 태그 (쉼표 구분, 빈 문자열이면 변경 안 함)'),
            pinned: z.boolean().optional().describe('고정 여부 (생략하면 변경 안 함)')
        },
        ({ note_id, title, content, category, tags, pinned }) => {
            const updated = store.update(note_id, {
                title: title || undefined,
                content: content || undefined,
                category: category || undefined,
                tags: tags ? parseTags(tags) : undefined,
                pinned
            })
            if (!updated) return notFound(note_id)

            const changes: string[] = []
            if (title) changes.push(`제목 → ${title}`)
            if (content) changes.push('내용 수정')
            if (category) changes.push(`카테고리 → ${category}`)
            if (tags) changes.push(`태그 → ${tags}`)
            if (pinned !== undefined) changes.push(`고정 → ${pinned ? '예' : '아니오'}`)

            return textResult(`✅ 메모 #${note_id} 수정 완료\n  변경 사항: ${changes.join(', ')}`)
        }
    )

    // 도구 (Delete)
    server.tool(
        'delete_note',
        '메모를 삭제합니다.',
        { note_id: z.number().int().describe('삭제할 메모 ID') },
        ({ note_id }) => {
            const title = store.delete(note_id)
            if (title === undefined) return notFound(note_id)
            log.debug('메모 삭제', note_id)
            return textResult(`🗑️ 메모 #${note_id} '${title}'이(가) 삭제되었습니다.`)
        }
    )

    server.tool(
        'search_notes',
        '메모 제목과 내용에서 키워드를 검색합니다.',
        { keyword: z.string().describe('검색 키워드') },
        ({ keyword }) => {
            const notes = store.search(keyword)
            if (notes.length === 0) {
                return textResult(`🔍 '${keyword}'에 대한 검색 결과가 없습니다.`)
            }
            return textResult(
                formatNoteList(`🔍 '${keyword}' 검색 결과 (${notes.length}건)`, notes).join('\n')
            )
        }
    )

    server.tool('list_categories', '사용 중인 모든 카테고리와 메모 수를 보여줍니다.', () => {
        const categories = store.categories()
        if (categories.length === 0) {
            return textResult('카테고리가 없습니다. 메모를 먼저 생성하세요.')
        }
        const lines = ['📂 카테고리 목록', '']
        for (const { category, count } of categories) {
            lines.push(`  ${category}: ${count}개`)
        }
        return textResult(lines.join('\n'))
    })

    server.tool('list_tags', '사용 중인 모든 태그를 보여줍니다.', () => {
        const tags = store.tags()
        if (tags.length === 0) {
            return textResult('태그가 없습니다. 메모 생성 시 태그를 추가해보세요.')
        }
        const lines = ['🏷️ 태그 목록', '']
        for (const { name, count } of tags) {
            lines.push(`  #${name}: ${count}개 메모`)
        }
        return textResult(lines.join('\n'))
    })

    server.tool('note_stats', '메모 통계를 보여줍니다.', () => {
        const stats = store.stats()
        const lines = [
            '📊 메모 통계',
            `  총 메모 수: ${stats.total}개`,
            `  고정 메모: ${stats.pinned}개`,
            `  카테고리 수: ${stats.categories}개`,
            `  태그 수: ${stats.tags}개`
        ]
        if (stats.lastUpdated) {
            lines.push(`  마지막 수정: ${stats.lastUpdated}`)
        }
        return textResult(lines.join('\n'))
    })

    // 정적 리소스
    server.resource('recent-notes', 'notes://recent', uri => {
        const notes = store.recent(5)
        return {
            contents: [
                {
                    uri: uri.href,
                    text:
                        notes.length === 0
                            ? '메모가 없습니다.'
                            : formatNoteList('최근 메모 (최대 5개)', notes).join('\n')
                }
            ]
        }
    })

    // 프롬프트
    server.prompt('weekly_review', '이번 주 메모를 정리하는 프롬프트입니다.', () => ({
        messages: [
            {
                role: 'user',
                content: {
                    type: 'text',
                    text:
                        '이번 주 작성한 메모를 정리해주세요.\n\n' +
                        '1. list_notes로 전체 목록을 확인\n' +
                        '2. 카테고리별로 분류하여 요약\n' +
                        '3. 미완료 TODO가 있다면 정리\n' +
                        '4. 중요도에 따라 다음 주 액션 아이템 제안'
                }
            }
        ]
    }))

    return server
}

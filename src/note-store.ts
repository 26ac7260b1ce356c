import fs from 'fs'
import path from 'path'
import Database from 'better-sqlite3'
import { formatDateTime } from './mcp-content.js'

export const DEFAULT_CATEGORY = '일반'

export interface Note {
    id: number
    title: string
    content: string
    category: string
    pinned: boolean
    createdAt: string
    updatedAt: string
    tags: string[]
}

export interface NewNote {
    title: string
    content: string
    category?: string
    tags?: string[]
    pinned?: boolean
}

/** 값이 있는 필드만 바꿉니다. `tags`를 주면 기존 태그를 통째로 교체합니다. */
export interface NotePatch {
    title?: string
    content?: string
    category?: string
    tags?: string[]
    pinned?: boolean
}

export interface NoteFilter {
    category?: string
    tag?: string
    pinnedOnly?: boolean
    limit?: number
}

export interface NoteStats {
    total: number
    pinned: number
    categories: number
    tags: number
    lastUpdated?: string
}

interface NoteRow {
    id: number
    title: string
    content: string
    category: string
    is_pinned: number
    created_at: string
    updated_at: string
}

const SCHEMA = `
    CREATE TABLE IF NOT EXISTS notes (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        title TEXT NOT NULL,
        content TEXT NOT NULL,
        category TEXT DEFAULT '${DEFAULT_CATEGORY}',
        is_pinned INTEGER DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS tags (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT UNIQUE NOT NULL
    );

    CREATE TABLE IF NOT EXISTS note_tags (
        note_id INTEGER,
        tag_id INTEGER,
        PRIMARY KEY (note_id, tag_id),
        FOREIGN KEY (note_id) REFERENCES notes(id) ON DELETE CASCADE,
        FOREIGN KEY (tag_id) REFERENCES tags(id) ON DELETE CASCADE
    );
`

/** 쉼표로 구분된 태그 문자열을 정리합니다: 공백 제거, 빈 값과 중복 제거, 입력 순서 유지 */
export function parseTags(value: string | string[]): string[] {
    const parts = typeof value === 'string' ? value.split(',') : value
    const seen = new Set<string>()
    for (const part of parts) {
        const name = part.trim()
        if (name) seen.add(name)
    }
    return [...seen]
}

// LIKE 와일드카드를 글자 그대로 찾도록 이스케이프
function likePattern(keyword: string): string {
    return `%${keyword.replace(/[\\%_]/g, match => `\\${match}`)}%`
}

export class NoteStore {
    private readonly db: Database.Database

    constructor(
        filename: string,
        private readonly clock: () => Date = () => new Date()
    ) {
        if (filename !== ':memory:') {
            fs.mkdirSync(path.dirname(filename), { recursive: true })
        }
        this.db = new Database(filename)
        this.db.pragma('foreign_keys = ON')
        this.initSchema()
    }

    /** 테이블이 없을 때만 만듭니다. 여러 번 호출해도 됩니다. */
    initSchema(): void {
        this.db.exec(SCHEMA)
    }

    tableNames(): string[] {
        return this.db
            .prepare<[], { name: string }>(
                "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
            )
            .all()
            .map(row => row.name)
    }

    close(): void {
        this.db.close()
    }

    private now(): string {
        return formatDateTime(this.clock())
    }

    private tagsOf(noteId: number): string[] {
        return this.db
            .prepare<[number], { name: string }>(
                `SELECT t.name FROM tags t
                 JOIN note_tags nt ON t.id = nt.tag_id
                 WHERE nt.note_id = ?
                 ORDER BY nt.rowid`
            )
            .all(noteId)
            .map(row => row.name)
    }

    private toNote(row: NoteRow): Note {
        return {
            id: row.id,
            title: row.title,
            content: row.content,
            category: row.category,
            pinned: row.is_pinned === 1,
            createdAt: row.created_at,
            updatedAt: row.updated_at,
            tags: this.tagsOf(row.id)
        }
    }

    private attachTags(noteId: number, tags: string[]): void {
        const insertTag = this.db.prepare<[string]>('INSERT OR IGNORE INTO tags (name) VALUES (?)')
        const findTag = this.db.prepare<[string], { id: number }>('SELECT id FROM tags WHERE name = ?')
        const link = this.db.prepare<[number, number]>(
            'INSERT OR IGNORE INTO note_tags (note_id, tag_id) VALUES (?, ?)'
        )
        for (const name of parseTags(tags)) {
            insertTag.run(name)
            const tag = findTag.get(name)
            if (tag) link.run(noteId, tag.id)
        }
    }

    create(note: NewNote): Note {
        const now = this.now()
        const id = this.db.transaction(() => {
            const result = this.db
                .prepare<[string, string, string, number, string, string]>(
                    `INSERT INTO notes (title, content, category, is_pinned, created_at, updated_at)
                     VALUES (?, ?, ?, ?, ?, ?)`
                )
                .run(
                    note.title,
                    note.content,
                    note.category || DEFAULT_CATEGORY,
                    note.pinned ? 1 : 0,
                    now,
                    now
                )
            const noteId = Number(result.lastInsertRowid)
            this.attachTags(noteId, note.tags ?? [])
            return noteId
        })()

        const created = this.get(id)
        if (!created) throw new Error(`방금 생성한 메모 #${id}를 읽지 못했습니다.`)
        return created
    }

    get(id: number): Note | undefined {
        const row = this.db.prepare<[number], NoteRow>('SELECT * FROM notes WHERE id = ?').get(id)
        return row ? this.toNote(row) : undefined
    }

    list({ category, tag, pinnedOnly = false, limit = 20 }: NoteFilter = {}): Note[] {
        let query = 'SELECT DISTINCT n.* FROM notes n'
        const conditions: string[] = []
        const params: Array<string | number> = []

        if (tag) {
            query += ' JOIN note_tags nt ON n.id = nt.note_id JOIN tags t ON nt.tag_id = t.id'
            conditions.push('t.name = ?')
            params.push(tag)
        }
        if (category) {
            conditions.push('n.category = ?')
            params.push(category)
        }
        if (pinnedOnly) {
            conditions.push('n.is_pinned = 1')
        }
        if (conditions.length > 0) {
            query += ` WHERE ${conditions.join(' AND ')}`
        }
        query += ' ORDER BY n.is_pinned DESC, n.updated_at DESC, n.id DESC LIMIT ?'
        params.push(limit)

        return this.db
            .prepare<Array<string | number>, NoteRow>(query)
            .all(...params)
            .map(row => this.toNote(row))
    }

    update(id: number, patch: NotePatch): Note | undefined {
        if (!this.get(id)) return undefined

        const updates: string[] = []
        const params: Array<string | number> = []
        if (patch.title) {
            updates.push('title = ?')
            params.push(patch.title)
        }
        if (patch.content) {
            updates.push('content = ?')
            params.push(patch.content)
        }
        if (patch.category) {
            updates.push('category = ?')
            params.push(patch.category)
        }
        if (patch.pinned !== undefined) {
            updates.push('is_pinned = ?')
            params.push(patch.pinned ? 1 : 0)
        }

        this.db.transaction(() => {
            if (updates.length > 0) {
                updates.push('updated_at = ?')
                params.push(this.now(), id)
                this.db
                    .prepare<Array<string | number>>(`UPDATE notes SET ${updates.join(', ')} WHERE id = ?`)
                    .run(...params)
            }
            if (patch.tags !== undefined) {
                this.db.prepare<[number]>('DELETE FROM note_tags WHERE note_id = ?').run(id)
                this.attachTags(id, patch.tags)
            }
        })()

        return this.get(id)
    }

    /** 삭제한 메모의 제목을 돌려줍니다. 태그 연결은 함께 지워지고 태그 자체는 남습니다. */
    delete(id: number): string | undefined {
        const row = this.db
            .prepare<[number], { title: string }>('SELECT title FROM notes WHERE id = ?')
            .get(id)
        if (!row) return undefined
        this.db.prepare<[number]>('DELETE FROM notes WHERE id = ?').run(id)
        return row.title
    }

    search(keyword: string): Note[] {
        const pattern = likePattern(keyword)
        return this.db
            .prepare<[string, string], NoteRow>(
                `SELECT * FROM notes
                 WHERE title LIKE ? ESCAPE '\\' OR content LIKE ? ESCAPE '\\'
                 ORDER BY updated_at DESC, id DESC`
            )
            .all(pattern, pattern)
            .map(row => this.toNote(row))
    }

    categories(): Array<{ category: string; count: number }> {
        return this.db
            .prepare<[], { category: string; count: number }>(
                `SELECT category, COUNT(*) AS count
                 FROM notes
                 GROUP BY category
                 ORDER BY count DESC, category`
            )
            .all()
    }

    tags(): Array<{ name: string; count: number }> {
        return this.db
            .prepare<[], { name: string; count: number }>(
                `SELECT t.name, COUNT(nt.note_id) AS count
                 FROM tags t
                 LEFT JOIN note_tags nt ON t.id = nt.tag_id
                 GROUP BY t.name
                 ORDER BY count DESC, t.name`
            )
            .all()
    }

    stats(): NoteStats {
        const count = (sql: string) =>
            this.db.prepare<[], { c: number }>(sql).get()?.c ?? 0
        const latest = this.db
            .prepare<[], { updated_at: string }>(
                'SELECT updated_at FROM notes ORDER BY updated_at DESC LIMIT 1'
            )
            .get()

        return {
            total: count('SELECT COUNT(*) AS c FROM notes'),
            pinned: count('SELECT COUNT(*) AS c FROM notes WHERE is_pinned = 1'),
            categories: count('SELECT COUNT(DISTINCT category) AS c FROM notes'),
            tags: count('SELECT COUNT(*) AS c FROM tags'),
            lastUpdated: latest?.updated_at
        }
    }

    recent(limit = 5): Note[] {
        return this.db
            .prepare<[number], NoteRow>('SELECT * FROM notes ORDER BY updated_at DESC, id DESC LIMIT ?')
            .all(limit)
            .map(row => this.toNote(row))
    }
}

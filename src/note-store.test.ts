import fs from 'fs'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { NoteStore, parseTags } from './note-store.js'

// 호출할 때마다 1분씩 흐르는 시계
function tickingClock(start = new Date(2026, 0, 1, 9, 0, 0)) {
    let minutes = 0
    return () => new Date(start.getTime() + minutes++ * 60_000)
}

let store: NoteStore

beforeEach(() => {
    store = new NoteStore(':memory:', tickingClock())
})

afterEach(() => {
    store.close()
})

describe('parseTags', () => {
    it('trims, drops blanks and removes duplicates in order', () => {
        expect(parseTags(' 업무, 중요 ,,업무, TODO ')).toEqual(['업무', '중요', 'TODO'])
        expect(parseTags(['a', ' a ', '', 'b'])).toEqual(['a', 'b'])
        expect(parseTags('')).toEqual([])
    })
})

describe('NoteStore', () => {
    it('creates the schema idempotently', () => {
        const before = store.tableNames()

        store.initSchema()

        expect(before).toEqual(['note_tags', 'notes', 'tags'])
        expect(store.tableNames()).toEqual(before)
    })

    it('persists to a file and creates its directory', () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'notes-'))
        const file = path.join(dir, 'nested', 'notes.db')
        try {
            const first = new NoteStore(file)
            first.create({ title: '보존', content: '파일에 남습니다' })
            first.close()

            const second = new NoteStore(file)
            expect(second.get(1)?.title).toBe('보존')
            second.close()
        } finally {
            fs.rmSync(dir, { recursive: true, force: true })
        }
    })

    it('creates and reads back a note', () => {
        const created = store.create({
            title: '회의록',
            content: '분기 계획',
            category: '업무',
            tags: parseTags(' 업무, 중요 ,업무'),
            pinned: true
        })

        expect(created).toEqual({
            id: 1,
            title: '회의록',
            content: '분기 계획',
            category: '업무',
            pinned: true,
            createdAt: '2026-01-01 09:00:00',
            updatedAt: '2026-01-01 09:00:00',
            tags: ['업무', '중요']
        })
        expect(store.get(1)).toEqual(created)
    })

    it('uses the default category', () => {
        expect(store.create({ title: 't', content: 'c', category: '' }).category).toBe('일반')
    })

    it('returns undefined for a missing note', () => {
        expect(store.get(99)).toBeUndefined()
        expect(store.update(99, { title: 'x' })).toBeUndefined()
        expect(store.delete(99)).toBeUndefined()
    })

    it('lists pinned notes first, then most recently updated', () => {
        store.create({ title: 'old', content: '' })
        store.create({ title: 'pinned', content: '', pinned: true })
        store.create({ title: 'new', content: '' })

        expect(store.list().map(note => note.title)).toEqual(['pinned', 'new', 'old'])
        expect(store.list({ limit: 1 }).map(note => note.title)).toEqual(['pinned'])
        expect(store.list({ pinnedOnly: true }).map(note => note.title)).toEqual(['pinned'])
    })

    it('filters by category and tag', () => {
        store.create({ title: 'a', content: '', category: '업무', tags: ['중요'] })
        store.create({ title: 'b', content: '', category: '개인', tags: ['중요', '여행'] })
        store.create({ title: 'c', content: '', category: '업무' })

        expect(store.list({ category: '업무' }).map(note => note.title)).toEqual(['c', 'a'])
        expect(store.list({ tag: '중요' }).map(note => note.title)).toEqual(['b', 'a'])
        expect(store.list({ tag: '중요', category: '개인' }).map(note => note.title)).toEqual(['b'])
    })

    it('updates only the given fields and bumps the update time', () => {
        store.create({ title: '초안', content: '본문', tags: ['a'] })

        const updated = store.update(1, { title: '최종', pinned: true })

        expect(updated).toMatchObject({
            title: '최종',
            content: '본문',
            pinned: true,
            createdAt: '2026-01-01 09:00:00',
            updatedAt: '2026-01-01 09:01:00',
            tags: ['a']
        })
    })

    it('replaces tags without touching the update time', () => {
        store.create({ title: 't', content: 'c', tags: ['a', 'b'] })

        const updated = store.update(1, { tags: ['c', 'a'] })

        expect(updated?.tags).toEqual(['c', 'a'])
        expect(updated?.updatedAt).toBe('2026-01-01 09:00:00')
    })

    it('deletes a note and its tag links while keeping shared tags', () => {
        store.create({ title: 'first', content: '', tags: ['shared', 'solo'] })
        store.create({ title: 'second', content: '', tags: ['shared'] })

        expect(store.delete(1)).toBe('first')

        expect(store.get(1)).toBeUndefined()
        expect(store.tags()).toEqual([
            { name: 'shared', count: 1 },
            { name: 'solo', count: 0 }
        ])
        expect(store.list({ tag: 'solo' })).toEqual([])
    })

    it('searches title and content case-insensitively', () => {
        store.create({ title: 'Shopping', content: 'milk' })
        store.create({ title: 'Work', content: 'ship the release' })
        store.create({ title: 'Misc', content: 'nothing' })

        expect(store.search('SH').map(note => note.title)).toEqual(['Work', 'Shopping'])
    })

    it('matches LIKE wildcards literally', () => {
        store.create({ title: '100% 완료', content: '' })
        store.create({ title: '1000 완료', content: '' })
        store.create({ title: 'file_name', content: '' })
        store.create({ title: 'filexname', content: '' })

        expect(store.search('%').map(note => note.title)).toEqual(['100% 완료'])
        expect(store.search('e_n').map(note => note.title)).toEqual(['file_name'])
    })

    it('counts categories and summarizes stats', () => {
        store.create({ title: 'a', content: '', category: '업무', tags: ['x'] })
        store.create({ title: 'b', content: '', category: '업무', pinned: true })
        store.create({ title: 'c', content: '', category: '개인', tags: ['x', 'y'] })

        expect(store.categories()).toEqual([
            { category: '업무', count: 2 },
            { category: '개인', count: 1 }
        ])
        expect(store.stats()).toEqual({
            total: 3,
            pinned: 1,
            categories: 2,
            tags: 2,
            lastUpdated: '2026-01-01 09:02:00'
        })
    })

    it('reports empty stats without a last update', () => {
        expect(store.stats()).toEqual({
            total: 0,
            pinned: 0,
            categories: 0,
            tags: 0,
            lastUpdated: undefined
        })
    })

    it('returns the most recently updated notes', () => {
        for (const title of ['1', '2', '3', '4', '5', '6']) {
            store.create({ title, content: '' })
        }

        expect(store.recent(3).map(note => note.title)).toEqual(['6', '5', '4'])
    })
})

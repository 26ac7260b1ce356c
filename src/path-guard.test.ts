import fs from 'fs'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { isInside, PathGuard } from './path-guard.js'

let base: string
let guard: PathGuard

beforeEach(async () => {
    base = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'path-guard-')))
    guard = await PathGuard.create(path.join(base, 'work'))
})

afterEach(() => {
    fs.rmSync(base, { recursive: true, force: true })
})

describe('PathGuard.create', () => {
    it('creates a missing root directory', () => {
        expect(guard.root).toBe(path.join(base, 'work'))
        expect(fs.statSync(guard.root).isDirectory()).toBe(true)
    })
})

describe('PathGuard.resolve', () => {
    it('resolves an empty path to the root', async () => {
        expect(await guard.resolve('')).toEqual({ ok: true, path: guard.root })
    })

    it('resolves "." to the root', async () => {
        expect(await guard.resolve('.')).toEqual({ ok: true, path: guard.root })
    })

    it('rejects a parent traversal', async () => {
        expect(await guard.resolve('../secret')).toEqual({
            ok: false,
            error: { kind: 'denied', requested: '../secret', root: guard.root }
        })
    })

    it('accepts a path that leaves and re-enters a subdirectory', async () => {
        fs.mkdirSync(path.join(guard.root, 'sub'))
        fs.writeFileSync(path.join(guard.root, 'sub', 'file.txt'), 'hello')

        expect(await guard.resolve('sub/../sub/file.txt')).toEqual({
            ok: true,
            path: path.join(guard.root, 'sub', 'file.txt')
        })
    })

    it('rejects a sibling directory sharing the root as a prefix', async () => {
        fs.mkdirSync(path.join(base, 'workX'))

        const result = await guard.resolve('../workX')

        expect(result.ok).toBe(false)
    })

    it('rejects a file in a sibling directory sharing the root as a prefix', async () => {
        const result = await guard.resolve('../workX/notes.txt')

        expect(result.ok).toBe(false)
    })

    it('treats an absolute-looking path as relative to the root', async () => {
        expect(await guard.resolve('/etc/passwd')).toEqual({
            ok: true,
            path: path.join(guard.root, 'etc', 'passwd')
        })
    })

    it('accepts a path whose parents do not exist yet', async () => {
        expect(await guard.resolve('a/b/c.txt')).toEqual({
            ok: true,
            path: path.join(guard.root, 'a', 'b', 'c.txt')
        })
    })

    it('rejects a symlink inside the root that points outside', async () => {
        const outside = path.join(base, 'outside')
        fs.mkdirSync(outside)
        fs.writeFileSync(path.join(outside, 'secret.txt'), 'top secret')
        fs.symlinkSync(outside, path.join(guard.root, 'escape'))

        expect((await guard.resolve('escape/secret.txt')).ok).toBe(false)
        expect((await guard.resolve('escape')).ok).toBe(false)
    })

    it('accepts a symlink that stays inside the root', async () => {
        fs.mkdirSync(path.join(guard.root, 'real'))
        fs.symlinkSync(path.join(guard.root, 'real'), path.join(guard.root, 'alias'))

        expect(await guard.resolve('alias/new.txt')).toEqual({
            ok: true,
            path: path.join(guard.root, 'real', 'new.txt')
        })
    })

    it('rejects a dangling symlink whose target is outside the root', async () => {
        fs.mkdirSync(path.join(base, 'outside'))
        fs.symlinkSync(path.join(base, 'outside', 'planted.txt'), path.join(guard.root, 'evil'))

        expect(await guard.resolve('evil')).toEqual({
            ok: false,
            error: { kind: 'denied', requested: 'evil', root: guard.root }
        })
    })

    it('resolves a dangling symlink whose target stays inside to that target', async () => {
        fs.symlinkSync('later.txt', path.join(guard.root, 'pending'))

        expect(await guard.resolve('pending')).toEqual({
            ok: true,
            path: path.join(guard.root, 'later.txt')
        })
    })

    it('applies ".." after following a symlink, as the OS does', async () => {
        fs.mkdirSync(path.join(guard.root, 'sub', 'deep'), { recursive: true })
        fs.symlinkSync(path.join(guard.root, 'sub', 'deep'), path.join(guard.root, 'link'))

        expect(await guard.resolve('link/../x.txt')).toEqual({
            ok: true,
            path: path.join(guard.root, 'sub', 'x.txt')
        })
    })

    it('rejects ".." that climbs out through a symlink to the root itself', async () => {
        fs.symlinkSync(guard.root, path.join(guard.root, 'self'))

        expect((await guard.resolve('self/../secret')).ok).toBe(false)
    })

    it('reports workspace-relative display paths', () => {
        expect(guard.relative(path.join(guard.root, 'docs', 'a.md'))).toBe(
            path.join('docs', 'a.md')
        )
    })
})

describe('isInside', () => {
    it('compares on path segment boundaries', () => {
        expect(isInside('/a/b', '/a/b')).toBe(true)
        expect(isInside('/a/b', '/a/b/c')).toBe(true)
        expect(isInside('/a/b', '/a/bc')).toBe(false)
        expect(isInside('/a/b', '/a')).toBe(false)
    })

    it('accepts names that merely start with two dots', () => {
        expect(isInside('/a/b', '/a/b/..hidden')).toBe(true)
    })
})

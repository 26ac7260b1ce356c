import fs from 'fs/promises'
import path from 'path'
import { glob } from 'glob'
import type { PathDenied, PathGuard } from './path-guard.js'

export type FileError =
    | PathDenied
    | { kind: 'not-found'; path: string }
    | { kind: 'not-directory'; path: string }
    | { kind: 'not-file'; path: string }
    | { kind: 'binary'; path: string }
    | { kind: 'decode-error'; path: string; encoding: string }
    | { kind: 'exists'; path: string }

export type FileResult<T> = { ok: true; value: T } | { ok: false; error: FileError }

export interface FileEntry {
    path: string
    isDirectory: boolean
    size: number
}

export interface FileContent {
    content: string
    lines: number
}

export interface WriteSummary {
    bytes: number
    lines: number
}

export interface SearchMatch {
    path: string
    line: number
    text: string
}

export interface SearchSummary {
    matches: SearchMatch[]
    filesSearched: number
}

export type FileInfo =
    | {
          type: 'file'
          extension: string
          size: number
          modified: Date
          created: Date
      }
    | {
          type: 'directory'
          directories: number
          files: number
          modified: Date
          created: Date
      }

export interface WorkspaceSummary {
    root: string
    directories: number
    files: number
    total: number
}

export const BINARY_EXTENSIONS = new Set([
    '.png',
    '.jpg',
    '.jpeg',
    '.gif',
    '.pdf',
    '.zip',
    '.exe'
])

function countLines(text: string): number {
    return text.split('\n').length
}

function decode(bytes: Uint8Array, encoding: string): string | undefined {
    try {
        return new TextDecoder(encoding, { fatal: true }).decode(bytes)
    } catch {
        // 지원하지 않는 인코딩(RangeError)과 디코딩 실패(TypeError) 모두 해당
        return undefined
    }
}

async function statOrUndefined(target: string) {
    try {
        return await fs.stat(target)
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return undefined
        }
        throw error
    }
}

async function readIfPermitted(file: string): Promise<Buffer | undefined> {
    try {
        return await fs.readFile(file)
    } catch (error) {
        if (
            error instanceof Error &&
            'code' in error &&
            (error.code === 'EACCES' || error.code === 'EPERM')
        ) {
            return undefined
        }
        throw error
    }
}

async function countChildren(directory: string) {
    const entries = await fs.readdir(directory, { withFileTypes: true })
    return {
        directories: entries.filter(entry => entry.isDirectory()).length,
        files: entries.filter(entry => entry.isFile()).length,
        total: entries.length
    }
}

/**
 * 작업 디렉토리 안에서만 동작하는 파일 작업 모음.
 * 모든 메서드는 파일 시스템에 접근하기 전에 PathGuard를 거칩니다.
 */
export class FileManager {
    constructor(private readonly guard: PathGuard) {}

    get root(): string {
        return this.guard.root
    }

    // glob 결과도 작업 디렉토리 밖이면 버립니다 (예: '../*' 패턴)
    private async guardMatches(matches: string[]): Promise<string[]> {
        const accepted: string[] = []
        for (const match of matches) {
            const resolved = await this.guard.resolve(this.guard.relative(match))
            if (resolved.ok) accepted.push(resolved.path)
        }
        return accepted
    }

    async listFiles(
        directory = '',
        pattern = '*'
    ): Promise<FileResult<FileEntry[]>> {
        const target = await this.guard.resolve(directory)
        if (!target.ok) return target

        const stat = await statOrUndefined(target.path)
        if (!stat) return { ok: false, error: { kind: 'not-found', path: directory } }
        if (!stat.isDirectory()) {
            return { ok: false, error: { kind: 'not-directory', path: directory } }
        }

        const matches = await glob(pattern, {
            cwd: target.path,
            absolute: true,
            dot: true
        })
        const accepted = await this.guardMatches(matches)
        accepted.sort()

        const entries: FileEntry[] = []
        for (const match of accepted) {
            if (match === target.path) continue
            // 대상이 없는 심볼릭 링크는 건너뜁니다
            const entryStat = await statOrUndefined(match)
            if (!entryStat) continue
            entries.push({
                path: this.guard.relative(match),
                isDirectory: entryStat.isDirectory(),
                size: entryStat.size
            })
        }
        return { ok: true, value: entries }
    }

    async readFile(
        filePath: string,
        encoding = 'utf-8'
    ): Promise<FileResult<FileContent>> {
        const target = await this.guard.resolve(filePath)
        if (!target.ok) return target

        const stat = await statOrUndefined(target.path)
        if (!stat) return { ok: false, error: { kind: 'not-found', path: filePath } }
        if (!stat.isFile()) {
            return { ok: false, error: { kind: 'not-file', path: filePath } }
        }
        if (BINARY_EXTENSIONS.has(path.extname(target.path).toLowerCase())) {
            return { ok: false, error: { kind: 'binary', path: filePath } }
        }

        const content = decode(await fs.readFile(target.path), encoding)
        if (content === undefined) {
            return {
                ok: false,
                error: { kind: 'decode-error', path: filePath, encoding }
            }
        }
        return { ok: true, value: { content, lines: countLines(content) } }
    }

    async writeFile(
        filePath: string,
        content: string,
        overwrite = false
    ): Promise<FileResult<WriteSummary>> {
        const target = await this.guard.resolve(filePath)
        if (!target.ok) return target

        if (!overwrite && (await statOrUndefined(target.path))) {
            return { ok: false, error: { kind: 'exists', path: filePath } }
        }

        await fs.mkdir(path.dirname(target.path), { recursive: true })
        await fs.writeFile(target.path, content, 'utf-8')

        return {
            ok: true,
            value: {
                bytes: Buffer.byteLength(content, 'utf-8'),
                lines: countLines(content)
            }
        }
    }

    async searchFiles(
        keyword: string,
        filePattern = '*.txt',
        directory = ''
    ): Promise<FileResult<SearchSummary>> {
        const target = await this.guard.resolve(directory)
        if (!target.ok) return target

        const stat = await statOrUndefined(target.path)
        if (!stat) return { ok: false, error: { kind: 'not-found', path: directory } }
        if (!stat.isDirectory()) {
            return { ok: false, error: { kind: 'not-directory', path: directory } }
        }

        const files = await this.guardMatches(
            await glob(`**/${filePattern}`, {
                cwd: target.path,
                absolute: true,
                dot: true,
                nodir: true
            })
        )
        files.sort()

        const needle = keyword.toLowerCase()
        const matches: SearchMatch[] = []
        for (const file of files) {
            const bytes = await readIfPermitted(file)
            if (!bytes) continue
            const content = decode(bytes, 'utf-8')
            if (content === undefined) continue

            content.split('\n').forEach((line, index) => {
                if (line.toLowerCase().includes(needle)) {
                    matches.push({
                        path: this.guard.relative(file),
                        line: index + 1,
                        text: line.trim()
                    })
                }
            })
        }
        return { ok: true, value: { matches, filesSearched: files.length } }
    }

    async getFileInfo(filePath: string): Promise<FileResult<FileInfo>> {
        const target = await this.guard.resolve(filePath)
        if (!target.ok) return target

        const stat = await statOrUndefined(target.path)
        if (!stat) return { ok: false, error: { kind: 'not-found', path: filePath } }

        if (stat.isFile()) {
            return {
                ok: true,
                value: {
                    type: 'file',
                    extension: path.extname(target.path),
                    size: stat.size,
                    modified: stat.mtime,
                    created: stat.birthtime
                }
            }
        }

        const children = await countChildren(target.path)
        return {
            ok: true,
            value: {
                type: 'directory',
                directories: children.directories,
                files: children.files,
                modified: stat.mtime,
                created: stat.birthtime
            }
        }
    }

    async createDirectory(dirPath: string): Promise<FileResult<string>> {
        const target = await this.guard.resolve(dirPath)
        if (!target.ok) return target

        if (await statOrUndefined(target.path)) {
            return { ok: false, error: { kind: 'exists', path: dirPath } }
        }
        await fs.mkdir(target.path, { recursive: true })
        return { ok: true, value: target.path }
    }

    async summarizeWorkspace(): Promise<WorkspaceSummary> {
        const children = await countChildren(this.guard.root)
        return { root: this.guard.root, ...children }
    }
}

import fs from 'fs/promises'
import path from 'path'

export interface PathDenied {
    kind: 'denied'
    requested: string
    root: string
}

export type PathResolution =
    | { ok: true; path: string }
    | { ok: false; error: PathDenied }

const MAX_SYMLINKS = 40

const SEPARATORS = path.sep === '\\' ? /[\\/]+/ : /\/+/

function isMissing(error: unknown): boolean {
    if (!(error instanceof Error) || !('code' in error)) return false
    return error.code === 'ENOENT' || error.code === 'ENOTDIR'
}

/**
 * `root` 안에 `candidate`가 있는지 경로 구분자 단위로 비교합니다.
 * 문자열 접두사 비교는 `/work` 와 `/workX` 를 구분하지 못합니다.
 */
export function isInside(root: string, candidate: string): boolean {
    const relative = path.relative(root, candidate)
    if (relative === '') return true
    return (
        relative !== '..' &&
        !relative.startsWith(`..${path.sep}`) &&
        !path.isAbsolute(relative)
    )
}

function segmentsOf(value: string): string[] {
    return value.split(SEPARATORS).filter(segment => segment !== '' && segment !== '.')
}

async function lstatOrUndefined(target: string) {
    try {
        return await fs.lstat(target)
    } catch (error) {
        if (isMissing(error)) return undefined
        throw error
    }
}

/**
 * `start`(이미 실제 경로)에서 한 단계씩 내려가며 심볼릭 링크와 `..`를 운영체제와 같은 순서로 풉니다.
 * 대상이 없는 링크도 링크가 가리키는 경로로 풀고, 존재하지 않는 나머지 구간은 그대로 붙입니다.
 */
async function walk(start: string, segments: string[], links: { count: number }): Promise<string> {
    let current = start

    for (const [index, segment] of segments.entries()) {
        if (segment === '..') {
            current = path.dirname(current)
            continue
        }

        const next = path.join(current, segment)
        const stat = await lstatOrUndefined(next)
        if (!stat) return path.join(next, ...segments.slice(index + 1))

        if (stat.isSymbolicLink()) {
            links.count += 1
            if (links.count > MAX_SYMLINKS) {
                throw new Error(`심볼릭 링크가 너무 많이 중첩되어 있습니다: ${next}`)
            }
            const target = path.resolve(current, await fs.readlink(next))
            current = await walk(path.parse(target).root, segmentsOf(target), links)
        } else {
            current = next
        }
    }
    return current
}

/**
 * 작업 디렉토리 밖으로 나가는 경로를 차단합니다.
 */
export class PathGuard {
    private constructor(readonly root: string) {}

    /** 루트 디렉토리가 없으면 만들고, 심볼릭 링크를 푼 경로로 고정합니다. */
    static async create(root: string): Promise<PathGuard> {
        await fs.mkdir(root, { recursive: true })
        return new PathGuard(await fs.realpath(root))
    }

    async resolve(requested: string): Promise<PathResolution> {
        // '/etc' 같은 입력도 root 아래 상대 경로로 취급합니다
        const canonical = await walk(this.root, segmentsOf(requested), { count: 0 })

        if (!isInside(this.root, canonical)) {
            return {
                ok: false,
                error: { kind: 'denied', requested, root: this.root }
            }
        }
        return { ok: true, path: canonical }
    }

    relative(absolute: string): string {
        return path.relative(this.root, absolute)
    }
}

export const FORBIDDEN_KEYWORDS = [
    'INSERT',
    'UPDATE',
    'DELETE',
    'DROP',
    'ALTER',
    'CREATE',
    'EXEC',
    'EXECUTE',
    'MERGE',
    'TRUNCATE'
] as const

export type QueryCheck =
    | { ok: true }
    | { ok: false; reason: 'not-select' }
    | { ok: false; reason: 'forbidden-keyword'; keyword: string }

/**
 * 자유 형식 쿼리를 실행하기 전에 읽기 전용인지 검사합니다.
 *
 * SQL 파서가 아니라 키워드 허용 목록입니다. 키워드는 단어 단위로 찾기 때문에
 * `updated_at` 같은 컬럼 이름은 `UPDATE`로 취급하지 않습니다.
 */
export function checkReadOnlyQuery(
    query: string,
    forbidden: readonly string[] = FORBIDDEN_KEYWORDS
): QueryCheck {
    const cleaned = query.trim().toUpperCase()
    if (!/^SELECT\b/.test(cleaned)) {
        return { ok: false, reason: 'not-select' }
    }

    const words = new Set(cleaned.match(/[A-Z0-9_]+/g) ?? [])
    const keyword = forbidden.find(word => words.has(word.toUpperCase()))
    if (keyword !== undefined) {
        return { ok: false, reason: 'forbidden-keyword', keyword }
    }
    return { ok: true }
}

import fs from 'fs/promises'
import { fileURLToPath } from 'url'
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js'
import { z } from 'zod'
import type { DatabaseConfig } from './config.js'
import type { DashboardSnapshot, ItLogSource, Row } from './it-log-source.js'
import { type AppLogger, silentLogger } from './logger.js'
import { errorResult, formatDateTime, textResult } from './mcp-content.js'
import { checkReadOnlyQuery } from './query-guard.js'

export const MAX_QUERY_ROWS = 50

const SEVERITY_ICONS: Record<string, string> = {
    낮음: '🟢',
    보통: '🟡',
    높음: '🟠',
    긴급: '🔴'
}

const SCHEMA_PATH = fileURLToPath(new URL('../data/it-log-schema.txt', import.meta.url))

const modeTag = (source: ItLogSource) => `[${source.mode} 모드]`

export function formatQueryRows(rows: Row[]): string {
    if (rows.length === 0) return '쿼리 결과가 없습니다.'

    const columns = Object.keys(rows[0] ?? {})
    const header = columns.join(' | ')
    const lines = [header, '-'.repeat(header.length)]
    for (const row of rows.slice(0, MAX_QUERY_ROWS)) {
        lines.push(columns.map(column => String(row[column] ?? '')).join(' | '))
    }
    if (rows.length > MAX_QUERY_ROWS) {
        lines.push(`\n... 외 ${rows.length - MAX_QUERY_ROWS}행 (총 ${rows.length}행)`)
    }
    return lines.join('\n')
}

export function formatDashboard(snapshot: DashboardSnapshot, now: Date): string[] {
    const { sites, cameras, events } = snapshot
    const activeSites = sites.filter(site => site.status === '운영중').length
    const normalCameras = cameras.filter(camera => camera.status === '정상').length
    const failedCameras = cameras.filter(camera => camera.status === '장애').length
    const urgentEvents = events.filter(
        event => event.severity === '높음' || event.severity === '긴급'
    ).length

    return [
        '╔══════════════════════════════════════╗',
        '║        IT-Log 시스템 대시보드          ║',
        `║  ${formatDateTime(now)}               ║`,
        '╠══════════════════════════════════════╣',
        `║  📍 현장: ${activeSites}/${sites.length}개 운영중                 ║`,
        `║  📷 카메라: ${normalCameras}/${cameras.length}대 정상              ║`,
        `║  ⚠️  장애 카메라: ${failedCameras}대                     ║`,
        `║  🚨 긴급 이벤트: ${urgentEvents}건                    ║`,
        '╚══════════════════════════════════════╝'
    ]
}

export interface DatabaseServerOptions {
    source: ItLogSource
    database: Pick<DatabaseConfig, 'server' | 'database'>
    logger?: AppLogger
    now?: () => Date
}

export function createDatabaseServer({
    source,
    database,
    logger = silentLogger,
    now = () => new Date()
}: DatabaseServerOptions): McpServer {
    const log = logger.getSubLogger({ name: 'database' })

    const server = new McpServer({
        name: 'it-log-database-server',
        version: '1.0.0'
    })

    // 조회 실패는 프로세스를 멈추지 않고 메시지로 돌려줍니다
    async function guarded(
        tool: string,
        run: () => Promise<CallToolResult>
    ): Promise<CallToolResult> {
        log.debug('도구 호출', tool)
        try {
            return await run()
        } catch (error) {
            log.error(`${tool} 실패`, error)
            return errorResult(
                `❌ 데이터 조회 오류: ${error instanceof Error ? error.message : String(error)}`
            )
        }
    }

    // 도구
    server.tool(
        'list_sites',
        '모든 현장(사이트) 목록을 조회합니다.',
        {
            status: z
                .string()
                .default('')
                .describe('상태 필터 (예: "운영중", "점검중"). 비우면 전체 조회.')
        },
        ({ status }) =>
            guarded('list_sites', async () => {
                const sites = await source.listSites(status || undefined)
                if (sites.length === 0) {
                    return textResult(
                        '조건에 맞는 현장이 없습니다.' + (status ? ` (필터: ${status})` : '')
                    )
                }

                const lines = [`📋 현장 목록${status ? ` (필터: ${status})` : ''}`, '']
                lines.push(
                    `${'ID'.padEnd(4)} ${'현장명'.padEnd(16)} ${'위치'.padEnd(16)} ${'상태'.padEnd(8)} 카메라`
                )
                lines.push('-'.repeat(60))
                for (const site of sites) {
                    lines.push(
                        `${String(site.site_id).padEnd(4)} ${site.site_name.padEnd(16)} ` +
                            `${site.location.padEnd(16)} ${site.status.padEnd(8)} ${site.camera_count}대`
                    )
                }
                lines.push(`\n총 ${sites.length}개 현장 ${modeTag(source)}`)
                return textResult(lines.join('\n'))
            })
    )

    server.tool(
        'list_cameras',
        '카메라 목록을 조회합니다.',
        {
            site_id: z.number().int().min(0).default(0).describe('현장 ID (0이면 전체 조회)'),
            status: z.string().default('').describe('상태 필터 (예: "정상", "점검중", "장애")')
        },
        ({ site_id, status }) =>
            guarded('list_cameras', async () => {
                const cameras = await source.listCameras({
                    siteId: site_id || undefined,
                    status: status || undefined
                })
                if (cameras.length === 0) {
                    const filters: string[] = []
                    if (site_id > 0) filters.push(`현장 ID: ${site_id}`)
                    if (status) filters.push(`상태: ${status}`)
                    return textResult(`조건에 맞는 카메라가 없습니다. (${filters.join(', ')})`)
                }

                const site = site_id > 0 ? await source.findSite(site_id) : undefined
                const lines = [`📷 카메라 목록${site ? ` - ${site.site_name}` : ''}`, '']
                lines.push(
                    `${'ID'.padEnd(10)} ${'이름'.padEnd(16)} ${'타입'.padEnd(8)} ${'상태'.padEnd(8)} IP`
                )
                lines.push('-'.repeat(65))
                for (const camera of cameras) {
                    lines.push(
                        `${camera.camera_id.padEnd(10)} ${camera.name.padEnd(16)} ` +
                            `${camera.type.padEnd(8)} ${camera.status.padEnd(8)} ${camera.ip}`
                    )
                }
                lines.push(`\n총 ${cameras.length}대 ${modeTag(source)}`)
                return textResult(lines.join('\n'))
            })
    )

    server.tool(
        'list_events',
        '이벤트(알람) 목록을 조회합니다.',
        {
            camera_id: z.string().default('').describe('카메라 ID 필터 (예: "CAM-001")'),
            severity: z.string().default('').describe('심각도 필터 (낮음, 보통, 높음, 긴급)'),
            limit: z.number().int().min(1).max(1000).default(20).describe('최대 조회 건수 (기본: 20)')
        },
        ({ camera_id, severity, limit }) =>
            guarded('list_events', async () => {
                const events = await source.listEvents({
                    cameraId: camera_id || undefined,
                    severity: severity || undefined,
                    limit
                })
                if (events.length === 0) {
                    return textResult('조건에 맞는 이벤트가 없습니다.')
                }

                const lines = ['🚨 이벤트 목록', '']
                lines.push(`${'심각도'.padEnd(4)} ${'카메라'.padEnd(10)} ${'유형'.padEnd(12)} 시간`)
                lines.push('-'.repeat(55))
                for (const event of events) {
                    const icon = SEVERITY_ICONS[event.severity] ?? '⚪'
                    lines.push(
                        `${icon} ${event.camera_id.padEnd(10)} ${event.event_type.padEnd(12)} ${event.timestamp}`
                    )
                }
                lines.push(`\n총 ${events.length}건 ${modeTag(source)}`)
                return textResult(lines.join('\n'))
            })
    )

    server.tool('dashboard', '전체 시스템 현황을 대시보드 형태로 보여줍니다.', () =>
        guarded('dashboard', async () => {
            const lines = formatDashboard(await source.snapshot(), now())
            return textResult([...lines, '', modeTag(source)].join('\n'))
        })
    )

    server.tool(
        'run_query',
        '읽기 전용 SQL 쿼리를 실행합니다. (SELECT만 허용)',
        {
            query: z.string().describe('실행할 SQL SELECT 쿼리')
        },
        ({ query }) =>
            guarded('run_query', async () => {
                const check = checkReadOnlyQuery(query)
                if (!check.ok) {
                    log.warn('쿼리 차단', query)
                    return errorResult(
                        check.reason === 'not-select'
                            ? '❌ 보안 정책: SELECT 쿼리만 실행할 수 있습니다.'
                            : `❌ 보안 정책: '${check.keyword}' 명령은 사용할 수 없습니다.`
                    )
                }

                const outcome = await source.runQuery(query)
                if (outcome.ok) return textResult(formatQueryRows(outcome.rows))
                if (outcome.error.kind === 'demo-mode') {
                    return errorResult(
                        '⚠️ 데모 모드에서는 커스텀 쿼리를 실행할 수 없습니다.\n' +
                            '실제 DB를 연결하려면 .env 파일에 MSSQL 접속 정보를 설정하세요.\n\n' +
                            '사용 가능한 도구:\n' +
                            '  - list_sites: 현장 목록 조회\n' +
                            '  - list_cameras: 카메라 목록 조회\n' +
                            '  - list_events: 이벤트 조회\n' +
                            '  - dashboard: 대시보드'
                    )
                }
                return errorResult(`❌ 쿼리 실행 오류: ${outcome.error.message}`)
            })
    )

    // 정적 리소스
    server.resource('db-status', 'db://status', uri => ({
        contents: [
            {
                uri: uri.href,
                text:
                    '데이터베이스 연결 상태\n' +
                    `  모드: ${source.mode}\n` +
                    `  서버: ${database.server}\n` +
                    `  데이터베이스: ${database.database}\n` +
                    `\n${source.mode === 'live' ? '✅ 실제 DB에 연결됨' : '⚠️ 데모 모드 (DB 미연결)'}`
            }
        ]
    }))

    server.resource('db-schema', 'db://schema', async uri => ({
        contents: [
            {
                uri: uri.href,
                text: await fs.readFile(SCHEMA_PATH, 'utf-8')
            }
        ]
    }))

    // 프롬프트
    server.prompt(
        'analyze_site',
        '특정 현장의 상태를 분석하는 프롬프트입니다.',
        { site_name: z.string() },
        ({ site_name }) => ({
            messages: [
                {
                    role: 'user',
                    content: {
                        type: 'text',
                        text:
                            `'${site_name}' 현장의 현재 상태를 분석해주세요.\n\n` +
                            `다음 단계로 진행해주세요:\n` +
                            `1. list_sites로 현장 기본 정보 확인\n` +
                            `2. list_cameras로 해당 현장 카메라 상태 확인\n` +
                            `3. list_events로 최근 이벤트 확인\n` +
                            `4. 종합 분석 및 조치 사항 보고`
                    }
                }
            ]
        })
    )

    return server
}

import fs from 'fs/promises'
import { fileURLToPath } from 'url'
import mssql, { type config as MssqlConfig } from 'mssql'
import { z } from 'zod'
import type { DatabaseConfig } from './config.js'
import { formatDateTime } from './mcp-content.js'

export const SiteSchema = z.object({
    site_id: z.number().int(),
    site_name: z.string(),
    location: z.string(),
    status: z.string(),
    camera_count: z.number().int()
})
export const CameraSchema = z.object({
    camera_id: z.string(),
    site_id: z.number().int(),
    name: z.string(),
    type: z.string(),
    status: z.string(),
    ip: z.string()
})
// DATETIME 컬럼은 드라이버에서 Date로 넘어옵니다
export const EventSchema = z.object({
    event_id: z.number().int(),
    camera_id: z.string(),
    event_type: z.string(),
    timestamp: z
        .union([z.string(), z.date()])
        .transform(value => (value instanceof Date ? formatDateTime(value) : value)),
    severity: z.string()
})
const DemoDataSchema = z.object({
    sites: z.array(SiteSchema),
    cameras: z.array(CameraSchema),
    events: z.array(EventSchema)
})

export type Site = z.infer<typeof SiteSchema>
export type Camera = z.infer<typeof CameraSchema>
export type ItEvent = z.infer<typeof EventSchema>
export type DemoData = z.infer<typeof DemoDataSchema>

export type Row = Record<string, unknown>
export type QueryParams = Record<string, string | number | boolean>

export interface CameraFilter {
    siteId?: number
    status?: string
}

export interface EventFilter {
    cameraId?: string
    severity?: string
    limit: number
}

export interface DashboardSnapshot {
    sites: Site[]
    cameras: Camera[]
    events: ItEvent[]
}

export type QueryOutcome =
    | { ok: true; rows: Row[] }
    | { ok: false; error: { kind: 'demo-mode' } | { kind: 'execution-error'; message: string } }

export interface ItLogSource {
    readonly mode: 'demo' | 'live'
    listSites(status?: string): Promise<Site[]>
    findSite(siteId: number): Promise<Site | undefined>
    listCameras(filter: CameraFilter): Promise<Camera[]>
    listEvents(filter: EventFilter): Promise<ItEvent[]>
    snapshot(): Promise<DashboardSnapshot>
    runQuery(query: string): Promise<QueryOutcome>
}

/**
 * 이름 있는 자리표시자(`@name`)가 들어간 쿼리를 실행합니다.
 * 값은 항상 파라미터로 바인딩하고 쿼리 문자열에 끼워 넣지 않습니다.
 */
export interface QueryExecutor {
    execute(query: string, params?: QueryParams): Promise<Row[]>
}

export class MssqlQueryExecutor implements QueryExecutor {
    constructor(private readonly config: MssqlConfig) {}

    // 호출마다 연결을 열고 닫습니다
    async execute(query: string, params: QueryParams = {}): Promise<Row[]> {
        const pool = new mssql.ConnectionPool(this.config)
        await pool.connect()
        try {
            const request = pool.request()
            for (const [name, value] of Object.entries(params)) {
                request.input(name, value)
            }
            const result = await request.query<Row>(query)
            return [...result.recordset]
        } finally {
            await pool.close()
        }
    }
}

export function toMssqlConfig(config: DatabaseConfig): MssqlConfig {
    return {
        server: config.server,
        port: config.port,
        database: config.database,
        user: config.username,
        password: config.password,
        options: {
            encrypt: true,
            trustServerCertificate: config.trustServerCertificate
        }
    }
}

const DEMO_DATA_PATH = fileURLToPath(
    new URL('../data/it-log-demo.json', import.meta.url)
)

export async function loadDemoData(file = DEMO_DATA_PATH): Promise<DemoData> {
    const raw = await fs.readFile(file, 'utf-8')
    return DemoDataSchema.parse(JSON.parse(raw))
}

export class DemoItLogSource implements ItLogSource {
    readonly mode = 'demo'

    constructor(private readonly data: DemoData) {}

    static async load(file?: string): Promise<DemoItLogSource> {
        return new DemoItLogSource(await loadDemoData(file))
    }

    async listSites(status?: string): Promise<Site[]> {
        return this.data.sites.filter(site => !status || site.status === status)
    }

    async findSite(siteId: number): Promise<Site | undefined> {
        return this.data.sites.find(site => site.site_id === siteId)
    }

    async listCameras({ siteId, status }: CameraFilter): Promise<Camera[]> {
        return this.data.cameras.filter(
            camera =>
                (!siteId || camera.site_id === siteId) &&
                (!status || camera.status === status)
        )
    }

    async listEvents({ cameraId, severity, limit }: EventFilter): Promise<ItEvent[]> {
        return this.data.events
            .filter(
                event =>
                    (!cameraId || event.camera_id === cameraId) &&
                    (!severity || event.severity === severity)
            )
            .slice(0, limit)
    }

    async snapshot(): Promise<DashboardSnapshot> {
        return {
            sites: this.data.sites,
            cameras: this.data.cameras,
            events: this.data.events
        }
    }

    async runQuery(_query: string): Promise<QueryOutcome> {
        return { ok: false, error: { kind: 'demo-mode' } }
    }
}

export class LiveItLogSource implements ItLogSource {
    readonly mode = 'live'

    constructor(private readonly executor: QueryExecutor) {}

    async listSites(status?: string): Promise<Site[]> {
        let query = 'SELECT site_id, site_name, location, status, camera_count FROM Sites'
        const params: QueryParams = {}
        if (status) {
            query += ' WHERE status = @status'
            params.status = status
        }
        return z.array(SiteSchema).parse(await this.executor.execute(query, params))
    }

    async findSite(siteId: number): Promise<Site | undefined> {
        const rows = await this.executor.execute(
            'SELECT site_id, site_name, location, status, camera_count FROM Sites WHERE site_id = @site_id',
            { site_id: siteId }
        )
        return rows.length > 0 ? SiteSchema.parse(rows[0]) : undefined
    }

    async listCameras({ siteId, status }: CameraFilter): Promise<Camera[]> {
        let query = 'SELECT camera_id, site_id, name, type, status, ip FROM Cameras WHERE 1=1'
        const params: QueryParams = {}
        if (siteId) {
            query += ' AND site_id = @site_id'
            params.site_id = siteId
        }
        if (status) {
            query += ' AND status = @status'
            params.status = status
        }
        return z.array(CameraSchema).parse(await this.executor.execute(query, params))
    }

    async listEvents({ cameraId, severity, limit }: EventFilter): Promise<ItEvent[]> {
        let query =
            'SELECT TOP (@limit) event_id, camera_id, event_type, timestamp, severity FROM Events WHERE 1=1'
        const params: QueryParams = { limit }
        if (cameraId) {
            query += ' AND camera_id = @camera_id'
            params.camera_id = cameraId
        }
        if (severity) {
            query += ' AND severity = @severity'
            params.severity = severity
        }
        query += ' ORDER BY timestamp DESC'
        return z.array(EventSchema).parse(await this.executor.execute(query, params))
    }

    async snapshot(): Promise<DashboardSnapshot> {
        const [sites, cameras, events] = await Promise.all([
            this.listSites(),
            this.listCameras({}),
            this.listEvents({ limit: 10 })
        ])
        return { sites, cameras, events }
    }

    async runQuery(query: string): Promise<QueryOutcome> {
        try {
            return { ok: true, rows: await this.executor.execute(query) }
        } catch (error) {
            return {
                ok: false,
                error: {
                    kind: 'execution-error',
                    message: error instanceof Error ? error.message : String(error)
                }
            }
        }
    }
}

/** 비밀번호가 설정되어 있으면 실제 DB, 아니면 데모 데이터를 사용합니다. */
export async function selectItLogSource(config: DatabaseConfig): Promise<ItLogSource> {
    if (config.password) {
        return new LiveItLogSource(new MssqlQueryExecutor(toMssqlConfig(config)))
    }
    return DemoItLogSource.load()
}

import os from 'os'
import path from 'path'
import { fileURLToPath } from 'url'
import { z } from 'zod'

// 빈 문자열은 설정하지 않은 것으로 취급
const optionalString = z
    .string()
    .optional()
    .transform(value => {
        const trimmed = value?.trim()
        return trimmed ? trimmed : undefined
    })

const LOG_LEVELS = ['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal']

const LogLevelSchema = optionalString.transform((value, ctx) => {
    if (value === undefined) return 3
    const numeric = Number(value)
    if (Number.isInteger(numeric) && numeric >= 0 && numeric <= 6) {
        return numeric
    }
    const index = LOG_LEVELS.indexOf(value.toLowerCase())
    if (index === -1) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `알 수 없는 로그 레벨입니다: ${value}`
        })
        return z.NEVER
    }
    return index
})

const EnvSchema = z.object({
    OPENWEATHER_API_KEY: optionalString,
    OPENWEATHER_BASE_URL: optionalString.pipe(
        z.string().url().default('https://api.openweathermap.org/data/2.5')
    ),
    FILE_WORKSPACE: optionalString,
    MSSQL_SERVER: optionalString.pipe(z.string().default('localhost')),
    MSSQL_PORT: optionalString.pipe(
        z.coerce.number().int().min(1).max(65535).default(1433)
    ),
    MSSQL_DATABASE: optionalString.pipe(z.string().default('ITLog')),
    MSSQL_USERNAME: optionalString.pipe(z.string().default('sa')),
    MSSQL_PASSWORD: optionalString,
    MSSQL_TRUST_SERVER_CERTIFICATE: optionalString.pipe(
        z.enum(['true', 'false']).default('true')
    ),
    NOTES_DB_PATH: optionalString,
    LOG_LEVEL: LogLevelSchema,
    LOG_FORMAT: optionalString.pipe(
        z.enum(['pretty', 'json', 'hidden']).default('pretty')
    )
})

export interface WeatherConfig {
    apiKey?: string
    baseUrl: string
}

export interface DatabaseConfig {
    server: string
    port: number
    database: string
    username: string
    password?: string
    trustServerCertificate: boolean
}

export interface LoggingConfig {
    minLevel: number
    format: 'pretty' | 'json' | 'hidden'
}

export interface AppConfig {
    weather: WeatherConfig
    workspaceRoot: string
    database: DatabaseConfig
    notesDbPath: string
    logging: LoggingConfig
}

const PACKAGE_ROOT = path.resolve(
    path.dirname(fileURLToPath(import.meta.url)),
    '..'
)

function expandHome(value: string): string {
    if (value === '~') return os.homedir()
    if (value.startsWith('~/')) return path.join(os.homedir(), value.slice(2))
    return value
}

/**
 * 환경변수를 검증해서 서버 설정으로 변환합니다.
 * 잘못된 값이 있으면 ZodError를 던집니다.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.parse(env)

    return Object.freeze({
        weather: {
            apiKey: parsed.OPENWEATHER_API_KEY,
            baseUrl: parsed.OPENWEATHER_BASE_URL
        },
        workspaceRoot: path.resolve(
            expandHome(
                parsed.FILE_WORKSPACE ??
                    path.join(os.homedir(), 'mcp_workspace')
            )
        ),
        database: {
            server: parsed.MSSQL_SERVER,
            port: parsed.MSSQL_PORT,
            database: parsed.MSSQL_DATABASE,
            username: parsed.MSSQL_USERNAME,
            password: parsed.MSSQL_PASSWORD,
            trustServerCertificate:
                parsed.MSSQL_TRUST_SERVER_CERTIFICATE === 'true'
        },
        notesDbPath: path.resolve(
            expandHome(
                parsed.NOTES_DB_PATH ?? path.join(PACKAGE_ROOT, 'notes.db')
            )
        ),
        logging: {
            minLevel: parsed.LOG_LEVEL,
            format: parsed.LOG_FORMAT
        }
    })
}

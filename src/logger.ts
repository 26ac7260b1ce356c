import { type ILogObj, Logger } from 'tslog'
import type { LoggingConfig } from './config.js'

export type AppLogger = Logger<ILogObj>

const LOG_TEMPLATE =
    '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}}:{{ms}}\t{{logLevelName}}\t[{{name}}]\t'

function stringifyArg(arg: unknown): string {
    return typeof arg === 'string' ? arg : JSON.stringify(arg)
}

/**
 * 로거를 생성합니다.
 *
 * stdio 전송에서는 stdout이 JSON-RPC 메시지 전용이므로
 * 모든 로그는 stderr로 보냅니다.
 */
export function createLogger(
    options: Partial<LoggingConfig> & { name?: string } = {}
): AppLogger {
    const format = options.format ?? 'pretty'

    return new Logger<ILogObj>({
        name: options.name ?? 'mcp-tutorials',
        minLevel: options.minLevel ?? 3,
        type: format,
        hideLogPositionForProduction: format !== 'pretty',
        prettyLogTemplate: LOG_TEMPLATE,
        stylePrettyLogs: Boolean(process.stderr.isTTY),
        // tslog은 type과 상관없이 overwrite 전송을 호출하므로 hidden이면 넘기지 않습니다
        overwrite:
            format === 'hidden'
                ? undefined
                : {
                      transportFormatted: (logMetaMarkup, logArgs, logErrors) => {
                          const parts = [...logArgs.map(stringifyArg), ...logErrors]
                          process.stderr.write(`${logMetaMarkup}${parts.join(' ')}\n`)
                      },
                      transportJSON: json => {
                          process.stderr.write(`${JSON.stringify(json)}\n`)
                      }
                  }
    })
}

// 테스트나 라이브러리 사용 시 기본값 (출력 없음)
export const silentLogger: AppLogger = createLogger({ format: 'hidden' })

#!/usr/bin/env node
import 'dotenv/config'
import type { Server } from '@modelcontextprotocol/sdk/server/index.js'
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { Command, InvalidArgumentError } from 'commander'
import { type AppConfig, loadConfig } from './config.js'
import { createDatabaseServer } from './database-server.js'
import { FileManager } from './file-manager.js'
import { createFileManagerServer } from './file-manager-server.js'
import { createHelloServer } from './hello-server.js'
import { selectItLogSource } from './it-log-source.js'
import { type AppLogger, createLogger } from './logger.js'
import { NoteStore } from './note-store.js'
import { createNotesServer } from './notes-server.js'
import { PathGuard } from './path-guard.js'
import { createWeatherServer } from './weather-server.js'
import { selectWeatherSource } from './weather-source.js'

const SERVER_NAMES = ['hello', 'weather', 'files', 'database', 'notes'] as const
type ServerName = (typeof SERVER_NAMES)[number]

function parseServerName(value: string): ServerName {
    const name = SERVER_NAMES.find(candidate => candidate === value)
    if (!name) {
        throw new InvalidArgumentError(`사용 가능한 서버: ${SERVER_NAMES.join(', ')}`)
    }
    return name
}

async function buildServer(
    name: ServerName,
    config: AppConfig,
    logger: AppLogger
): Promise<{ server: McpServer | Server; close?: () => void }> {
    switch (name) {
        case 'hello':
            return { server: createHelloServer({ logger }) }
        case 'weather': {
            const source = await selectWeatherSource(config.weather)
            logger.info(`날씨 서버 (${source.mode} 모드)`)
            return { server: createWeatherServer({ source, logger }) }
        }
        case 'files': {
            const guard = await PathGuard.create(config.workspaceRoot)
            logger.info(`작업 디렉토리: ${guard.root}`)
            return {
                server: createFileManagerServer({ files: new FileManager(guard), logger })
            }
        }
        case 'database': {
            const source = await selectItLogSource(config.database)
            logger.info(`IT-Log 데이터베이스 서버 (${source.mode} 모드)`)
            return {
                server: createDatabaseServer({ source, database: config.database, logger })
            }
        }
        case 'notes': {
            const store = new NoteStore(config.notesDbPath)
            logger.info(`메모 데이터베이스: ${config.notesDbPath}`)
            return { server: createNotesServer({ store, logger }), close: () => store.close() }
        }
    }
}

const program = new Command()
    .name('mcp-tutorials')
    .description('stdio로 MCP 튜토리얼 서버를 실행합니다.')
    .argument('<server>', SERVER_NAMES.join(' | '), parseServerName)
    .action(async (name: ServerName) => {
        const config = loadConfig()
        const logger = createLogger({ ...config.logging, name })
        const { server, close } = await buildServer(name, config, logger)

        const transport = new StdioServerTransport()
        await server.connect(transport)
        logger.info(`${name} 서버가 stdio로 연결되었습니다.`)

        process.on('SIGINT', () => {
            logger.info('종료합니다...')
            close?.()
            server
                .close()
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    logger.error('종료 중 오류', error)
                    process.exit(1)
                })
        })
    })

program.parseAsync(process.argv).catch((error: unknown) => {
    console.error('서버를 시작하지 못했습니다:', error)
    process.exit(1)
})

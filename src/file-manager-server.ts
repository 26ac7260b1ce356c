import { Server } from '@modelcontextprotocol/sdk/server/index.js'
import {
    CallToolRequestSchema,
    type CallToolResult,
    GetPromptRequestSchema,
    ListPromptsRequestSchema,
    ListResourcesRequestSchema,
    ListToolsRequestSchema,
    ReadResourceRequestSchema,
    type Tool
} from '@modelcontextprotocol/sdk/types.js'
import { z } from 'zod'
import { zodToJsonSchema } from 'zod-to-json-schema'
import type {
    FileEntry,
    FileError,
    FileInfo,
    FileManager,
    FileResult,
    SearchSummary
} from './file-manager.js'
import { type AppLogger, silentLogger } from './logger.js'
import { errorResult, formatBytes, formatDateTime, textResult } from './mcp-content.js'

// 도구 입력 스키마 정의
const ListFilesSchema = z.object({
    directory: z
        .string()
        .default('')
        .describe('탐색할 하위 디렉토리 (기본: 작업 디렉토리 루트)'),
    pattern: z
        .string()
        .default('*')
        .describe('파일 필터 패턴 (예: "*.txt", "*.py")')
})
const ReadFileSchema = z.object({
    file_path: z.string().describe('읽을 파일 경로 (작업 디렉토리 기준 상대 경로)'),
    encoding: z.string().default('utf-8').describe('파일 인코딩 (기본: utf-8)')
})
const WriteFileSchema = z.object({
    file_path: z.string().describe('저장할 파일 경로 (작업 디렉토리 기준 상대 경로)'),
    content: z.string().describe('파일에 쓸 내용'),
    overwrite: z.boolean().default(false).describe('기존 파일 덮어쓰기 여부')
})
const SearchFilesSchema = z.object({
    keyword: z.string().describe('검색할 키워드'),
    file_pattern: z.string().default('*.txt').describe('검색할 파일 패턴'),
    directory: z.string().default('').describe('검색할 디렉토리 (기본: 전체)')
})
const FileInfoSchema = z.object({
    file_path: z.string().describe('정보를 확인할 파일/폴더 경로')
})
const CreateDirectorySchema = z.object({
    dir_path: z.string().describe('생성할 디렉토리 경로 (작업 디렉토리 기준 상대 경로)')
})
const AnalyzeProjectPromptSchema = z.object({
    project_name: z.string().describe('분석할 프로젝트 이름')
})

// 도구 이름 enum
export enum FileToolName {
    LIST_FILES = 'list_files',
    READ_FILE = 'read_file',
    WRITE_FILE = 'write_file',
    SEARCH_FILES = 'search_files',
    GET_FILE_INFO = 'get_file_info',
    CREATE_DIRECTORY = 'create_directory'
}
// 프롬프트 이름 enum
enum PromptName {
    ANALYZE_PROJECT = 'analyze_project'
}

function isFileToolName(name: string): name is FileToolName {
    return Object.values(FileToolName).some(tool => tool === name)
}

const WORKSPACE_URI = 'files://workspace'

const TOOLS: Tool[] = [
    {
        name: FileToolName.LIST_FILES,
        description: '작업 디렉토리의 파일과 폴더를 나열합니다.',
        inputSchema: zodToJsonSchema(ListFilesSchema) as Tool['inputSchema']
    },
    {
        name: FileToolName.READ_FILE,
        description: '파일의 내용을 읽습니다.',
        inputSchema: zodToJsonSchema(ReadFileSchema) as Tool['inputSchema']
    },
    {
        name: FileToolName.WRITE_FILE,
        description: '파일에 내용을 씁니다.',
        inputSchema: zodToJsonSchema(WriteFileSchema) as Tool['inputSchema']
    },
    {
        name: FileToolName.SEARCH_FILES,
        description: '파일 내용에서 키워드를 검색합니다.',
        inputSchema: zodToJsonSchema(SearchFilesSchema) as Tool['inputSchema']
    },
    {
        name: FileToolName.GET_FILE_INFO,
        description: '파일 또는 폴더의 상세 정보를 반환합니다.',
        inputSchema: zodToJsonSchema(FileInfoSchema) as Tool['inputSchema']
    },
    {
        name: FileToolName.CREATE_DIRECTORY,
        description: '새 디렉토리를 생성합니다.',
        inputSchema: zodToJsonSchema(CreateDirectorySchema) as Tool['inputSchema']
    }
]

const rootLabel = (directory: string) => directory || '(루트)'

export function describeFileError(error: FileError, root: string): string {
    switch (error.kind) {
        case 'denied':
            return (
                `접근 거부: '${error.requested}'는 작업 디렉토리 밖에 있습니다.\n` +
                `작업 디렉토리: ${root}`
            )
        case 'not-found':
            return `경로가 존재하지 않습니다: ${rootLabel(error.path)}`
        case 'not-directory':
            return `'${error.path}'는 디렉토리가 아닙니다.`
        case 'not-file':
            return `'${error.path}'는 파일이 아닙니다.`
        case 'binary':
            return `'${error.path}'는 바이너리 파일이므로 텍스트로 읽을 수 없습니다.`
        case 'decode-error':
            return `인코딩 오류: '${error.encoding}'으로 읽을 수 없습니다. 다른 인코딩을 시도해보세요.`
        case 'exists':
            return `이미 존재합니다: ${error.path}`
    }
}

function formatEntries(directory: string, pattern: string, entries: FileEntry[]): string {
    if (entries.length === 0) {
        return `'${rootLabel(directory)}' 디렉토리에 '${pattern}' 패턴과 일치하는 항목이 없습니다.`
    }
    const lines = [`📁 ${directory || '작업 디렉토리'} 내용 (패턴: ${pattern}):`, '']
    for (const entry of entries) {
        lines.push(
            entry.isDirectory
                ? `  📂 ${entry.path}/`
                : `  📄 ${entry.path} (${formatBytes(entry.size)})`
        )
    }
    lines.push(`\n총 ${entries.length}개 항목`)
    return lines.join('\n')
}

function formatSearch(
    keyword: string,
    pattern: string,
    directory: string,
    summary: SearchSummary
): string {
    const scope = `검색 범위: ${directory || '전체'}, 패턴: ${pattern}`
    if (summary.matches.length === 0) {
        return (
            `'${keyword}'를 포함하는 파일을 찾지 못했습니다.\n${scope}\n` +
            `검색한 파일 수: ${summary.filesSearched}`
        )
    }
    const header = `🔍 '${keyword}' 검색 결과 (${summary.matches.length}건)\n${scope}\n${'='.repeat(40)}`
    const rows = summary.matches.map(
        match => `  📄 ${match.path}:${match.line}: ${match.text}`
    )
    return [header, ...rows].join('\n')
}

function formatInfo(filePath: string, info: FileInfo): string {
    const dates =
        `  수정일: ${formatDateTime(info.modified)}\n` +
        `  생성일: ${formatDateTime(info.created)}`
    if (info.type === 'file') {
        return (
            `📄 파일 정보: ${filePath}\n` +
            `  유형: 파일\n` +
            `  확장자: ${info.extension || '없음'}\n` +
            `  크기: ${info.size.toLocaleString('en-US')} bytes\n` +
            dates
        )
    }
    return (
        `📂 폴더 정보: ${filePath}\n` +
        `  유형: 디렉토리\n` +
        `  하위 폴더: ${info.directories}개\n` +
        `  파일: ${info.files}개\n` +
        dates
    )
}

export interface FileManagerServerOptions {
    files: FileManager
    logger?: AppLogger
}

export function createFileManagerServer({
    files,
    logger = silentLogger
}: FileManagerServerOptions): Server {
    const log = logger.getSubLogger({ name: 'files' })

    // 서버 인스턴스 생성
    const server = new Server(
        {
            name: 'file-manager-server',
            version: '1.0.0'
        },
        {
            capabilities: {
                prompts: {},
                resources: {},
                tools: {}
            }
        }
    )

    function render<T>(result: FileResult<T>, format: (value: T) => string): CallToolResult {
        if (result.ok) return textResult(format(result.value))
        if (result.error.kind === 'denied') {
            log.warn('작업 디렉토리 밖 접근 차단', result.error.requested)
        }
        return errorResult(describeFileError(result.error, files.root))
    }

    async function callTool(name: FileToolName, args: unknown): Promise<CallToolResult> {
        switch (name) {
            case FileToolName.LIST_FILES: {
                const { directory, pattern } = ListFilesSchema.parse(args ?? {})
                return render(await files.listFiles(directory, pattern), entries =>
                    formatEntries(directory, pattern, entries)
                )
            }
            case FileToolName.READ_FILE: {
                const { file_path, encoding } = ReadFileSchema.parse(args ?? {})
                return render(
                    await files.readFile(file_path, encoding),
                    ({ content, lines }) =>
                        `📄 ${file_path} (${lines}줄)\n${'='.repeat(40)}\n${content}`
                )
            }
            case FileToolName.WRITE_FILE: {
                const { file_path, content, overwrite } = WriteFileSchema.parse(args ?? {})
                const result = await files.writeFile(file_path, content, overwrite)
                if (!result.ok && result.error.kind === 'exists') {
                    return errorResult(
                        `파일이 이미 존재합니다: ${file_path}\n` +
                            `덮어쓰려면 overwrite=true를 설정하세요.`
                    )
                }
                return render(
                    result,
                    ({ bytes, lines }) =>
                        `✅ 파일이 저장되었습니다: ${file_path}\n` +
                        `📊 크기: ${bytes} bytes, ${lines}줄`
                )
            }
            case FileToolName.SEARCH_FILES: {
                const { keyword, file_pattern, directory } = SearchFilesSchema.parse(args ?? {})
                return render(
                    await files.searchFiles(keyword, file_pattern, directory),
                    summary => formatSearch(keyword, file_pattern, directory, summary)
                )
            }
            case FileToolName.GET_FILE_INFO: {
                const { file_path } = FileInfoSchema.parse(args ?? {})
                return render(await files.getFileInfo(file_path), info =>
                    formatInfo(file_path, info)
                )
            }
            case FileToolName.CREATE_DIRECTORY: {
                const { dir_path } = CreateDirectorySchema.parse(args ?? {})
                return render(
                    await files.createDirectory(dir_path),
                    () => `✅ 디렉토리가 생성되었습니다: ${dir_path}`
                )
            }
        }
    }

    server.setRequestHandler(ListToolsRequestSchema, async () => {
        return { tools: TOOLS }
    })

    server.setRequestHandler(CallToolRequestSchema, async request => {
        const { name, arguments: args } = request.params
        if (!isFileToolName(name)) {
            throw new Error(`Unknown tool: ${name}`)
        }
        log.debug('도구 호출', name)
        try {
            return await callTool(name, args)
        } catch (error) {
            if (error instanceof z.ZodError) {
                return errorResult(
                    `잘못된 입력입니다: ${error.issues
                        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
                        .join(', ')}`
                )
            }
            log.error('파일 작업 실패', error)
            return errorResult(
                `파일 작업 중 오류가 발생했습니다: ${
                    error instanceof Error ? error.message : String(error)
                }`
            )
        }
    })

    // 프롬프트 목록 핸들러
    server.setRequestHandler(ListPromptsRequestSchema, async () => {
        return {
            prompts: [
                {
                    name: PromptName.ANALYZE_PROJECT,
                    description: '프로젝트 구조 분석을 요청하는 프롬프트입니다.',
                    arguments: [
                        {
                            name: 'project_name',
                            description: '분석할 프로젝트 이름',
                            required: true
                        }
                    ]
                }
            ]
        }
    })
    // 프롬프트 메시지 핸들러
    server.setRequestHandler(GetPromptRequestSchema, async request => {
        const { name, arguments: args } = request.params
        if (name === PromptName.ANALYZE_PROJECT) {
            const { project_name } = AnalyzeProjectPromptSchema.parse(args ?? {})
            return {
                messages: [
                    {
                        role: 'user',
                        content: {
                            type: 'text',
                            text:
                                `'${project_name}' 프로젝트의 파일 구조를 분석해주세요.\n\n` +
                                `다음 순서로 진행해주세요:\n` +
                                `1. list_files로 전체 파일 목록 확인\n` +
                                `2. 주요 파일의 내용을 read_file로 읽기\n` +
                                `3. 프로젝트 구조와 목적을 설명\n` +
                                `4. 개선 제안`
                        }
                    }
                ]
            }
        }
        throw new Error(`Unknown prompt: ${name}`)
    })

    // 정적 리소스(workspace) 핸들러
    server.setRequestHandler(ListResourcesRequestSchema, async () => {
        return {
            resources: [
                {
                    uri: WORKSPACE_URI,
                    name: 'workspace',
                    description: '현재 작업 디렉토리 정보',
                    mimeType: 'text/plain'
                }
            ]
        }
    })
    server.setRequestHandler(ReadResourceRequestSchema, async request => {
        const uri = request.params.uri
        if (uri === WORKSPACE_URI) {
            const summary = await files.summarizeWorkspace()
            return {
                contents: [
                    {
                        uri,
                        mimeType: 'text/plain',
                        text:
                            `작업 디렉토리: ${summary.root}\n` +
                            `하위 폴더: ${summary.directories}개\n` +
                            `파일: ${summary.files}개\n` +
                            `총 항목: ${summary.total}개`
                    }
                ]
            }
        }
        throw new Error(`Unknown resource: ${uri}`)
    })

    return server
}

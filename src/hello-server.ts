import {
    McpServer,
    ResourceTemplate
} from '@modelcontextprotocol/sdk/server/mcp.js'
import { z } from 'zod'
import { type AppLogger, silentLogger } from './logger.js'
import { textResult } from './mcp-content.js'

const GREETINGS: Record<string, (name: string) => string> = {
    ko: name => `안녕하세요, ${name}님! 반갑습니다!`,
    en: name => `Hello, ${name}! Nice to meet you!`,
    ja: name => `こんにちは、${name}さん！はじめまして！`
}

const HELP_TOPICS: Record<string, string> = {
    tools: '도구(Tool)는 AI가 실행할 수 있는 함수입니다. server.tool()로 등록합니다.',
    resources:
        '리소스(Resource)는 AI가 읽을 수 있는 데이터입니다. URI로 접근하며 server.resource()로 등록합니다.',
    prompts: '프롬프트(Prompt)는 재사용 가능한 메시지 템플릿입니다. server.prompt()로 등록합니다.'
}

export function greet(name: string, language: string): string {
    const greeting = GREETINGS[language] ?? GREETINGS.ko
    return greeting(name)
}

export function helpFor(topic: string): string {
    return (
        HELP_TOPICS[topic] ??
        `'${topic}'에 대한 도움말이 없습니다. 사용 가능한 주제: ${Object.keys(HELP_TOPICS).join(', ')}`
    )
}

export function createHelloServer({ logger = silentLogger }: { logger?: AppLogger } = {}): McpServer {
    const log = logger.getSubLogger({ name: 'hello' })

    const server = new McpServer({
        name: 'hello-mcp-server',
        version: '1.0.0'
    })

    // 도구
    server.tool(
        'add',
        '두 숫자를 더합니다.',
        {
            a: z.number().int().describe('첫 번째 숫자'),
            b: z.number().int().describe('두 번째 숫자')
        },
        ({ a, b }) => textResult(String(a + b))
    )

    server.tool(
        'multiply',
        '두 숫자를 곱합니다.',
        {
            a: z.number().describe('첫 번째 숫자'),
            b: z.number().describe('두 번째 숫자')
        },
        ({ a, b }) => textResult(String(a * b))
    )

    server.tool(
        'greet',
        '사용자에게 인사합니다.',
        {
            name: z.string().describe('인사할 사람의 이름'),
            language: z
                .string()
                .default('ko')
                .describe('인사 언어 (ko: 한국어, en: 영어, ja: 일본어)')
        },
        ({ name, language }) => {
            log.debug('인사', name, language)
            return textResult(greet(name, language))
        }
    )

    server.tool(
        'reverse_string',
        '문자열을 뒤집습니다.',
        { text: z.string().describe('뒤집을 문자열') },
        ({ text }) => textResult([...text].reverse().join(''))
    )

    // 정적 리소스
    server.resource('server-info', 'hello://info', uri => ({
        contents: [
            {
                uri: uri.href,
                text:
                    '서버 이름: Hello MCP Server\n' +
                    '버전: 1.0.0\n' +
                    '설명: MCP 학습을 위한 첫 번째 서버입니다.\n' +
                    '제공 도구: add, multiply, greet, reverse_string'
            }
        ]
    }))

    // 동적 리소스
    server.resource(
        'help',
        new ResourceTemplate('hello://help/{topic}', { list: undefined }),
        (uri, { topic }) => ({
            contents: [
                {
                    uri: uri.href,
                    text: helpFor(Array.isArray(topic) ? topic.join(',') : topic ?? '')
                }
            ]
        })
    )

    // 프롬프트
    server.prompt(
        'explain_code',
        '코드를 설명해달라는 프롬프트를 생성합니다.',
        { code: z.string(), language: z.string().optional() },
        ({ code, language = 'python' }) => ({
            messages: [
                {
                    role: 'user',
                    content: {
                        type: 'text',
                        text:
                            `다음 ${language} 코드를 초보자도 이해할 수 있게 설명해주세요.\n` +
                            `각 줄이 무엇을 하는지 한국어로 상세히 설명해주세요.\n\n` +
                            `\`\`\`${language}\n${code}\n\`\`\``
                    }
                }
            ]
        })
    )

    server.prompt(
        'debug_error',
        '에러 디버깅을 위한 프롬프트를 생성합니다.',
        { error_message: z.string() },
        ({ error_message }) => ({
            messages: [
                {
                    role: 'user',
                    content: {
                        type: 'text',
                        text:
                            `다음 에러 메시지를 분석하고 해결 방법을 알려주세요.\n\n` +
                            `에러 메시지:\n${error_message}\n\n` +
                            `다음 형식으로 답변해주세요:\n` +
                            `1. 에러 원인\n2. 해결 방법\n3. 예방 방법`
                    }
                }
            ]
        })
    )

    return server
}

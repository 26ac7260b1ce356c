import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js'
import type { Server } from '@modelcontextprotocol/sdk/server/index.js'
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js'

// 테스트 전용: 서버와 클라이언트를 메모리 전송으로 연결합니다
export async function connectClient(server: McpServer | Server): Promise<Client> {
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair()
    const client = new Client({ name: 'test-mcp-client', version: '1.0.0' }, { capabilities: {} })

    await server.connect(serverTransport)
    await client.connect(clientTransport)
    return client
}

export async function callText(
    client: Client,
    name: string,
    args: Record<string, unknown> = {}
): Promise<{ text: string; isError: boolean }> {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }))
    const first = result.content[0]
    if (first?.type !== 'text') {
        throw new Error(`${name}: 텍스트 응답이 아닙니다`)
    }
    return { text: first.text, isError: result.isError === true }
}

export async function readText(client: Client, uri: string): Promise<string> {
    const { contents } = await client.readResource({ uri })
    const first = contents[0]
    if (!first || !('text' in first) || typeof first.text !== 'string') {
        throw new Error(`${uri}: 텍스트 리소스가 아닙니다`)
    }
    return first.text
}

export async function promptText(
    client: Client,
    name: string,
    args: Record<string, string> = {}
): Promise<string> {
    const { messages } = await client.getPrompt({ name, arguments: args })
    const content = messages[0]?.content
    if (content?.type !== 'text') {
        throw new Error(`${name}: 텍스트 프롬프트가 아닙니다`)
    }
    return content.text
}

// 입력 검증 실패는 도구 오류 결과나 프로토콜 오류 중 하나로 돌아옵니다
export async function isRejected(
    client: Client,
    name: string,
    args: Record<string, unknown>
): Promise<boolean> {
    try {
        const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }))
        return result.isError === true
    } catch {
        return true
    }
}

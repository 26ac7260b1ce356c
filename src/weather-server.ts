import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { z } from 'zod'
import { type AppLogger, silentLogger } from './logger.js'
import { errorResult, formatDateTime, textResult } from './mcp-content.js'
import type { WeatherError, WeatherReport, WeatherSource } from './weather-source.js'

export interface OutfitAdvice {
    outfit: string
    tip: string
}

const OUTFIT_BANDS: Array<{ min: number } & OutfitAdvice> = [
    { min: 28, outfit: '반팔, 반바지, 샌들', tip: '자외선 차단제를 꼭 바르세요!' },
    { min: 23, outfit: '반팔, 얇은 긴바지', tip: '가벼운 겉옷을 챙기면 좋아요.' },
    { min: 17, outfit: '긴팔, 가디건 또는 얇은 자켓', tip: '일교차가 클 수 있으니 겉옷 필수!' },
    { min: 12, outfit: '자켓, 니트, 긴바지', tip: '바람이 불면 쌀쌀할 수 있어요.' },
    { min: 5, outfit: '코트, 두꺼운 니트, 목도리', tip: '보온에 신경 쓰세요.' },
    { min: -5, outfit: '패딩, 기모 안감, 장갑, 목도리', tip: '동상에 주의하세요!' }
]

export function recommendOutfit(temperature: number): OutfitAdvice {
    const band = OUTFIT_BANDS.find(({ min }) => temperature >= min)
    if (band) return { outfit: band.outfit, tip: band.tip }
    return { outfit: '롱패딩, 방한 장비 완전 무장', tip: '가급적 외출을 자제하세요.' }
}

export function formatReport(report: WeatherReport, demo: boolean, now: Date): string {
    if (demo) {
        return (
            `📍 ${report.city} 현재 날씨 (데모 데이터)\n` +
            `🌡️ 온도: ${report.temperature}°C\n` +
            `💧 습도: ${report.humidity}%\n` +
            `🌤️ 상태: ${report.description}\n` +
            `💨 풍속: ${report.windSpeed}m/s\n` +
            `\n⚠️ 데모 모드입니다. 실제 데이터를 보려면 OPENWEATHER_API_KEY를 설정하세요.`
        )
    }
    const feelsLike = report.feelsLike === undefined ? '' : ` (체감 ${report.feelsLike}°C)`
    return (
        `📍 ${report.city} 현재 날씨\n` +
        `🌡️ 온도: ${report.temperature}°C${feelsLike}\n` +
        `💧 습도: ${report.humidity}%\n` +
        `🌤️ 상태: ${report.description}\n` +
        `💨 풍속: ${report.windSpeed}m/s\n` +
        `🕐 조회 시각: ${formatDateTime(now).slice(0, 16)}`
    )
}

export function describeWeatherError(error: WeatherError): string {
    switch (error.kind) {
        case 'no-demo-data':
            return (
                `'${error.city}'의 데모 데이터가 없습니다. 사용 가능: ${error.available.join(', ')}\n` +
                `실제 도시 검색은 OPENWEATHER_API_KEY를 설정하세요.`
            )
        case 'city-not-found':
            return `'${error.city}' 도시를 찾을 수 없습니다. 영어 도시명을 시도해보세요.`
        case 'http-error':
            return `API 오류가 발생했습니다: ${error.status}`
        case 'network-error':
            return `네트워크 오류가 발생했습니다: ${error.message}`
        case 'malformed-response':
            return `API 응답을 해석할 수 없습니다: ${error.message}`
    }
}

export interface WeatherServerOptions {
    source: WeatherSource
    logger?: AppLogger
    now?: () => Date
}

export function createWeatherServer({
    source,
    logger = silentLogger,
    now = () => new Date()
}: WeatherServerOptions): McpServer {
    const log = logger.getSubLogger({ name: 'weather' })

    const server = new McpServer({
        name: 'weather-server',
        version: '1.0.0'
    })

    async function describeCity(city: string): Promise<{ text: string; ok: boolean }> {
        const lookup = await source.current(city)
        if (lookup.ok) {
            return { text: formatReport(lookup.report, source.mode === 'demo', now()), ok: true }
        }
        if (lookup.error.kind !== 'no-demo-data') {
            log.warn('날씨 조회 실패', city, lookup.error)
        }
        return { text: describeWeatherError(lookup.error), ok: false }
    }

    // 도구
    server.tool(
        'get_weather',
        '도시의 현재 날씨를 조회합니다.',
        { city: z.string().describe('도시 이름 (예: 서울, 부산, Tokyo, New York)') },
        async ({ city }) => {
            log.debug('도구 호출', 'get_weather', city)
            const { text, ok } = await describeCity(city)
            return ok ? textResult(text) : errorResult(text)
        }
    )

    server.tool(
        'compare_weather',
        '여러 도시의 날씨를 비교합니다.',
        {
            cities: z
                .array(z.string())
                .describe('비교할 도시 목록 (예: ["서울", "부산", "제주"])')
        },
        async ({ cities }) => {
            log.debug('도구 호출', 'compare_weather', cities)
            const sections: string[] = []
            for (const city of cities) {
                sections.push((await describeCity(city)).text, '---')
            }
            return textResult(sections.join('\n'))
        }
    )

    server.tool(
        'recommend_outfit',
        '온도와 날씨에 맞는 옷차림을 추천합니다.',
        {
            temperature: z.number().describe('현재 기온 (섭씨)'),
            is_raining: z.boolean().default(false).describe('비가 오는지 여부')
        },
        ({ temperature, is_raining }) => {
            const { outfit, tip } = recommendOutfit(temperature)
            const rainTip = is_raining ? '\n🌂 우산을 꼭 챙기세요!' : ''
            return textResult(
                `🌡️ 기온: ${temperature}°C\n👕 추천 옷차림: ${outfit}\n💡 팁: ${tip}${rainTip}`
            )
        }
    )

    // 정적 리소스
    server.resource('supported-cities', 'weather://cities', uri => {
        const cities = source
            .supportedCities()
            .map(city => `  - ${city}`)
            .join('\n')
        return {
            contents: [
                {
                    uri: uri.href,
                    text: `데모 모드 지원 도시:\n${cities}\n\nAPI 키 설정 시 전 세계 도시 검색 가능`
                }
            ]
        }
    })

    // 프롬프트
    server.prompt(
        'travel_preparation',
        '여행 준비를 위한 프롬프트를 생성합니다.',
        { destination: z.string(), days: z.string().optional() },
        ({ destination, days }) => ({
            messages: [
                {
                    role: 'user',
                    content: {
                        type: 'text',
                        text:
                            `${destination}으로 ${days ?? '3'}일 여행을 계획하고 있습니다.\n\n` +
                            `다음을 알려주세요:\n` +
                            `1. 현재 ${destination}의 날씨\n` +
                            `2. 추천 옷차림\n` +
                            `3. 여행 시 주의사항\n` +
                            `4. 추천 준비물 체크리스트`
                    }
                }
            ]
        })
    )

    return server
}

import fs from 'fs/promises'
import { fileURLToPath } from 'url'
import { z } from 'zod'
import type { WeatherConfig } from './config.js'

export interface WeatherReport {
    city: string
    temperature: number
    feelsLike?: number
    humidity: number
    description: string
    windSpeed: number
}

export type WeatherError =
    | { kind: 'no-demo-data'; city: string; available: string[] }
    | { kind: 'city-not-found'; city: string }
    | { kind: 'http-error'; status: number }
    | { kind: 'network-error'; message: string }
    | { kind: 'malformed-response'; message: string }

export type WeatherLookup = { ok: true; report: WeatherReport } | { ok: false; error: WeatherError }

/**
 * 날씨 조회 전략. 시작할 때 한 번 고르고 도구는 모드를 다시 확인하지 않습니다.
 */
export interface WeatherSource {
    readonly mode: 'demo' | 'live'
    current(city: string): Promise<WeatherLookup>
    /** 데모 모드에서 지원하는 도시 (실시간 모드는 빈 배열) */
    supportedCities(): string[]
}

const DemoWeatherSchema = z.record(
    z.object({
        temp: z.number(),
        humidity: z.number(),
        description: z.string(),
        wind: z.number()
    })
)
export type DemoWeather = z.infer<typeof DemoWeatherSchema>

const DEMO_WEATHER_PATH = fileURLToPath(
    new URL('../data/weather-demo.json', import.meta.url)
)

export async function loadDemoWeather(file = DEMO_WEATHER_PATH): Promise<DemoWeather> {
    return DemoWeatherSchema.parse(JSON.parse(await fs.readFile(file, 'utf-8')))
}

export class DemoWeatherSource implements WeatherSource {
    readonly mode = 'demo'

    constructor(private readonly data: DemoWeather) {}

    static async load(file?: string): Promise<DemoWeatherSource> {
        return new DemoWeatherSource(await loadDemoWeather(file))
    }

    async current(city: string): Promise<WeatherLookup> {
        const entry = this.data[city]
        if (!entry) {
            return {
                ok: false,
                error: { kind: 'no-demo-data', city, available: this.supportedCities() }
            }
        }
        return {
            ok: true,
            report: {
                city,
                temperature: entry.temp,
                humidity: entry.humidity,
                description: entry.description,
                windSpeed: entry.wind
            }
        }
    }

    supportedCities(): string[] {
        return Object.keys(this.data)
    }
}

const OpenWeatherResponseSchema = z.object({
    name: z.string(),
    main: z.object({
        temp: z.number(),
        feels_like: z.number(),
        humidity: z.number()
    }),
    weather: z.array(z.object({ description: z.string() })).min(1),
    wind: z.object({ speed: z.number() })
})

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export class OpenWeatherSource implements WeatherSource {
    readonly mode = 'live'

    constructor(
        private readonly apiKey: string,
        private readonly baseUrl: string,
        private readonly fetchImpl: FetchLike = fetch
    ) {}

    async current(city: string): Promise<WeatherLookup> {
        const url = new URL(`${this.baseUrl.replace(/\/$/, '')}/weather`)
        url.searchParams.set('q', city)
        url.searchParams.set('appid', this.apiKey)
        url.searchParams.set('units', 'metric')
        url.searchParams.set('lang', 'kr')

        let response: Response
        try {
            response = await this.fetchImpl(url.toString())
        } catch (error) {
            return {
                ok: false,
                error: {
                    kind: 'network-error',
                    message: error instanceof Error ? error.message : String(error)
                }
            }
        }

        if (response.status === 404) {
            return { ok: false, error: { kind: 'city-not-found', city } }
        }
        if (!response.ok) {
            return { ok: false, error: { kind: 'http-error', status: response.status } }
        }

        let body: unknown
        try {
            body = await response.json()
        } catch (error) {
            return {
                ok: false,
                error: {
                    kind: 'malformed-response',
                    message: error instanceof Error ? error.message : String(error)
                }
            }
        }
        const parsed = OpenWeatherResponseSchema.safeParse(body)
        if (!parsed.success) {
            return { ok: false, error: { kind: 'malformed-response', message: parsed.error.message } }
        }

        const data = parsed.data
        return {
            ok: true,
            report: {
                city: data.name,
                temperature: data.main.temp,
                feelsLike: data.main.feels_like,
                humidity: data.main.humidity,
                description: data.weather[0]?.description ?? '',
                windSpeed: data.wind.speed
            }
        }
    }

    supportedCities(): string[] {
        return []
    }
}

/** API 키가 있으면 OpenWeatherMap, 없으면 데모 데이터를 사용합니다. */
export async function selectWeatherSource(config: WeatherConfig): Promise<WeatherSource> {
    if (config.apiKey) {
        return new OpenWeatherSource(config.apiKey, config.baseUrl)
    }
    return DemoWeatherSource.load()
}

import { describe, expect, it, vi } from 'vitest'
import {
    DemoWeatherSource,
    type FetchLike,
    OpenWeatherSource,
    selectWeatherSource
} from './weather-source.js'

const OPENWEATHER_BODY = {
    name: 'Tokyo',
    main: { temp: 12.3, feels_like: 10.1, humidity: 60 },
    weather: [{ description: '맑음' }],
    wind: { speed: 4.2 }
}

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' }
    })
}

describe('DemoWeatherSource', () => {
    it('returns the same fixed report for a known city', async () => {
        const source = await DemoWeatherSource.load()

        const first = await source.current('서울')
        const second = await source.current('서울')

        expect(first).toEqual({
            ok: true,
            report: {
                city: '서울',
                temperature: 3.5,
                humidity: 45,
                description: '맑음',
                windSpeed: 2.1
            }
        })
        expect(second).toEqual(first)
    })

    it('lists available cities for an unknown city', async () => {
        const source = await DemoWeatherSource.load()

        expect(await source.current('Tokyo')).toEqual({
            ok: false,
            error: {
                kind: 'no-demo-data',
                city: 'Tokyo',
                available: ['서울', '부산', '제주', '대전', '인천']
            }
        })
    })

    it('is chosen when no API key is configured', async () => {
        const source = await selectWeatherSource({
            baseUrl: 'https://api.openweathermap.org/data/2.5'
        })

        expect(source.mode).toBe('demo')
    })

    it('is not chosen when an API key is configured', async () => {
        const source = await selectWeatherSource({
            apiKey: 'test-secret',
            baseUrl: 'https://api.openweathermap.org/data/2.5'
        })

        expect(source.mode).toBe('live')
    })
})

describe('OpenWeatherSource', () => {
    it('requests metric Korean results with the key and city', async () => {
        const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse(OPENWEATHER_BODY))
        const source = new OpenWeatherSource('test-secret', 'https://weather.test/data/2.5/', fetchImpl)

        const result = await source.current('Tokyo')

        expect(fetchImpl).toHaveBeenCalledTimes(1)
        const url = new URL(String(fetchImpl.mock.calls[0]?.[0]))
        expect(url.origin + url.pathname).toBe('https://weather.test/data/2.5/weather')
        expect(url.searchParams.get('q')).toBe('Tokyo')
        expect(url.searchParams.get('appid')).toBe('test-secret')
        expect(url.searchParams.get('units')).toBe('metric')
        expect(url.searchParams.get('lang')).toBe('kr')
        expect(result).toEqual({
            ok: true,
            report: {
                city: 'Tokyo',
                temperature: 12.3,
                feelsLike: 10.1,
                humidity: 60,
                description: '맑음',
                windSpeed: 4.2
            }
        })
    })

    it('maps 404 to an unknown city', async () => {
        const source = new OpenWeatherSource('test-secret', 'https://weather.test', async () =>
            jsonResponse({ message: 'city not found' }, 404)
        )

        expect(await source.current('Atlantis')).toEqual({
            ok: false,
            error: { kind: 'city-not-found', city: 'Atlantis' }
        })
    })

    it('reports other HTTP failures with their status', async () => {
        const source = new OpenWeatherSource('test-secret', 'https://weather.test', async () =>
            jsonResponse({}, 500)
        )

        expect(await source.current('Tokyo')).toEqual({
            ok: false,
            error: { kind: 'http-error', status: 500 }
        })
    })

    it('reports a network failure', async () => {
        const source = new OpenWeatherSource('test-secret', 'https://weather.test', async () => {
            throw new Error('connect ECONNREFUSED')
        })

        expect(await source.current('Tokyo')).toEqual({
            ok: false,
            error: { kind: 'network-error', message: 'connect ECONNREFUSED' }
        })
    })

    it('reports a body that does not match the expected shape', async () => {
        const source = new OpenWeatherSource('test-secret', 'https://weather.test', async () =>
            jsonResponse({ name: 'Tokyo' })
        )

        const result = await source.current('Tokyo')

        expect(!result.ok && result.error.kind).toBe('malformed-response')
    })

    it('reports a body that is not JSON', async () => {
        const source = new OpenWeatherSource(
            'test-secret',
            'https://weather.test',
            async () => new Response('<html>', { status: 200 })
        )

        const result = await source.current('Tokyo')

        expect(!result.ok && result.error.kind).toBe('malformed-response')
    })
})

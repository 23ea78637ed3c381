import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest'
import { createCanvas } from '@napi-rs/canvas'
import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { EmojiCache } from './EmojiCache'

const BASE_URL = 'https://emoji.test/72x72'

let png: Buffer
let cacheDir: string

beforeAll(async () => {
    const canvas = createCanvas(4, 4)
    const ctx = canvas.getContext('2d')
    ctx.fillStyle = 'rgb(255, 0, 0)'
    ctx.fillRect(0, 0, 4, 4)
    png = await canvas.encode('png')
})

beforeEach(async () => {
    cacheDir = await fs.mkdtemp(path.join(os.tmpdir(), 'emoji-cache-'))
})

afterEach(async () => {
    vi.unstubAllGlobals()
    await fs.rm(cacheDir, { recursive: true, force: true })
})

function stubFetch(respond: (url: string) => Response | Promise<Response>) {
    const fetchMock = vi.fn(async (input: string | URL | Request) => respond(String(input)))
    vi.stubGlobal('fetch', fetchMock)
    return fetchMock
}

describe('EmojiCache', () => {
    it('names files and urls by codepoint key', () => {
        const cache = new EmojiCache({ cacheDir, baseUrl: `${BASE_URL}/` })
        expect(cache.pathFor('1f600')).toBe(path.join(cacheDir, '1f600.png'))
        expect(cache.urlFor('1f600')).toBe(`${BASE_URL}/1f600.png`)
    })

    it('fetches a missing emoji once and stores it on disk', async () => {
        const fetchMock = stubFetch(() => new Response(png, { status: 200 }))
        const cache = new EmojiCache({ cacheDir, baseUrl: BASE_URL })

        const first = await cache.resolve('😀')
        const second = await cache.resolve('😀')

        expect(first).not.toBeNull()
        expect(second).toBe(first)
        expect(fetchMock).toHaveBeenCalledTimes(1)
        expect(fetchMock.mock.calls[0][0]).toBe(`${BASE_URL}/1f600.png`)
        expect(await fs.readdir(cacheDir)).toEqual(['1f600.png'])
        expect(await fs.readFile(path.join(cacheDir, '1f600.png'))).toEqual(png)
    })

    it('reads emoji already on disk without fetching', async () => {
        await fs.writeFile(path.join(cacheDir, '2764.png'), png)
        const fetchMock = stubFetch(() => new Response(null, { status: 500 }))
        const cache = new EmojiCache({ cacheDir, baseUrl: BASE_URL })

        const image = await cache.resolve('❤️')

        expect(image?.width).toBe(4)
        expect(fetchMock).not.toHaveBeenCalled()
    })

    it('returns null and writes nothing when the emoji is not available', async () => {
        stubFetch(() => new Response('not found', { status: 404 }))
        const cache = new EmojiCache({ cacheDir, baseUrl: BASE_URL })

        expect(await cache.resolve('😀')).toBeNull()
        expect(await fs.readdir(cacheDir)).toEqual([])
    })

    it('does not store bytes that are not an image', async () => {
        stubFetch(() => new Response('<html>oops</html>', { status: 200 }))
        const cache = new EmojiCache({ cacheDir, baseUrl: BASE_URL })

        expect(await cache.resolve('😀')).toBeNull()
        expect(await fs.readdir(cacheDir)).toEqual([])
    })

    it('returns null when the request fails', async () => {
        stubFetch(() => { throw new Error('offline') })
        const cache = new EmojiCache({ cacheDir, baseUrl: BASE_URL })

        expect(await cache.resolve('😀')).toBeNull()
    })

    it('preloads each distinct grapheme once', async () => {
        const fetchMock = stubFetch(url => url.endsWith('/2764.png')
            ? new Response(null, { status: 404 })
            : new Response(png, { status: 200 }))
        const cache = new EmojiCache({ cacheDir, baseUrl: BASE_URL })

        const loaded = await cache.preload(['😀', '😀', '❤️'])

        expect([...loaded.keys()]).toEqual(['😀', '❤️'])
        expect(loaded.get('😀')).not.toBeNull()
        expect(loaded.get('❤️')).toBeNull()
        expect(fetchMock.mock.calls.map(([url]) => String(url))).toEqual([`${BASE_URL}/1f600.png`, `${BASE_URL}/2764.png`])
    })
})

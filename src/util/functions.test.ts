import { describe, it, expect, vi, afterEach } from 'vitest'
import { deleteAfter, errorMessage, fetchUrlBytes, formatTimestamp } from './functions'

afterEach(() => {
    vi.unstubAllGlobals()
})

describe('formatTimestamp', () => {
    it('uses a 12-hour UTC clock without a leading zero', () => {
        expect(formatTimestamp(new Date(Date.UTC(2024, 0, 1, 16, 5)))).toBe('4:05 PM')
        expect(formatTimestamp(new Date(Date.UTC(2024, 0, 1, 9, 30)))).toBe('9:30 AM')
    })

    it('shows midnight and noon as 12', () => {
        expect(formatTimestamp(new Date(Date.UTC(2024, 0, 1, 0, 0)))).toBe('12:00 AM')
        expect(formatTimestamp(new Date(Date.UTC(2024, 0, 1, 12, 59)))).toBe('12:59 PM')
    })
})

describe('fetchUrlBytes', () => {
    it('returns the body of a 200 response', async () => {
        vi.stubGlobal('fetch', vi.fn(async () => new Response('hello', { status: 200 })))
        const result = await fetchUrlBytes('https://files.test/a')
        expect(result.ok && result.data.toString('utf-8')).toBe('hello')
    })

    it('reports other statuses as failures', async () => {
        vi.stubGlobal('fetch', vi.fn(async () => new Response(null, { status: 204 })))
        expect(await fetchUrlBytes('https://files.test/a')).toEqual({ ok: false, reason: 'HTTP 204' })
    })

    it('cancels the body of a failed response', async () => {
        const response = new Response('gone', { status: 404 })
        const body = response.body
        if (!body) throw new Error('response has no body')
        const cancel = vi.spyOn(body, 'cancel')
        vi.stubGlobal('fetch', vi.fn(async () => response))

        expect(await fetchUrlBytes('https://files.test/a')).toEqual({ ok: false, reason: 'HTTP 404' })
        expect(cancel).toHaveBeenCalledTimes(1)
    })

    it('reports network errors as failures', async () => {
        vi.stubGlobal('fetch', vi.fn(async () => { throw new Error('connection refused') }))
        expect(await fetchUrlBytes('https://files.test/a')).toEqual({ ok: false, reason: 'connection refused' })
    })
})

describe('deleteAfter', () => {
    it('waits before removing', async () => {
        const remove = vi.fn(async () => undefined)
        const pending = deleteAfter(remove, 20)

        expect(remove).not.toHaveBeenCalled()
        await pending
        expect(remove).toHaveBeenCalledTimes(1)
    })

    it('rejects when removing fails', async () => {
        await expect(deleteAfter(async () => { throw new Error('Unknown Message') }, 1)).rejects.toThrow('Unknown Message')
    })
})

describe('errorMessage', () => {
    it('reads messages from errors and stringifies anything else', () => {
        expect(errorMessage(new Error('boom'))).toBe('boom')
        expect(errorMessage(404)).toBe('404')
    })
})

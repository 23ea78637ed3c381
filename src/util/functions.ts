import { FETCH_TIMEOUT_MS } from './constants'

export type FetchResult =
    | { ok: true, data: Buffer }
    | { ok: false, reason: string }

/**
 * Best-effort GET. Network errors, timeouts and non-200 responses come back as `{ ok: false }`.
 */
export async function fetchUrlBytes(url: string, timeoutMs: number = FETCH_TIMEOUT_MS): Promise<FetchResult> {
    let response: Response
    try {
        response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) })
    } catch (error) {
        return { ok: false, reason: error instanceof Error ? error.message : String(error) }
    }
    if (response.status !== 200) {
        // release the connection without reading the body
        await response.body?.cancel()
        return { ok: false, reason: `HTTP ${response.status}` }
    }
    try {
        return { ok: true, data: Buffer.from(await response.arrayBuffer()) }
    } catch (error) {
        return { ok: false, reason: error instanceof Error ? error.message : String(error) }
    }
}

/**
 * 12-hour UTC clock without a leading zero, e.g. `4:05 PM`
 */
export function formatTimestamp(date: Date): string {
    const hours = date.getUTCHours()
    const minutes = String(date.getUTCMinutes()).padStart(2, '0')
    const period = hours < 12 ? 'AM' : 'PM'
    return `${hours % 12 || 12}:${minutes} ${period}`
}

export const errorMessage = (error: unknown) => error instanceof Error ? error.message : String(error)

/**
 * Runs `remove` once `ms` have passed. Rejects if it does.
 */
export async function deleteAfter(remove: () => Promise<unknown>, ms: number): Promise<void> {
    await new Promise(resolve => setTimeout(resolve, ms))
    await remove()
}

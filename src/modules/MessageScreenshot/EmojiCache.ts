import { loadImage, type Image } from '@napi-rs/canvas'
import fs from 'fs/promises'
import path from 'path'
import { Logger, yellow } from '../../util/logger'
import { fetchUrlBytes, errorMessage } from '../../util/functions'
import { DEFAULT_EMOJI_BASE_URL, FETCH_TIMEOUT_MS } from '../../util/constants'
import { codepointKey } from './graphemes'
import type { EmojiSource } from './types'

const logger = new Logger('EmojiCache')

export interface EmojiCacheOptions {
    cacheDir: string
    baseUrl?: string
    timeoutMs?: number
}

async function decode(bytes: Buffer): Promise<Image | null> {
    try {
        return await loadImage(bytes)
    } catch {
        return null
    }
}

/**
 * Emoji bitmaps backed by a directory of `<codepointKey>.png` files, filled from a remote asset set on miss.
 * Entries are never refetched, overwritten or evicted.
 */
export class EmojiCache implements EmojiSource {
    private decoded: Map<string, Image> = new Map()
    private readonly baseUrl: string
    private readonly timeoutMs: number

    constructor(private options: EmojiCacheOptions) {
        this.baseUrl = (options.baseUrl ?? DEFAULT_EMOJI_BASE_URL).replace(/\/+$/, '')
        this.timeoutMs = options.timeoutMs ?? FETCH_TIMEOUT_MS
    }

    public pathFor(key: string): string {
        return path.join(this.options.cacheDir, `${key}.png`)
    }

    public urlFor(key: string): string {
        return `${this.baseUrl}/${key}.png`
    }

    public async resolve(grapheme: string): Promise<Image | null> {
        const key = codepointKey(grapheme)
        if (!key) return null

        const memo = this.decoded.get(key)
        if (memo) return memo

        const localPath = this.pathFor(key)
        const local = await this.readLocal(localPath)
        if (local) {
            const image = await decode(local)
            if (image) {
                this.decoded.set(key, image)
                return image
            }
            logger.warn(`{resolve} Cached emoji ${yellow(localPath)} could not be decoded, fetching again`)
        }

        const fetched = await fetchUrlBytes(this.urlFor(key), this.timeoutMs)
        if (!fetched.ok) {
            logger.debug(`{resolve} No bitmap for ${key}: ${fetched.reason}`)
            return null
        }
        const image = await decode(fetched.data)
        if (!image) {
            logger.debug(`{resolve} Remote bitmap for ${key} is not a decodable image`)
            return null
        }

        await this.persist(localPath, fetched.data)
        this.decoded.set(key, image)
        return image
    }

    /**
     * Resolves each distinct grapheme once, one at a time.
     */
    public async preload(graphemes: Iterable<string>): Promise<Map<string, Image | null>> {
        const results = new Map<string, Image | null>()
        for (const grapheme of graphemes) {
            if (results.has(grapheme)) continue
            results.set(grapheme, await this.resolve(grapheme))
        }
        return results
    }

    private async readLocal(localPath: string): Promise<Buffer | null> {
        try {
            return await fs.readFile(localPath)
        } catch (error) {
            if (!isErrnoException(error) || error.code !== 'ENOENT') {
                logger.warn(`{readLocal} Could not read ${yellow(localPath)}: ${errorMessage(error)}`)
            }
            return null
        }
    }

    private async persist(localPath: string, bytes: Buffer): Promise<void> {
        try {
            await fs.mkdir(this.options.cacheDir, { recursive: true })
            // 'wx' refuses to replace a file another render already wrote
            await fs.writeFile(localPath, bytes, { flag: 'wx' })
        } catch (error) {
            if (isErrnoException(error) && error.code === 'EEXIST') return
            logger.warn(`{persist} Could not write ${yellow(localPath)}: ${errorMessage(error)}`)
        }
    }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error
}

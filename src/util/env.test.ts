import { describe, it, expect } from 'vitest'
import os from 'os'
import { ZodError } from 'zod'
import { loadEnv } from './env'

describe('loadEnv', () => {
    it('fills in defaults', () => {
        expect(loadEnv({ DISCORD_TOKEN: 'test-token' })).toEqual({
            DISCORD_TOKEN: 'test-token',
            COMMAND_PREFIX: '!',
            GUILD_CONFIG_PATH: 'config.json',
            FONTS_DIR: 'fonts',
            EMOJI_CACHE_DIR: 'twemoji',
            EMOJI_BASE_URL: 'https://cdn.jsdelivr.net/gh/twitter/twemoji@latest/assets/72x72',
            SCREENSHOT_DIR: os.tmpdir()
        })
    })

    it('keeps configured values', () => {
        const env = loadEnv({ DISCORD_TOKEN: 'test-token', COMMAND_PREFIX: '?', EMOJI_BASE_URL: 'https://emoji.test/png' })
        expect(env.COMMAND_PREFIX).toBe('?')
        expect(env.EMOJI_BASE_URL).toBe('https://emoji.test/png')
    })

    it('requires a bot token', () => {
        expect(() => loadEnv({})).toThrow(ZodError)
    })

    it('rejects a malformed emoji base url', () => {
        expect(() => loadEnv({ DISCORD_TOKEN: 'test-token', EMOJI_BASE_URL: 'not a url' })).toThrow(ZodError)
    })
})

import 'dotenv/config'
import os from 'os'
import { z } from 'zod'
import { DEFAULT_EMOJI_BASE_URL } from './constants'

const EnvSchema = z.object({
    DISCORD_TOKEN: z.string().min(1, 'DISCORD_TOKEN is not set. Copy .env.example -> .env and add your token.'),
    COMMAND_PREFIX: z.string().min(1).default('!'),
    GUILD_CONFIG_PATH: z.string().default('config.json'),
    FONTS_DIR: z.string().default('fonts'),
    EMOJI_CACHE_DIR: z.string().default('twemoji'),
    EMOJI_BASE_URL: z.string().url().default(DEFAULT_EMOJI_BASE_URL),
    SCREENSHOT_DIR: z.string().default(os.tmpdir())
})

export type Env = z.infer<typeof EnvSchema>

/**
 * Parses `process.env` (after `.env` is loaded). Throws a `ZodError` listing every bad variable.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
    return EnvSchema.parse(source)
}

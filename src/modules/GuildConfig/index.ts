import { EventEmitter } from 'tseep'
import fs from 'fs/promises'
import path from 'path'
import { z } from 'zod'
import { Logger, red, yellow } from '../../util/logger'
import { errorMessage } from '../../util/functions'
import { isColorMode, type ColorMode } from '../../util/colors'
import type { GuildId } from '../../types/types'

const logger = new Logger('GuildConfigManager')

export interface GuildConfig {
    mode: ColorMode
}

export const DEFAULT_GUILD_CONFIG: Readonly<GuildConfig> = { mode: 'light' }

const toMode = (value: unknown): ColorMode => isColorMode(value) ? value : DEFAULT_GUILD_CONFIG.mode

// Older files stored the bare mode string per guild
const GuildConfigEntry = z.union([
    z.string().transform(mode => ({ mode: toMode(mode) })),
    z.object({ mode: z.unknown() }).passthrough().transform(entry => ({ mode: toMode(entry.mode) }))
])
const GuildConfigFile = z.record(z.string(), z.unknown())

export default class GuildConfigManager extends EventEmitter<{
    configUpdate: (guildId: GuildId, config: GuildConfig) => void
}> {
    private static instance: GuildConfigManager | null = null
    private filePath: string = path.join(process.cwd(), 'config.json')

    private constructor() {
        super()
    }

    public static getInstance(): GuildConfigManager {
        if (!this.instance) {
            this.instance = new GuildConfigManager()
        }
        return this.instance
    }

    public setFilePath(filePath: string): GuildConfigManager {
        this.filePath = path.resolve(filePath)
        return this
    }

    /**
     * Raw file contents keyed by guild. Missing or unreadable files read as empty.
     */
    private async readFile(): Promise<Record<string, unknown>> {
        let raw: string
        try {
            raw = await fs.readFile(this.filePath, 'utf-8')
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return {}
            logger.warn(`{readFile} Could not read ${yellow(this.filePath)}: ${red(errorMessage(error))}`)
            return {}
        }

        let json: unknown
        try {
            json = JSON.parse(raw)
        } catch (error) {
            logger.warn(`{readFile} ${yellow(this.filePath)} is not valid JSON: ${red(errorMessage(error))}`)
            return {}
        }

        const file = GuildConfigFile.safeParse(json)
        if (!file.success) {
            logger.warn(`{readFile} ${yellow(this.filePath)} is not an object, ignoring it`)
            return {}
        }
        return file.data
    }

    /**
     * Every readable guild config, normalized. Bad entries are dropped.
     */
    public async getAll(): Promise<Record<GuildId, GuildConfig>> {
        const configs: Record<GuildId, GuildConfig> = {}
        for (const [guildId, value] of Object.entries(await this.readFile())) {
            const entry = GuildConfigEntry.safeParse(value)
            if (entry.success) configs[guildId] = entry.data
            else logger.debug(`{getAll} Dropping malformed entry for ${guildId}`)
        }
        return configs
    }

    public async getConfig(guildId?: GuildId | null): Promise<GuildConfig> {
        if (!guildId) {
            logger.debug('{getConfig} No guildId, returning default config')
            return { ...DEFAULT_GUILD_CONFIG }
        }
        const configs = await this.getAll()
        return configs[guildId] ?? { ...DEFAULT_GUILD_CONFIG }
    }

    public async setConfig(guildId: GuildId, config: GuildConfig): Promise<void> {
        logger.info(`{setConfig} Updating config for ${guildId} with ${JSON.stringify(config)}`)
        // other guilds' entries are written back exactly as they were read
        const entries = await this.readFile()
        const updated: GuildConfig = { mode: config.mode }
        entries[guildId] = updated
        await fs.mkdir(path.dirname(this.filePath), { recursive: true })
        await fs.writeFile(this.filePath, JSON.stringify(entries, null, 2), 'utf-8')
        logger.ok(`{setConfig} Saved ${yellow(this.filePath)}`)
        this.emit('configUpdate', guildId, updated)
    }
}

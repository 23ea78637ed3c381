import { Logger, yellow } from '../../util/logger'
const logger = new Logger('CommandRegistry')

import { SlashCommandBuilder } from 'discord.js'
import { readdir } from 'fs/promises'
import path from 'path'
import { pathToFileURL } from 'url'

import { InvalidCommandModuleError, type SlashCommand, type TextCommand } from '../../types/types'

export function isSlashCommand(item: unknown): item is SlashCommand {
    return typeof item === 'object' && item !== null
        && 'data' in item && item.data instanceof SlashCommandBuilder
        && 'execute' in item && typeof item.execute === 'function'
}

export function isTextCommand(item: unknown): item is TextCommand {
    return typeof item === 'object' && item !== null
        && 'name' in item && typeof item.name === 'string'
        && !('data' in item)
        && 'execute' in item && typeof item.execute === 'function'
}

const isCommandFile = (name: string) => /\.(ts|js)$/.test(name) && !/\.(test|spec|d)\.ts$/.test(name)

export class CommandRegistry {
    public readonly slashCommands: Map<string, SlashCommand> = new Map()
    public readonly textCommands: Map<string, TextCommand> = new Map()

    public async loadCommands(dir: string) {
        logger.info(`{loadCommands} Reading commands from ${yellow(dir)}...`)
        const startTime = Date.now()
        const files = (await readdir(dir, { withFileTypes: true })).filter(f => f.isFile() && isCommandFile(f.name))

        for (const file of files) {
            const importedModule: Record<string, unknown> = await import(pathToFileURL(path.join(dir, file.name)).href)
            const registered = this.register(importedModule)
            if (registered === 0) throw new InvalidCommandModuleError(file.name)
        }

        logger.ok(`{loadCommands} Loaded ${yellow(this.slashCommands.size)} slash and ${yellow(this.textCommands.size)} text commands from ${yellow(files.length)} files in ${yellow((Date.now() - startTime) / 1000)}s`)
    }

    /**
     * Registers every command a module exports and returns how many were found.
     */
    public register(exports: Record<string, unknown>): number {
        let count = 0
        for (const exportedItem of Object.values(exports)) {
            if (isSlashCommand(exportedItem)) {
                this.slashCommands.set(exportedItem.data.name, exportedItem)
                count++
            } else if (isTextCommand(exportedItem)) {
                for (const name of [exportedItem.name, ...(exportedItem.aliases ?? [])]) {
                    this.textCommands.set(name.toLowerCase(), exportedItem)
                }
                count++
            }
        }
        return count
    }

    public getSlashCommand(name: string): SlashCommand | undefined {
        return this.slashCommands.get(name)
    }

    public getTextCommand(name: string): TextCommand | undefined {
        return this.textCommands.get(name.toLowerCase())
    }
}

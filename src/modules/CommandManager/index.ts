import { Logger, yellow, red } from '../../util/logger'
const logger = new Logger('CommandManager')

import { ActivityType, Message, MessageFlags, PermissionsBitField, GuildChannel } from 'discord.js'
import type { ActivityOptions, ChatInputCommandInteraction, Client } from 'discord.js'

import path from 'path'
import { fileURLToPath } from 'url'

import { ClassNotInitializedError } from '../../types/types'
import { CommandRegistry } from './CommandRegistry'

export function parseTextCommand(content: string, prefix: string): { commandName: string | null, args: string[] } {
    if (!content.startsWith(prefix)) return { commandName: null, args: [] }
    const [commandName, ...args] = content.slice(prefix.length).trim().split(/\s+/)
    return { commandName: commandName || null, args }
}

/**
 * "Listening to !ss" presence advertising the screenshot command.
 */
export function commandActivity(prefix: string): ActivityOptions {
    return { name: `${prefix}ss`, type: ActivityType.Listening }
}

export default class CommandManager {
    private static instance: CommandManager

    private initialized = false
    private client: Client<true> | null = null
    private registry: CommandRegistry = new CommandRegistry()
    private prefix = '!'

    private constructor() {}

    public static getInstance(): CommandManager {
        if (!CommandManager.instance) {
            CommandManager.instance = new CommandManager()
        }
        return CommandManager.instance
    }

    public setClient(client: Client<true>): CommandManager {
        this.client = client
        return this
    }

    public setPrefix(prefix: string): CommandManager {
        this.prefix = prefix
        return this
    }

    public async init() {
        if (!this.client) throw new Error('Client not set. Call setClient() first.')

        logger.info('{init} Initializing...')
        const initStartTime = process.hrtime.bigint()

        const currentDir = path.dirname(fileURLToPath(import.meta.url))
        await this.registry.loadCommands(path.join(currentDir, '../../commands'))
        await this.refreshGlobalCommands()

        this.initialized = true

        const initEndTime = process.hrtime.bigint()
        const totalTime = Number(initEndTime - initStartTime) / 1_000_000_000
        logger.ok(`{init} Total time: ${yellow(totalTime)}s`)
    }

    public async refreshGlobalCommands(): Promise<void> {
        if (!this.client) throw new ClassNotInitializedError()
        const body = [...this.registry.slashCommands.values()].map(command => command.data.toJSON())
        logger.info(`{refreshGlobalCommands} Deploying ${yellow(body.length)} global slash commands...`)
        await this.client.application.commands.set(body)
        logger.ok('{refreshGlobalCommands} Deployed')
    }

    public async handleInteraction(interaction: ChatInputCommandInteraction): Promise<void> {
        if (!this.initialized) throw new ClassNotInitializedError()

        const command = this.registry.getSlashCommand(interaction.commandName)
        if (!command) {
            logger.warn(`{handleInteraction} Unknown command /${yellow(interaction.commandName)}`)
            this.handleError(new Error(`Command ${interaction.commandName} not found for interaction.`), interaction)
            return
        }

        try {
            if (command.guildOnly && !interaction.inGuild()) {
                await interaction.reply({ content: '❌ This command can only be used in a server.', flags: MessageFlags.Ephemeral })
                return
            }
            await command.execute(interaction)
        } catch (e) {
            this.handleError(e instanceof Error ? e : new Error(String(e)), interaction)
        }
    }

    public async handleMessageCommand(message: Message): Promise<void> {
        if (!this.initialized || !message.content.startsWith(this.prefix) || message.author.bot) return

        if (message.channel instanceof GuildChannel) {
            const me = await message.guild?.members.fetchMe()
            if (me && !message.channel.permissionsFor(me).has(PermissionsBitField.Flags.SendMessages)) {
                logger.warn(`{handleMessageCommand} No permission to send messages in channel #${message.channel.name} (${message.channel.id})`)
                return
            }
        }

        const { commandName, args } = parseTextCommand(message.content, this.prefix)
        if (!commandName) return
        const command = this.registry.getTextCommand(commandName)
        if (!command) return

        try {
            await command.execute(message, args)
        } catch (e) {
            this.handleError(e instanceof Error ? e : new Error(String(e)), message, commandName)
        }
    }

    private handleError(e: Error, source: ChatInputCommandInteraction | Message, cmdName?: string): void {
        const commandName = cmdName ?? (source instanceof Message ? 'unknown' : source.commandName)
        const replyMessage = `❌ Error executing \`${commandName}\`: \`${e.message}\``

        logger.warn(`{handleError} Error in ${yellow(commandName)}: ${red(e.message)}`)
        if (e.stack) logger.warn(e.stack)

        if (source instanceof Message) {
            source.channel.isSendable() && source.channel.send(replyMessage).catch(err =>
                logger.warn(`{handleError} Could not send error message: [${red(err instanceof Error ? err.message : String(err))}]`)
            )
            return
        }
        if (source.deferred || source.replied) {
            source.editReply(replyMessage).catch(err =>
                logger.warn(`{handleError} Could not editReply to interaction for ${commandName}: [${red(err instanceof Error ? err.message : String(err))}]`)
            )
        } else {
            source.reply({ content: replyMessage, flags: MessageFlags.Ephemeral }).catch(err =>
                logger.warn(`{handleError} Could not reply to interaction for ${commandName}: [${red(err instanceof Error ? err.message : String(err))}]`)
            )
        }
    }
}

import type {
    Client, Message,
    ChatInputCommandInteraction,
    SlashCommandBuilder,
    SlashCommandOptionsOnlyBuilder,
    SlashCommandSubcommandsOnlyBuilder
} from 'discord.js'

/**
 * Discord Event Listener
 * @param {Client} client - The client for the event listener
 */
export interface DiscordEventListener {
    default: (client: Client<true>) => void
}

export type JSONResolvable = string | number | boolean | {[key: string]: JSONResolvable} | {[key: string]: JSONResolvable}[] | null

export type GuildId = string & {} // `& {}` because otherwise intellisense will show `string` instead of `GuildId`

// Command Manager Types
export type SlashCommandProps = {
    data: SlashCommandBuilder | SlashCommandSubcommandsOnlyBuilder | SlashCommandOptionsOnlyBuilder
    guildOnly?: boolean
    execute: (interaction: ChatInputCommandInteraction) => Promise<void>
}

export interface SlashCommand extends SlashCommandProps {}

export type TextCommandProps = {
    name: string
    aliases?: string[]
    description?: string
    execute: (message: Message, args: string[]) => Promise<void>
}

export interface TextCommand extends TextCommandProps {}

/**
 * Class Not Initialized Error
 */
export class ClassNotInitializedError extends Error {
    constructor() {
        super('Command handler has not been initialized! Call init() first')
    }
}

/**
 * Thrown for command modules that export neither a slash nor a text command
 */
export class InvalidCommandModuleError extends Error {
    file: string
    constructor(file: string) {
        super(`Command module ${file} does not export a valid command`)
        this.file = file
    }
}

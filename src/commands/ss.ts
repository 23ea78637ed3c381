import { Logger, red, yellow } from '../util/logger'
const logger = new Logger('command.ss')

import { AttachmentBuilder, type Message } from 'discord.js'
import fs from 'fs/promises'
import path from 'path'

import type { TextCommand } from '../types/types'
import type { ColorMode } from '../util/colors'
import GuildConfigManager from '../modules/GuildConfig'
import { MessageScreenshotFactory } from '../modules/MessageScreenshot/MessageScreenshotFactory'
import { buildRenderRequest } from '../modules/MessageScreenshot/DiscordAdapter'
import { checkMessageLength } from '../modules/MessageScreenshot/config'
import { TRANSIENT_NOTICE_MS } from '../util/constants'
import { deleteAfter, errorMessage } from '../util/functions'

export interface ScreenshotTarget {
    id: string
    content: string
    author: { bot: boolean }
}

/**
 * The invoking message, reduced to what the command does with it.
 * `send` resolves to `null` when the channel cannot be sent to.
 */
export interface ScreenshotInvocation<Target extends ScreenshotTarget> {
    guildId: string | null
    invokerMention: string
    invokerName: string
    deleteInvocation(): Promise<unknown>
    fetchTarget(): Promise<Target | null>
    send(payload: { content: string, file?: string }): Promise<{ delete(): Promise<unknown> } | null>
}

export interface ScreenshotServices<Target extends ScreenshotTarget> {
    getMode(guildId: string | null): Promise<ColorMode>
    render(target: Target, mode: ColorMode): Promise<string>
    removeFile(file: string): Promise<void>
}

async function notify(invocation: ScreenshotInvocation<ScreenshotTarget>, content: string) {
    const notice = await invocation.send({ content })
    if (!notice) return
    deleteAfter(() => notice.delete(), TRANSIENT_NOTICE_MS).catch(err =>
        logger.debug(`{notify} Could not delete notice: ${red(errorMessage(err))}`)
    )
}

export async function takeScreenshot<Target extends ScreenshotTarget>(
    invocation: ScreenshotInvocation<Target>,
    services: ScreenshotServices<Target>
): Promise<void> {
    try {
        await invocation.deleteInvocation()
    } catch (error) {
        logger.debug(`{takeScreenshot} Could not delete invoking message: ${errorMessage(error)}`)
    }

    const target = await invocation.fetchTarget()
    if (!target) {
        await notify(invocation, '❌ You must reply to a message to screenshot it.')
        return
    }
    if (target.author.bot) {
        await notify(invocation, '😏 Nice try, but you can’t screenshot bot messages.')
        return
    }
    const length = checkMessageLength(target.content)
    if (!length.ok) {
        await notify(invocation, `⚠️ Message too long (limit: ${length.limit} ${length.reason === 'words' ? 'words' : 'characters'}).`)
        return
    }

    const mode = await services.getMode(invocation.guildId)
    logger.info(`{takeScreenshot} ${yellow(invocation.invokerName)} screenshots ${yellow(target.id)} in ${mode} mode`)

    const file = await services.render(target, mode)
    try {
        await invocation.send({ content: `📸 Screenshot generated by ${invocation.invokerMention}`, file })
    } finally {
        await services.removeFile(file)
    }
}

async function fetchTarget(message: Message): Promise<Message | null> {
    if (!message.reference?.messageId) return null
    try {
        return await message.fetchReference()
    } catch (error) {
        logger.debug(`{fetchTarget} Referenced message is gone: ${errorMessage(error)}`)
        return null
    }
}

export default {
    name: 'ss',
    aliases: ['screenshot'],
    description: 'Reply to a message with this command to get a screenshot of it',
    async execute(message) {
        await takeScreenshot<Message>({
            guildId: message.guildId,
            invokerMention: message.author.toString(),
            invokerName: message.author.username,
            deleteInvocation: () => message.delete(),
            fetchTarget: () => fetchTarget(message),
            send: async ({ content, file }) => {
                if (!message.channel.isSendable()) return null
                return message.channel.send({
                    content,
                    files: file ? [new AttachmentBuilder(file, { name: path.basename(file) })] : []
                })
            }
        }, {
            getMode: async guildId => (await GuildConfigManager.getInstance().getConfig(guildId)).mode,
            render: (target, mode) => MessageScreenshotFactory.getInstance().createScreenshot(buildRenderRequest(target, mode)),
            removeFile: file => fs.rm(file, { force: true })
        })
    }
} satisfies TextCommand

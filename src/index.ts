import { Logger, yellow, red } from './util/logger'
const logger = new Logger()
logger.info('Starting bot')

import { readdir } from 'fs/promises'
import path from 'path'
import { fileURLToPath, pathToFileURL } from 'url'
import { Client, IntentsBitField, Partials } from 'discord.js'
import { ZodError } from 'zod'
import type { DiscordEventListener } from './types/types'

import { loadEnv, type Env } from './util/env'
import { errorMessage } from './util/functions'
import CommandManager, { commandActivity } from './modules/CommandManager'
import GuildConfigManager from './modules/GuildConfig'
import { MessageScreenshotFactory } from './modules/MessageScreenshot/MessageScreenshotFactory'
import { gracefulShutdown } from './modules/GracefulShutdown'

const currentDir = path.dirname(fileURLToPath(import.meta.url))

let env: Env
try {
    env = loadEnv()
} catch (error) {
    if (error instanceof ZodError) {
        for (const issue of error.issues) logger.error(`${yellow(issue.path.join('.'))}: ${red(issue.message)}`)
    } else {
        logger.error(`Could not read environment: ${red(errorMessage(error))}`)
    }
    process.exit(1)
}

const unreadyClient = new Client({
    intents: new IntentsBitField([
        IntentsBitField.Flags.Guilds,
        IntentsBitField.Flags.GuildMembers,
        IntentsBitField.Flags.GuildMessages,
        IntentsBitField.Flags.MessageContent
    ]),
    partials: [
        Partials.Channel,
        Partials.Message
    ],
    allowedMentions: {
        parse: ['users']
    }
})

const guildConfigManager = GuildConfigManager.getInstance().setFilePath(env.GUILD_CONFIG_PATH)
guildConfigManager.on('configUpdate', (guildId, config) => {
    logger.info(`Guild ${yellow(guildId)} now renders in ${yellow(config.mode)} mode`)
})

MessageScreenshotFactory.getInstance({
    fontsDir: path.resolve(env.FONTS_DIR),
    emojiCacheDir: path.resolve(env.EMOJI_CACHE_DIR),
    emojiBaseUrl: env.EMOJI_BASE_URL,
    outputDir: path.resolve(env.SCREENSHOT_DIR)
}).init()

unreadyClient.once('ready', async readyClient => {
    logger.info(`Logged in as ${yellow(readyClient.user.tag)}`)
    gracefulShutdown.setClient(readyClient)
    gracefulShutdown.registerShutdownHandlers()

    await CommandManager.getInstance()
        .setClient(readyClient)
        .setPrefix(env.COMMAND_PREFIX)
        .init()

    const eventsDir = path.join(currentDir, 'events')
    const eventFiles = (await readdir(eventsDir)).filter(file => /\.(ts|js)$/.test(file) && !/\.(test|d)\.ts$/.test(file))
    for (const file of eventFiles) {
        const event: DiscordEventListener = await import(pathToFileURL(path.join(eventsDir, file)).href)
        event.default(readyClient)
    }

    readyClient.user.setActivity(commandActivity(env.COMMAND_PREFIX))
    logger.ok(`Bot ready, listening for ${yellow(`${env.COMMAND_PREFIX}ss`)}`)
})

process.on('uncaughtException', err => {
    logger.error(`Uncaught exception: ${red(err.stack ?? err.message)}`)
    gracefulShutdown.shutdown('uncaughtException', 1).catch(() => process.exit(1))
})
process.on('unhandledRejection', reason => {
    logger.error(`Unhandled rejection, reason: ${red(errorMessage(reason))}`)
    gracefulShutdown.shutdown('unhandledRejection', 1).catch(() => process.exit(1))
})

logger.info('Logging in...')
await unreadyClient.login(env.DISCORD_TOKEN)
logger.ok('Logged in')

import { Logger, red } from '../util/logger'
const logger = new Logger('events.interactionCreate')

import type { Client } from 'discord.js'
import CommandManager from '../modules/CommandManager'
import { errorMessage } from '../util/functions'

export default function onInteractionCreate(client: Client<true>) {
    client.on('interactionCreate', interaction => {
        if (!interaction.isChatInputCommand()) return

        CommandManager.getInstance().handleInteraction(interaction).catch(err => {
            logger.warn(`Error while handling interaction!\n${red(err instanceof Error && err.stack ? err.stack : errorMessage(err))}`)
        })
    })
}

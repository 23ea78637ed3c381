import { Logger, red } from '../util/logger'
const logger = new Logger('events.messageCreate')

import type { Client } from 'discord.js'
import CommandManager from '../modules/CommandManager'
import { errorMessage } from '../util/functions'

export default function onMessageCreate(client: Client<true>) {
    client.on('messageCreate', message => {
        if (message.author.id === client.user.id) return

        CommandManager.getInstance().handleMessageCommand(message).catch(err => {
            logger.warn(`Error while handling message command!\n${red(err instanceof Error && err.stack ? err.stack : errorMessage(err))}`)
        })
    })
}

import { Logger, yellow, red } from '../util/logger'
const logger = new Logger('GracefulShutdown')

import type { Client } from 'discord.js'
import { errorMessage } from '../util/functions'

export class GracefulShutdown {
    private static instance: GracefulShutdown
    private client: Client | null = null
    private shuttingDown = false

    private constructor() {}

    public static getInstance(): GracefulShutdown {
        if (!GracefulShutdown.instance) {
            GracefulShutdown.instance = new GracefulShutdown()
        }
        return GracefulShutdown.instance
    }

    public setClient(client: Client): void {
        this.client = client
    }

    public async shutdown(signal: string, exitCode = 0): Promise<void> {
        if (this.shuttingDown) return
        this.shuttingDown = true

        if (!this.client) {
            logger.warn('Client not set for graceful shutdown! => process.exit(1)')
            process.exit(1)
        }

        logger.warn(`Received ${yellow(signal)}, initiating a graceful shutdown...`)

        try {
            this.client.user?.setStatus('dnd')
        } catch (error) {
            logger.warn(`Could not update bot status: ${red(errorMessage(error))}`)
        }

        try {
            await this.client.destroy()
            logger.ok('Discord client destroyed')
        } catch (error) {
            logger.warn(`Could not destroy client: ${red(errorMessage(error))}`)
        }

        process.exit(exitCode)
    }

    public registerShutdownHandlers(): void {
        const onSignal = (signal: NodeJS.Signals) => {
            this.shutdown(signal).catch(err => logger.error(`Shutdown failed: ${red(errorMessage(err))}`))
        }
        process.on('SIGTERM', onSignal)
        process.on('SIGINT', onSignal)
    }
}

export const gracefulShutdown = GracefulShutdown.getInstance()

import { SlashCommandBuilder } from 'discord.js'
import type { SlashCommand } from '../types/types'
import GuildConfigManager from '../modules/GuildConfig'
import { SETUP_CONFIRMATION_MS } from '../util/constants'
import { deleteAfter } from '../util/functions'

export default {
    data: new SlashCommandBuilder()
        .setName('darkmode')
        .setDescription('Switch screenshots to dark mode'),
    guildOnly: true,
    async execute(interaction) {
        if (!interaction.guildId) return
        await GuildConfigManager.getInstance().setConfig(interaction.guildId, { mode: 'dark' })
        await interaction.reply('🌙 Switched to **dark mode** for screenshots.')
        await deleteAfter(() => interaction.deleteReply(), SETUP_CONFIRMATION_MS)
    }
} satisfies SlashCommand

import { SlashCommandBuilder } from 'discord.js'
import type { SlashCommand } from '../types/types'
import GuildConfigManager from '../modules/GuildConfig'
import { SETUP_CONFIRMATION_MS } from '../util/constants'
import { deleteAfter } from '../util/functions'

export default {
    data: new SlashCommandBuilder()
        .setName('lightmode')
        .setDescription('Switch screenshots to light mode'),
    guildOnly: true,
    async execute(interaction) {
        if (!interaction.guildId) return
        await GuildConfigManager.getInstance().setConfig(interaction.guildId, { mode: 'light' })
        await interaction.reply('☀️ Switched to **light mode** for screenshots.')
        await deleteAfter(() => interaction.deleteReply(), SETUP_CONFIRMATION_MS)
    }
} satisfies SlashCommand

import { SlashCommandBuilder } from 'discord.js'
import type { SlashCommand } from '../types/types'
import GuildConfigManager from '../modules/GuildConfig'
import { isColorMode } from '../util/colors'
import { SETUP_CONFIRMATION_MS } from '../util/constants'
import { deleteAfter } from '../util/functions'

const MODE_NAMES = { light: 'Light Mode', dark: 'Dark Mode' } as const

export default {
    data: new SlashCommandBuilder()
        .setName('setup')
        .setDescription('Setup screenshot mode for this server')
        .addStringOption(so => so
            .setName('mode')
            .setDescription('Choose light or dark mode')
            .setRequired(true)
            .addChoices(
                { name: MODE_NAMES.light, value: 'light' },
                { name: MODE_NAMES.dark, value: 'dark' }
            )
        ),
    guildOnly: true,
    async execute(interaction) {
        const mode = interaction.options.getString('mode', true)
        if (!isColorMode(mode) || !interaction.guildId) {
            throw new Error(`Unknown mode ${mode}`)
        }
        await GuildConfigManager.getInstance().setConfig(interaction.guildId, { mode })
        await interaction.reply(`✅ Setup complete! Mode set to **${MODE_NAMES[mode]}**.`)
        await deleteAfter(() => interaction.deleteReply(), SETUP_CONFIRMATION_MS)
    }
} satisfies SlashCommand

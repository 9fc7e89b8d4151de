// bot/src/commands/character.ts
import {
    SlashCommandBuilder,
    ChatInputCommandInteraction,
    EmbedBuilder,
} from 'discord.js';
import type { SlashCommand } from './_types.js';
import { lookupCharacter, type CharacterSummaryDeps } from '../lib/character-summary.js';
import { formatFailureMessage } from '../lib/errors/error-handler.js';
import { handleUnhandledError } from '../lib/utilities/error-handlers.js';

/**
 * /character - Show level, class and worn items from the character page.
 */
export function createCharacterCommand(deps: CharacterSummaryDeps): SlashCommand {
    return {
        data: new SlashCommandBuilder()
            .setName('character')
            .setDescription('Show a character\'s level, class and equipment')
            .addStringOption(option =>
                option
                    .setName('name')
                    .setDescription('Character IGN (in-game name)')
                    .setRequired(true)
                    .setMaxLength(100)
            ),

        async run(interaction: ChatInputCommandInteraction) {
            const name = interaction.options.getString('name', true).trim();

            await interaction.deferReply();

            try {
                const result = await lookupCharacter(deps, name);

                if (!result.ok) {
                    await interaction.editReply(formatFailureMessage({
                        failure: result,
                        baseMessage: `❌ Could not look up ${name}`,
                    }));
                    return;
                }

                const summary = result.value;
                const embed = new EmbedBuilder()
                    .setTitle(summary.name)
                    .setDescription(`Level ${summary.level} ${summary.className}`)
                    .setColor(0x3498db)
                    .addFields(
                        { name: 'Guild', value: summary.guild, inline: true },
                        { name: 'Faction', value: summary.faction, inline: true },
                        { name: 'Helm', value: summary.helm, inline: true },
                        { name: 'Armor', value: summary.armor, inline: true },
                        { name: 'Cape', value: summary.cape, inline: true },
                        { name: 'Weapon', value: summary.weapon, inline: true },
                        { name: 'Pet', value: summary.pet, inline: true },
                    );

                await interaction.editReply({ embeds: [embed] });
            } catch (err) {
                await handleUnhandledError(interaction, err, 'Look up character');
            }
        }
    };
}

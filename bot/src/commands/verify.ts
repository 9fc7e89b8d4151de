// bot/src/commands/verify.ts
import {
    SlashCommandBuilder,
    ChatInputCommandInteraction,
    EmbedBuilder,
} from 'discord.js';
import type { SlashCommand } from './_types.js';
import { verifyCharacter, type VerificationDeps } from '../lib/verification.js';
import { formatFailureMessage } from '../lib/errors/error-handler.js';
import { handleUnhandledError } from '../lib/utilities/error-handlers.js';

/**
 * /verify - Check that a character's page shows the IGN and guild a member claims.
 */
export function createVerifyCommand(deps: VerificationDeps): SlashCommand {
    return {
        data: new SlashCommandBuilder()
            .setName('verify')
            .setDescription('Verify a character against its character page')
            .addStringOption(option =>
                option
                    .setName('name')
                    .setDescription('Character IGN (in-game name)')
                    .setRequired(true)
                    .setMaxLength(100)
            )
            .addStringOption(option =>
                option
                    .setName('guild')
                    .setDescription('Guild shown on the character page (leave empty if none)')
                    .setRequired(false)
                    .setMaxLength(100)
            ),

        async run(interaction: ChatInputCommandInteraction) {
            const ign = interaction.options.getString('name', true);
            const guild = interaction.options.getString('guild') ?? '';

            await interaction.deferReply();

            try {
                const result = await verifyCharacter(deps, { ign, guild });

                if (!result.ok) {
                    await interaction.editReply(formatFailureMessage({
                        failure: result,
                        baseMessage: '❌ Verification failed',
                    }));
                    return;
                }

                const report = result.value;
                const embed = new EmbedBuilder()
                    .setTitle('Verification Result')
                    .setColor(report.verified ? 0x2ecc71 : 0xe74c3c)
                    .addFields(
                        {
                            name: 'IGN Check',
                            value: `${report.nameMatches ? '✅ MATCH' : '❌ MISMATCH'}\nYou entered: \`${report.claim.ign}\`\nPage shows: \`${report.pageName}\``,
                        },
                        {
                            name: 'Guild Check',
                            value: `${report.guildMatches ? '✅ MATCH' : '❌ MISMATCH'}\nYou entered: \`${report.claim.guild || '(empty)'}\`\nPage shows: \`${report.pageGuild || '(none)'}\``,
                        },
                        {
                            name: 'Status',
                            value: report.verified
                                ? '✅ **Verification Successful!**'
                                : '❌ **Verification Failed** - Details do not match the character page.',
                        },
                    );

                await interaction.editReply({ embeds: [embed] });
            } catch (err) {
                await handleUnhandledError(interaction, err, 'Verify');
            }
        }
    };
}

// bot/src/commands/render.ts
import {
    SlashCommandBuilder,
    ChatInputCommandInteraction,
    AttachmentBuilder,
    EmbedBuilder,
} from 'discord.js';
import path from 'node:path';
import type { SlashCommand } from './_types.js';
import type { RenderOrchestrator } from '../services/renderer/orchestrator.js';
import { VIEW_MODES, type ViewMode } from '../services/charpage/equipment.js';
import { IMAGE_FORMATS, type ImageFormat } from '../services/renderer/protocol.js';
import { formatFailureMessage } from '../lib/errors/error-handler.js';
import { handleUnhandledError } from '../lib/utilities/error-handlers.js';

function asViewMode(value: string | null): ViewMode {
    return VIEW_MODES.find(mode => mode === value) ?? 'equipped';
}

function asImageFormat(value: string | null): ImageFormat {
    return IMAGE_FORMATS.find(format => format === value) ?? 'png';
}

/**
 * /render - Draw a character with the external render service.
 * Reports renderer outages explicitly instead of substituting another image.
 */
export function createRenderCommand(orchestrator: RenderOrchestrator): SlashCommand {
    return {
        data: new SlashCommandBuilder()
            .setName('render')
            .setDescription('Render a character image from the character page')
            .addStringOption(option =>
                option
                    .setName('name')
                    .setDescription('Character IGN (in-game name)')
                    .setRequired(true)
                    .setMaxLength(100)
            )
            .addStringOption(option =>
                option
                    .setName('view')
                    .setDescription('Show equipped gear or cosmetics')
                    .setRequired(false)
                    .addChoices(
                        { name: 'Equipped', value: 'equipped' },
                        { name: 'Cosmetic', value: 'cosmetic' },
                    )
            )
            .addStringOption(option =>
                option
                    .setName('format')
                    .setDescription('Image format')
                    .setRequired(false)
                    .addChoices(
                        { name: 'PNG', value: 'png' },
                        { name: 'GIF', value: 'gif' },
                    )
            ),

        async run(interaction: ChatInputCommandInteraction) {
            const name = interaction.options.getString('name', true).trim();
            const view = asViewMode(interaction.options.getString('view'));
            const format = asImageFormat(interaction.options.getString('format'));

            // Rendering takes a while; defer so the interaction token stays valid
            await interaction.deferReply();

            try {
                const outcome = await orchestrator.render(name, { view, format });

                if (!outcome.ok) {
                    await interaction.editReply(formatFailureMessage({
                        failure: outcome,
                        baseMessage: `❌ Could not render ${name}`,
                    }));
                    return;
                }

                const artifact = outcome.value;
                const fileName = path.basename(artifact.path);
                const attachment = new AttachmentBuilder(artifact.bytes, { name: fileName });
                const embed = new EmbedBuilder()
                    .setTitle(artifact.username)
                    .setDescription(artifact.view === 'cosmetic' ? 'Cosmetic view' : 'Equipped view')
                    .setImage(`attachment://${fileName}`)
                    .setColor(0x2ecc71);

                await interaction.editReply({ embeds: [embed], files: [attachment] });
            } catch (err) {
                await handleUnhandledError(interaction, err, 'Render');
            }
        }
    };
}

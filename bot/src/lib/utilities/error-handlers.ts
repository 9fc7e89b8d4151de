import { ChatInputCommandInteraction } from 'discord.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('Commands');

/**
 * Outermost handler for exceptions that escape a command's own result handling.
 * Logs the error and tells the member something went wrong.
 *
 * @example
 * try {
 *     // Command logic
 * } catch (err) {
 *     await handleUnhandledError(interaction, err, 'Render');
 * }
 */
export async function handleUnhandledError(
    interaction: ChatInputCommandInteraction,
    error: unknown,
    context: string
): Promise<void> {
    logger.error('Unhandled command error', { command: context, error });
    await safeErrorReply(interaction, `❌ **Failed to ${context.toLowerCase()}**\n\nAn unexpected error occurred. Please try again later.`);
}

/**
 * Replies or edits the reply with an error message, depending on interaction state.
 */
export async function safeErrorReply(
    interaction: ChatInputCommandInteraction,
    message: string
): Promise<void> {
    try {
        if (interaction.deferred || interaction.replied) {
            await interaction.editReply(message);
        } else {
            await interaction.reply({ content: message });
        }
    } catch (err) {
        logger.error('Failed to send error message', { error: err });
    }
}

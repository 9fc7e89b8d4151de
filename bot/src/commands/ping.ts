import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import type { SlashCommand } from './_types.js';
import type { AvailabilityProbe } from '../services/renderer/availability.js';

export function createPingCommand(monitor: AvailabilityProbe): SlashCommand {
    return {
        data: new SlashCommandBuilder()
            .setName('ping')
            .setDescription('Replies with latency and render service status.'),
        async run(interaction: ChatInputCommandInteraction) {
            const sent = Date.now();
            await interaction.deferReply();
            const online = await monitor.isAvailable();
            const latency = Date.now() - sent;
            await interaction.editReply(
                `Pong! Latency: ~${latency} ms\nRenderer: ${online ? '🟢 online' : '🔴 offline'}`
            );
        }
    };
}

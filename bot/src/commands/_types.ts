// src/commands/_types.ts
import type {
    ChatInputCommandInteraction,
    SlashCommandOptionsOnlyBuilder,
    SlashCommandBuilder,
} from 'discord.js';

export type SlashCommand = {
    data: SlashCommandBuilder | SlashCommandOptionsOnlyBuilder;
    run: (interaction: ChatInputCommandInteraction) => Promise<void>;
};

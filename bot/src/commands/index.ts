import { REST, Routes } from 'discord.js';
import type { SlashCommand } from './_types.js';
import type { BotServices } from '../services/index.js';
import { createRenderCommand } from './render.js';
import { createVerifyCommand } from './verify.js';
import { createPingCommand } from './ping.js';
import { createCharacterCommand } from './character.js';

export function buildCommands(services: BotServices): SlashCommand[] {
    return [
        createRenderCommand(services.orchestrator),
        createVerifyCommand({ pages: services.pages, allowUnknownKeys: services.allowUnknownKeys }),
        createCharacterCommand({ pages: services.pages, allowUnknownKeys: services.allowUnknownKeys }),
        createPingCommand(services.monitor),
    ];
}

export function toJSON(commands: SlashCommand[]) {
    return commands.map(c => c.data.toJSON());
}

export async function registerAll(rest: REST, appId: string, guildId: string, commands: SlashCommand[]) {
    const body = toJSON(commands);
    await rest.put(Routes.applicationGuildCommands(appId, guildId), { body });
    return body.map(c => c.name);
}

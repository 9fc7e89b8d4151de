// src/index.ts
import 'dotenv/config';

import {
    Client,
    GatewayIntentBits,
    Interaction,
} from 'discord.js';
import { loadBotConfig } from './config.js';
import { createServices } from './services/index.js';
import { buildCommands } from './commands/index.js';
import { createLogger } from './lib/logging/logger.js';

const logger = createLogger('Bot');

const botConfig = loadBotConfig();
const services = createServices(botConfig);
const commands = buildCommands(services);

const client = new Client({
    intents: [GatewayIntentBits.Guilds],
});

client.once('ready', async () => {
    const rendererOnline = await services.monitor.isAvailable();
    logger.info('Logged in', {
        tag: client.user?.tag,
        renderer: `${services.renderer.host}:${services.renderer.port}`,
        rendererOnline,
    });
});

client.on('interactionCreate', async (interaction: Interaction) => {
    if (!interaction.isChatInputCommand()) return;

    const cmd = commands.find(c => c.data.name === interaction.commandName);
    if (!cmd) return;

    try {
        await cmd.run(interaction);
    } catch (e) {
        logger.error('Command failed', { command: interaction.commandName, error: e });
        const msg = 'Something went wrong.';
        interaction.deferred || interaction.replied
            ? await interaction.followUp({ content: msg })
            : await interaction.reply({ content: msg });
    }
});

const shutdown = async (signal: string): Promise<void> => {
    logger.info('Shutting down', { signal });
    await client.destroy();
    process.exit(0);
};

process.once('SIGINT', () => void shutdown('SIGINT'));
process.once('SIGTERM', () => void shutdown('SIGTERM'));

await client.login(botConfig.SECRET_KEY);

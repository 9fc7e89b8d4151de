import 'dotenv/config';

import { REST } from 'discord.js';
import { loadBotConfig } from './config.js';
import { createServices } from './services/index.js';
import { buildCommands, registerAll } from './commands/index.js';

const botConfig = loadBotConfig();
const rest = new REST({ version: '10' }).setToken(botConfig.SECRET_KEY);
const commands = buildCommands(createServices(botConfig));

async function main() {
    console.log(`📝 Registering commands to ${botConfig.GUILD_IDS.length} guild(s)...`);

    for (const guildId of botConfig.GUILD_IDS) {
        try {
            const names = await registerAll(rest, botConfig.APPLICATION_ID, guildId, commands);
            console.log(`✅ Guild ${guildId}: Registered ${names.join(', ')}`);
        } catch (err) {
            console.error(`❌ Guild ${guildId}: Failed to register commands:`, err);
        }
    }

    console.log('\n🎉 Command registration complete!');
}

main().catch(err => {
    console.error(err);
    process.exit(1);
});

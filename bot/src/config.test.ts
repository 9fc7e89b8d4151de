import { parseBotConfig } from './config.js';

const REQUIRED = {
    APPLICATION_ID: '100000000000000001',
    SECRET_KEY: 'test-secret',
    DISCORD_GUILD_IDS: '200000000000000001',
};

describe('parseBotConfig', () => {
    it('fills defaults for everything optional', () => {
        const result = parseBotConfig(REQUIRED);

        expect(result.success).toBe(true);
        if (!result.success) return;
        expect(result.config).toMatchObject({
            CHARPAGE_URL: 'https://account.aq.com/CharPage',
            CHARPAGE_TIMEOUT_MS: 10000,
            CHARPAGE_ALLOW_UNKNOWN_KEYS: false,
            ASSET_BASE_URL: 'https://game.aq.com/game/gamefiles/',
            RENDERER_HOST: '127.0.0.1',
            RENDERER_PORT: 4567,
            RENDERER_TIMEOUT_MS: 20000,
            RENDERER_PROBE_TIMEOUT_MS: 2000,
            RENDERER_REQUEST_FRAMING: 'newline',
            RENDERER_REPLY_FRAMING: 'eof',
            RENDER_OUTPUT_DIR: 'renders',
            GUILD_IDS: ['200000000000000001'],
        });
    });

    it('splits and trims the guild list', () => {
        const result = parseBotConfig({ ...REQUIRED, DISCORD_GUILD_IDS: ' 1, 2 ,,3 ' });
        expect(result.success && result.config.GUILD_IDS).toEqual(['1', '2', '3']);
    });

    it('coerces numeric and boolean settings', () => {
        const result = parseBotConfig({
            ...REQUIRED,
            RENDERER_PORT: '5000',
            RENDERER_TIMEOUT_MS: '1500',
            CHARPAGE_ALLOW_UNKNOWN_KEYS: '1',
            RENDERER_REQUEST_FRAMING: 'half-close',
        });

        expect(result.success).toBe(true);
        if (!result.success) return;
        expect(result.config.RENDERER_PORT).toBe(5000);
        expect(result.config.RENDERER_TIMEOUT_MS).toBe(1500);
        expect(result.config.CHARPAGE_ALLOW_UNKNOWN_KEYS).toBe(true);
        expect(result.config.RENDERER_REQUEST_FRAMING).toBe('half-close');
    });

    it('lists every missing required variable', () => {
        const result = parseBotConfig({});

        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.issues.map(issue => issue.split(':')[0])).toEqual(['APPLICATION_ID', 'SECRET_KEY', 'DISCORD_GUILD_IDS']);
    });

    it('rejects an out-of-range port', () => {
        const result = parseBotConfig({ ...REQUIRED, RENDERER_PORT: '70000' });

        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.issues).toHaveLength(1);
        expect(result.issues[0]?.startsWith('RENDERER_PORT: ')).toBe(true);
    });

    it('rejects a guild list with no IDs', () => {
        const result = parseBotConfig({ ...REQUIRED, DISCORD_GUILD_IDS: ' , ' });

        expect(result).toEqual({ success: false, issues: ['DISCORD_GUILD_IDS: At least one guild ID is required'] });
    });

    it('rejects an unknown framing', () => {
        const result = parseBotConfig({ ...REQUIRED, RENDERER_REPLY_FRAMING: 'length-prefixed' });
        expect(result.success).toBe(false);
    });
});

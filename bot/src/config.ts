import { z } from "zod";

const booleanFlag = z
    .enum(["true", "false", "1", "0"])
    .default("false")
    .transform(v => v === "true" || v === "1");

const EnvSchema = z.object({
    APPLICATION_ID: z.string().min(1, "APPLICATION_ID is required (Discord application ID)"),
    SECRET_KEY: z.string().min(1, "SECRET_KEY is required (bot token)"),
    DISCORD_GUILD_IDS: z.string().min(1, "DISCORD_GUILD_IDS is required (comma-separated list of server IDs)"),

    // Upstream character page
    CHARPAGE_URL: z.string().url("CHARPAGE_URL must be a valid URL").default("https://account.aq.com/CharPage"),
    CHARPAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    CHARPAGE_ALLOW_UNKNOWN_KEYS: booleanFlag, // unknown FlashVars keys fail the parse unless set

    // Render service
    ASSET_BASE_URL: z.string().url("ASSET_BASE_URL must be a valid URL").default("https://game.aq.com/game/gamefiles/"),
    RENDERER_HOST: z.string().min(1).default("127.0.0.1"),
    RENDERER_PORT: z.coerce.number().int().min(1).max(65535).default(4567),
    RENDERER_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
    RENDERER_PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
    RENDERER_REQUEST_FRAMING: z.enum(["newline", "half-close"]).default("newline"),
    RENDERER_REPLY_FRAMING: z.enum(["eof", "newline"]).default("eof"),
    RENDER_OUTPUT_DIR: z.string().min(1).default("renders"),
});

type EnvConfig = z.infer<typeof EnvSchema>;

export type BotConfig = EnvConfig & {
    GUILD_IDS: string[]; // Parsed array of guild IDs
};

export type ConfigParseResult =
    | { success: true; config: BotConfig }
    | { success: false; issues: string[] };

/**
 * Validate an environment map without side effects.
 */
export function parseBotConfig(env: Record<string, string | undefined>): ConfigParseResult {
    const parsed = EnvSchema.safeParse(env);

    if (!parsed.success) {
        return {
            success: false,
            issues: parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`),
        };
    }

    const guildIds = parsed.data.DISCORD_GUILD_IDS
        .split(',')
        .map(id => id.trim())
        .filter(id => id.length > 0);

    if (guildIds.length === 0) {
        return { success: false, issues: ["DISCORD_GUILD_IDS: At least one guild ID is required"] };
    }

    return {
        success: true,
        config: { ...parsed.data, GUILD_IDS: guildIds },
    };
}

/**
 * Load config from process.env, exiting the process on invalid configuration.
 */
export const loadBotConfig = (): BotConfig => {
    const result = parseBotConfig(process.env);

    if (!result.success) {
        console.error("❌ Invalid bot environment configuration:");
        for (const issue of result.issues) {
            console.error(`- ${issue}`);
        }
        process.exit(1);
    }

    return result.config;
};

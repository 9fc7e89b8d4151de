/**
 * Explicit construction of the character page and renderer services.
 * Created once at startup and passed to whoever needs them.
 */

import type { BotConfig } from '../config.js';
import { CharacterPageFetcher } from './charpage/http.js';
import { RenderProtocolClient } from './renderer/protocol.js';
import { RendererAvailabilityMonitor } from './renderer/availability.js';
import { RenderOrchestrator } from './renderer/orchestrator.js';

export interface BotServices {
    pages: CharacterPageFetcher;
    renderer: RenderProtocolClient;
    monitor: RendererAvailabilityMonitor;
    orchestrator: RenderOrchestrator;
    allowUnknownKeys: boolean;
}

export type ServiceConfig = Pick<
    BotConfig,
    | 'CHARPAGE_URL'
    | 'CHARPAGE_TIMEOUT_MS'
    | 'CHARPAGE_ALLOW_UNKNOWN_KEYS'
    | 'ASSET_BASE_URL'
    | 'RENDERER_HOST'
    | 'RENDERER_PORT'
    | 'RENDERER_TIMEOUT_MS'
    | 'RENDERER_PROBE_TIMEOUT_MS'
    | 'RENDERER_REQUEST_FRAMING'
    | 'RENDERER_REPLY_FRAMING'
    | 'RENDER_OUTPUT_DIR'
>;

export function createServices(config: ServiceConfig): BotServices {
    const pages = new CharacterPageFetcher({
        baseUrl: config.CHARPAGE_URL,
        timeoutMs: config.CHARPAGE_TIMEOUT_MS,
    });
    const renderer = new RenderProtocolClient({
        host: config.RENDERER_HOST,
        port: config.RENDERER_PORT,
        timeoutMs: config.RENDERER_TIMEOUT_MS,
        requestFraming: config.RENDERER_REQUEST_FRAMING,
        replyFraming: config.RENDERER_REPLY_FRAMING,
    });
    const monitor = new RendererAvailabilityMonitor({
        host: config.RENDERER_HOST,
        port: config.RENDERER_PORT,
        timeoutMs: config.RENDERER_PROBE_TIMEOUT_MS,
    });
    const orchestrator = new RenderOrchestrator({
        pages,
        renderer,
        monitor,
        outputDir: config.RENDER_OUTPUT_DIR,
        assetBaseUrl: config.ASSET_BASE_URL,
        allowUnknownKeys: config.CHARPAGE_ALLOW_UNKNOWN_KEYS,
    });

    return {
        pages,
        renderer,
        monitor,
        orchestrator,
        allowUnknownKeys: config.CHARPAGE_ALLOW_UNKNOWN_KEYS,
    };
}

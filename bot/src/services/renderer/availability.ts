/**
 * Renderer availability probe: connect, close, report. Never throws.
 */

import net from 'node:net';
import { createLogger } from '../../lib/logging/logger.js';
import { DEFAULT_RENDERER_HOST, DEFAULT_RENDERER_PORT } from './protocol.js';

const logger = createLogger('RendererMonitor');

export const DEFAULT_PROBE_TIMEOUT_MS = 2_000;

export interface AvailabilityProbe {
    isAvailable(signal?: AbortSignal): Promise<boolean>;
}

export interface RendererAvailabilityMonitorOptions {
    host?: string;
    port?: number;
    timeoutMs?: number;
}

export class RendererAvailabilityMonitor implements AvailabilityProbe {
    readonly host: string;
    readonly port: number;
    private readonly timeoutMs: number;

    constructor(options: RendererAvailabilityMonitorOptions = {}) {
        this.host = options.host ?? DEFAULT_RENDERER_HOST;
        this.port = options.port ?? DEFAULT_RENDERER_PORT;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    }

    isAvailable(signal?: AbortSignal): Promise<boolean> {
        if (signal?.aborted) {
            return Promise.resolve(false);
        }

        return new Promise<boolean>(resolve => {
            const socket = net.createConnection({ host: this.host, port: this.port });
            let settled = false;

            const finish = (available: boolean, detail?: string): void => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                signal?.removeEventListener('abort', onAbort);
                socket.destroy();
                if (!available) {
                    logger.debug('Render service probe failed', { host: this.host, port: this.port, detail });
                }
                resolve(available);
            };

            const onAbort = (): void => finish(false, 'aborted');
            const timer = setTimeout(() => finish(false, `no answer within ${this.timeoutMs} ms`), this.timeoutMs);

            signal?.addEventListener('abort', onAbort, { once: true });
            socket.once('connect', () => finish(true));
            socket.once('error', (error: Error) => finish(false, error.message));
        });
    }
}

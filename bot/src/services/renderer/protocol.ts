/**
 * Render service wire protocol.
 *
 * One connection per request: connect, write a single JSON document
 * `{"type":"character","format":...,"data":<RenderRequest>}`, read the reply,
 * close. The reply is a JSON object carrying a Base64 image
 * (`{"success":true,"format":"png","image":"..."}`) or an error
 * (`{"success":false,"error":"..."}`). Older builds of the service answer with
 * the payload under `png`, `data` or `result`, or with bare Base64; both are
 * accepted.
 *
 * Framing is configurable because the service has shipped both conventions:
 * - request: `newline` appends "\n" and keeps the write side open,
 *   `half-close` ends the write side after the document.
 * - reply: `eof` reads until the service closes, `newline` stops at the
 *   first line break.
 */

import net from 'node:net';
import { z } from 'zod';
import { fail, succeed, type Failure, type Outcome } from '../result.js';
import type { RenderRequest } from '../charpage/equipment.js';
import { createLogger } from '../../lib/logging/logger.js';

const logger = createLogger('RenderProtocol');

export const DEFAULT_RENDERER_HOST = '127.0.0.1';
export const DEFAULT_RENDERER_PORT = 4567;
export const DEFAULT_RENDER_TIMEOUT_MS = 20_000;
export const MAX_REPLY_BYTES = 32 * 1024 * 1024;

export type ImageFormat = 'png' | 'gif';

export const IMAGE_FORMATS: readonly ImageFormat[] = ['png', 'gif'];

export type RequestFraming = 'newline' | 'half-close';
export type ReplyFraming = 'eof' | 'newline';

export interface RenderedImage {
    bytes: Buffer;
    format: ImageFormat;
}

export type RenderTransportFailure =
    | 'ConnectionRefused'
    | 'ConnectionReset'
    | 'Timeout'
    | 'NetworkError'
    | 'ProtocolError'
    | 'RenderFailed'
    | 'Cancelled';

export type RenderTransportResult = Outcome<RenderedImage, RenderTransportFailure>;

export interface RenderTransport {
    render(request: RenderRequest, format: ImageFormat, signal?: AbortSignal): Promise<RenderTransportResult>;
}

export interface RenderProtocolClientOptions {
    host?: string;
    port?: number;
    timeoutMs?: number;
    requestFraming?: RequestFraming;
    replyFraming?: ReplyFraming;
    maxReplyBytes?: number;
}

export interface RenderEnvelope {
    type: 'character';
    format: ImageFormat;
    data: RenderRequest;
}

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const GIF_SIGNATURES = [Buffer.from('GIF87a', 'ascii'), Buffer.from('GIF89a', 'ascii')];

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

const ReplySchema = z.object({
    success: z.boolean().optional(),
    error: z.string().optional(),
    format: z.string().optional(),
    image: z.string().optional(),
    png: z.string().optional(),
    data: z.string().optional(),
    result: z.string().optional(),
});

/**
 * Identify an image format from its leading bytes.
 */
export function detectImageFormat(bytes: Buffer): ImageFormat | null {
    if (bytes.length >= PNG_SIGNATURE.length && bytes.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE)) {
        return 'png';
    }
    if (bytes.length >= 6 && GIF_SIGNATURES.some(sig => bytes.subarray(0, 6).equals(sig))) {
        return 'gif';
    }
    return null;
}

function isImageFormat(value: string): value is ImageFormat {
    return value === 'png' || value === 'gif';
}

function decodeBase64Image(payload: string, declared: ImageFormat | null): Outcome<RenderedImage, 'ProtocolError'> {
    const cleaned = payload.replace(/^data:image\/[a-z]+;base64,/i, '').replace(/\s+/g, '');
    if (cleaned.length === 0 || !BASE64_PATTERN.test(cleaned)) {
        return fail('ProtocolError', 'Render service payload is not valid Base64.');
    }

    const bytes = Buffer.from(cleaned, 'base64');
    const detected = detectImageFormat(bytes);
    if (detected === null) {
        return fail('ProtocolError', 'Render service payload is not a PNG or GIF image.');
    }
    if (declared !== null && declared !== detected) {
        return fail('ProtocolError', `Render service declared ${declared} but sent ${detected} data.`);
    }

    return succeed({ bytes, format: detected });
}

/**
 * Turn a raw reply into an image or a typed failure.
 */
export function decodeRenderReply(raw: Buffer): Outcome<RenderedImage, 'ProtocolError' | 'RenderFailed'> {
    const text = raw.toString('utf8').trim();
    if (text.length === 0) {
        return fail('ProtocolError', 'Empty response from render service.');
    }

    if (!text.startsWith('{')) {
        return decodeBase64Image(text, null);
    }

    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch {
        return fail('ProtocolError', 'Render service reply is not valid JSON.');
    }

    const parsed = ReplySchema.safeParse(json);
    if (!parsed.success) {
        return fail('ProtocolError', 'Render service reply has unexpected field types.');
    }

    const reply = parsed.data;
    const payload = reply.image ?? reply.png ?? reply.data ?? reply.result;

    if (reply.success === false || (reply.error !== undefined && payload === undefined)) {
        return fail('RenderFailed', reply.error ?? 'Render service reported a failure.');
    }
    if (payload === undefined) {
        return fail('ProtocolError', 'Render service reply is missing image data.');
    }

    let declared: ImageFormat | null = null;
    if (reply.format !== undefined) {
        const format = reply.format.toLowerCase();
        if (!isImageFormat(format)) {
            return fail('ProtocolError', `Render service reply has unknown format "${reply.format}".`);
        }
        declared = format;
    }

    return decodeBase64Image(payload, declared);
}

function socketErrorFailure(error: Error, connected: boolean): Failure<RenderTransportFailure> {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    switch (code) {
        case 'ECONNREFUSED':
            return fail('ConnectionRefused', 'Render service is not accepting connections.');
        case 'ECONNRESET':
        case 'EPIPE':
            return fail('ConnectionReset', 'Render service closed the connection unexpectedly.');
        case 'ETIMEDOUT':
            return fail('Timeout', 'Connection to the render service timed out.');
        default:
            return connected
                ? fail('ConnectionReset', `Render connection failed: ${error.message}`)
                : fail('NetworkError', `Could not connect to the render service: ${error.message}`);
    }
}

export class RenderProtocolClient implements RenderTransport {
    readonly host: string;
    readonly port: number;
    private readonly timeoutMs: number;
    private readonly requestFraming: RequestFraming;
    private readonly replyFraming: ReplyFraming;
    private readonly maxReplyBytes: number;

    constructor(options: RenderProtocolClientOptions = {}) {
        this.host = options.host ?? DEFAULT_RENDERER_HOST;
        this.port = options.port ?? DEFAULT_RENDERER_PORT;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_RENDER_TIMEOUT_MS;
        this.requestFraming = options.requestFraming ?? 'newline';
        this.replyFraming = options.replyFraming ?? 'eof';
        this.maxReplyBytes = options.maxReplyBytes ?? MAX_REPLY_BYTES;
    }

    /**
     * Send one render request on a fresh connection. The socket is destroyed
     * on every terminal outcome, including timeout and abort.
     */
    render(request: RenderRequest, format: ImageFormat, signal?: AbortSignal): Promise<RenderTransportResult> {
        if (signal?.aborted) {
            return Promise.resolve(fail('Cancelled', 'Render was cancelled before it started.'));
        }

        const envelope: RenderEnvelope = { type: 'character', format, data: request };
        const payload = JSON.stringify(envelope);
        const started = Date.now();

        return new Promise<RenderTransportResult>(resolve => {
            const socket = net.createConnection({ host: this.host, port: this.port });
            const chunks: Buffer[] = [];
            let received = 0;
            let connected = false;
            let settled = false;

            const finish = (result: RenderTransportResult): void => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                signal?.removeEventListener('abort', onAbort);
                socket.destroy();

                const duration = Date.now() - started;
                if (result.ok) {
                    logger.info('Render completed', { host: this.host, port: this.port, format: result.value.format, bytes: result.value.bytes.length, duration });
                } else {
                    logger.warn('Render failed', { host: this.host, port: this.port, reason: result.reason, message: result.message, duration });
                }
                resolve(result);
            };

            const onAbort = (): void => finish(fail('Cancelled', 'Render was cancelled.'));

            const timer = setTimeout(
                () => finish(fail('Timeout', `Render service did not answer within ${this.timeoutMs} ms.`)),
                this.timeoutMs
            );

            signal?.addEventListener('abort', onAbort, { once: true });

            socket.once('connect', () => {
                connected = true;
                logger.debug('Connected to render service', { host: this.host, port: this.port, requestBytes: payload.length });
                if (this.requestFraming === 'newline') {
                    socket.write(`${payload}\n`, 'utf8');
                } else {
                    socket.end(payload, 'utf8');
                }
            });

            socket.on('data', (chunk: Buffer) => {
                received += chunk.length;
                if (received > this.maxReplyBytes) {
                    finish(fail('ProtocolError', `Render service reply exceeds ${this.maxReplyBytes} bytes.`));
                    return;
                }
                chunks.push(chunk);

                if (this.replyFraming === 'newline') {
                    const newline = chunk.indexOf(0x0a);
                    if (newline !== -1) {
                        const all = Buffer.concat(chunks);
                        finish(decodeRenderReply(all.subarray(0, all.indexOf(0x0a))));
                    }
                }
            });

            socket.once('end', () => {
                finish(decodeRenderReply(Buffer.concat(chunks)));
            });

            socket.once('error', (error: Error) => {
                finish(socketErrorFailure(error, connected));
            });

            socket.once('close', () => {
                finish(fail('ConnectionReset', 'Render service closed the connection before replying.'));
            });
        });
    }
}

/**
 * In-process stand-in for the render service.
 *
 * Usage:
 * ```ts
 * const server = await startRenderServer((request, socket) => {
 *     socket.end(JSON.stringify({ success: true, format: 'png', image: TEST_PNG.toString('base64') }));
 * });
 * // ... point a RenderProtocolClient at server.port
 * await server.close();
 * ```
 */

import net from 'node:net';

export type RequestHandler = (request: string, socket: net.Socket) => void;

export interface RenderServer {
    port: number;
    /** Every request document received, without its terminator */
    requests: string[];
    connections: number;
    close(): Promise<void>;
}

export interface RenderServerOptions {
    /** `newline`: a request is complete at "\n"; `half-close`: when the client ends its side */
    framing?: 'newline' | 'half-close';
}

function listen(server: net.Server): Promise<number> {
    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(0, '127.0.0.1', () => {
            const address = server.address();
            if (address === null || typeof address === 'string') {
                reject(new Error('server has no TCP address'));
                return;
            }
            resolve(address.port);
        });
    });
}

export async function startRenderServer(handler: RequestHandler, options: RenderServerOptions = {}): Promise<RenderServer> {
    const framing = options.framing ?? 'newline';
    const sockets = new Set<net.Socket>();
    const requests: string[] = [];
    let connections = 0;

    const server = net.createServer({ allowHalfOpen: framing === 'half-close' }, socket => {
        connections += 1;
        sockets.add(socket);
        socket.on('close', () => sockets.delete(socket));
        socket.on('error', () => sockets.delete(socket));

        let buffer = '';
        let handled = false;
        const dispatch = (request: string): void => {
            if (handled) return;
            handled = true;
            requests.push(request);
            handler(request, socket);
        };

        socket.setEncoding('utf8');
        socket.on('data', (chunk: string) => {
            buffer += chunk;
            const newline = buffer.indexOf('\n');
            if (framing === 'newline' && newline !== -1) {
                dispatch(buffer.slice(0, newline));
            }
        });
        socket.on('end', () => {
            if (framing === 'half-close') {
                dispatch(buffer);
            }
        });
    });

    const port = await listen(server);

    return {
        port,
        requests,
        get connections() {
            return connections;
        },
        close: () =>
            new Promise<void>(resolve => {
                for (const socket of sockets) socket.destroy();
                server.close(() => resolve());
            }),
    };
}

/**
 * A server that accepts and immediately closes every connection.
 */
export async function startAcceptingServer(): Promise<{ port: number; close(): Promise<void> }> {
    const server = net.createServer(socket => socket.end());
    const port = await listen(server);
    return {
        port,
        close: () => new Promise<void>(resolve => server.close(() => resolve())),
    };
}

/**
 * A port that was free a moment ago and has nothing listening on it.
 */
export async function unusedPort(): Promise<number> {
    const server = net.createServer();
    const port = await listen(server);
    await new Promise<void>(resolve => server.close(() => resolve()));
    return port;
}

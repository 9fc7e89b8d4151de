/**
 * HTTP access to the upstream character page.
 *
 * One GET per call, bounded by a timeout, no retries. Retry policy belongs to
 * whoever calls this.
 */

import { randomUUID } from 'crypto';
import { fail, succeed, type Outcome } from '../result.js';
import { logHttpError, logHttpStart, logHttpSuccess, logHttpTimeout } from '../../lib/logging/http-logger.js';

export const DEFAULT_CHARPAGE_URL = 'https://account.aq.com/CharPage';

export const DEFAULT_CHARPAGE_TIMEOUT_MS = 10_000;

/**
 * Text the upstream site shows in place of a character that does not exist
 * or has been deactivated.
 */
export const MISSING_CHARACTER_MARKER = 'is wandering in the Void';

/**
 * Browser User-Agent strings; the upstream site rejects obvious bots.
 */
const USER_AGENTS = [
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:121.0) Gecko/20100101 Firefox/121.0',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 13_0) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/118.0.5993.117 Safari/537.36',
];

function getRandomUserAgent(): string {
    return USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)];
}

export interface CharacterPage {
    username: string;
    url: string;
    html: string;
}

export type FetchPageResult = Outcome<CharacterPage, 'NotFound' | 'NetworkError' | 'UpstreamError' | 'Cancelled'>;

export interface CharacterPageSource {
    fetchPage(username: string, signal?: AbortSignal): Promise<FetchPageResult>;
}

export interface CharacterPageFetcherOptions {
    baseUrl?: string;
    timeoutMs?: number;
    /** Injected fetch; defaults to the global one */
    fetchImpl?: typeof fetch;
}

/**
 * Build the full URL for a character page.
 * @param username The character's in-game name
 */
export function buildCharPageUrl(username: string, baseUrl: string = DEFAULT_CHARPAGE_URL): string {
    const url = new URL(baseUrl);
    url.searchParams.set('id', username);
    return url.toString();
}

/**
 * Quick check for whether a page carries a FlashVars block at all.
 * The parser does the real extraction.
 */
function mentionsFlashVars(html: string): boolean {
    return /flashvars/i.test(html);
}

export class CharacterPageFetcher implements CharacterPageSource {
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly fetchImpl: typeof fetch;

    constructor(options: CharacterPageFetcherOptions = {}) {
        this.baseUrl = options.baseUrl ?? DEFAULT_CHARPAGE_URL;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_CHARPAGE_TIMEOUT_MS;
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    async fetchPage(username: string, signal?: AbortSignal): Promise<FetchPageResult> {
        const name = username.trim();
        if (name.length === 0) {
            return fail('NotFound', 'Character name is empty.');
        }
        if (signal?.aborted) {
            return fail('Cancelled', 'Character page request was cancelled.');
        }

        const url = buildCharPageUrl(name, this.baseUrl);
        const requestId = randomUUID();
        const started = Date.now();
        const timeoutSignal = AbortSignal.timeout(this.timeoutMs);
        const combined = signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;

        logHttpStart({ requestId, method: 'GET', url, username: name });

        let status: number;
        let html: string;
        try {
            const response = await this.fetchImpl(url, {
                headers: {
                    'User-Agent': getRandomUserAgent(),
                    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                    'Accept-Language': 'en-US,en;q=0.5',
                },
                redirect: 'follow',
                signal: combined,
            });
            status = response.status;
            html = await response.text();
        } catch (error) {
            const duration = Date.now() - started;
            if (signal?.aborted) {
                logHttpError({ requestId, method: 'GET', url, username: name, duration, error: 'cancelled' });
                return fail('Cancelled', 'Character page request was cancelled.');
            }
            if (timeoutSignal.aborted) {
                logHttpTimeout({ requestId, method: 'GET', url, username: name, duration });
                return fail('NetworkError', `Character page did not respond within ${this.timeoutMs} ms.`);
            }
            const message = error instanceof Error ? error.message : String(error);
            logHttpError({ requestId, method: 'GET', url, username: name, duration, error: message });
            return fail('NetworkError', `Could not reach the character page: ${message}`);
        }

        const duration = Date.now() - started;

        if (status === 404) {
            logHttpError({ requestId, method: 'GET', url, username: name, status, duration });
            return fail('NotFound', `Character "${name}" was not found.`, status);
        }

        if (status !== 200) {
            logHttpError({ requestId, method: 'GET', url, username: name, status, duration });
            return fail('UpstreamError', `Character page returned status ${status}.`, status);
        }

        if (!mentionsFlashVars(html) && html.includes(MISSING_CHARACTER_MARKER)) {
            logHttpSuccess({ requestId, method: 'GET', url, username: name, status, duration, found: false });
            return fail('NotFound', `Character "${name}" is inactive or does not exist.`, status);
        }

        logHttpSuccess({ requestId, method: 'GET', url, username: name, status, duration, found: true });
        return succeed({ username: name, url, html });
    }
}

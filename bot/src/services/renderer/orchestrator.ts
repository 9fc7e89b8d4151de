/**
 * Render Orchestrator
 *
 * Drives one render from username to image file:
 *
 *   Idle → Fetching → Parsing → BuildingModel → ProbingRenderer → Rendering → Persisting → Done
 *
 * Any stage can end the run in Failed with that stage's reason. Nothing is
 * retried, and there is no second rendering path: when the render service is
 * down the caller gets RendererOffline and decides what to tell the user.
 */

import { randomUUID } from 'crypto';
import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { fail, succeed, type Failure, type FailureReason, type Success } from '../result.js';
import type { CharacterPageSource } from '../charpage/http.js';
import { parseFlashVars } from '../charpage/flashvars.js';
import { buildRenderRequest, type ColorClampWarning, type ViewMode } from '../charpage/equipment.js';
import type { ImageFormat, RenderTransport } from './protocol.js';
import { convertImage } from './convert.js';
import type { AvailabilityProbe } from './availability.js';
import { createLogger } from '../../lib/logging/logger.js';

const logger = createLogger('RenderOrchestrator');

export type RenderStage =
    | 'Idle'
    | 'Fetching'
    | 'Parsing'
    | 'BuildingModel'
    | 'ProbingRenderer'
    | 'Rendering'
    | 'Persisting'
    | 'Done'
    | 'Failed';

export interface RenderArtifact {
    username: string;
    view: ViewMode;
    format: ImageFormat;
    bytes: Buffer;
    /** Absolute path of the written image */
    path: string;
    warnings: ColorClampWarning[];
}

export type RenderFailure = Failure & { stage: RenderStage };

export type RenderOutcome = Success<RenderArtifact> | RenderFailure;

export interface RenderOrchestratorDeps {
    pages: CharacterPageSource;
    renderer: RenderTransport;
    monitor: AvailabilityProbe;
    outputDir: string;
    assetBaseUrl?: string;
    /** Tolerate FlashVars keys the parser does not know */
    allowUnknownKeys?: boolean;
}

export interface RenderOptions {
    view?: ViewMode;
    format?: ImageFormat;
    signal?: AbortSignal;
    onStage?: (stage: RenderStage) => void;
}

const SAFE_FILE_BYTE = /^[A-Za-z0-9-]$/;

/**
 * File name for a render: username plus view and format, e.g. `Yenne-equipped.png`.
 * Any other byte of the UTF-8 name becomes `_XX` (hex, `_` included), so
 * distinct usernames never share a file.
 */
export function renderFileName(username: string, view: ViewMode, format: ImageFormat): string {
    const safe = Array.from(Buffer.from(username.trim(), 'utf8'), byte => {
        const char = String.fromCharCode(byte);
        return SAFE_FILE_BYTE.test(char) ? char : `_${byte.toString(16).toUpperCase().padStart(2, '0')}`;
    }).join('') || '_';
    return `${safe}-${view}.${format}`;
}

export class RenderOrchestrator {
    private readonly deps: RenderOrchestratorDeps;

    constructor(deps: RenderOrchestratorDeps) {
        this.deps = deps;
    }

    async render(username: string, options: RenderOptions = {}): Promise<RenderOutcome> {
        const view = options.view ?? 'equipped';
        const requestedFormat = options.format ?? 'png';
        const { signal, onStage } = options;
        let stage: RenderStage = 'Idle';

        const enter = (next: RenderStage): void => {
            stage = next;
            logger.debug('Render stage', { username, view, stage });
            onStage?.(next);
        };

        const failed = (failure: Failure): RenderFailure => {
            const at = stage;
            enter('Failed');
            logger.warn('Render failed', { username, view, stage: at, reason: failure.reason, message: failure.message });
            return { ...failure, stage: at };
        };

        const cancelled = (): RenderFailure | null =>
            signal?.aborted ? failed(fail('Cancelled', 'Render was cancelled.')) : null;

        enter('Fetching');
        const beforeFetch = cancelled();
        if (beforeFetch) return beforeFetch;

        const page = await this.deps.pages.fetchPage(username, signal);
        if (!page.ok) return failed(page);

        enter('Parsing');
        const params = parseFlashVars(page.value.html, { allowUnknownKeys: this.deps.allowUnknownKeys });
        if (!params.ok) return failed(params);

        enter('BuildingModel');
        const { request, warnings } = buildRenderRequest(params.value, view, { assetBaseUrl: this.deps.assetBaseUrl });

        const beforeProbe = cancelled();
        if (beforeProbe) return beforeProbe;

        enter('ProbingRenderer');
        if (!(await this.deps.monitor.isAvailable(signal))) {
            return cancelled() ?? failed(fail('RendererOffline', 'The render service is offline.'));
        }

        enter('Rendering');
        const reply = await this.deps.renderer.render(request, requestedFormat, signal);
        if (!reply.ok) return failed(reply);

        const image = await convertImage(reply.value, requestedFormat);
        if (!image.ok) return failed(image);

        const beforeWrite = cancelled();
        if (beforeWrite) return beforeWrite;

        enter('Persisting');
        const target = path.resolve(this.deps.outputDir, renderFileName(page.value.username, view, image.value.format));
        const written = await this.persist(target, image.value.bytes);
        if (written) return failed(written);

        enter('Done');
        logger.info('Render saved', { username, view, format: image.value.format, bytes: image.value.bytes, path: target, colorWarnings: warnings.length });

        return succeed({
            username: page.value.username,
            view,
            format: image.value.format,
            bytes: image.value.bytes,
            path: target,
            warnings,
        });
    }

    /**
     * Write through a temp file and rename, so readers never see a partial image.
     */
    private async persist(target: string, bytes: Buffer): Promise<Failure<FailureReason> | null> {
        const temp = `${target}.${randomUUID()}.tmp`;
        try {
            await mkdir(path.dirname(target), { recursive: true });
            await writeFile(temp, bytes);
            await rename(temp, target);
            return null;
        } catch (error) {
            // force only covers a missing file; a broken parent path still throws
            await rm(temp, { force: true }).catch((cleanupError: unknown) => {
                logger.warn('Could not remove temp file', { path: temp, error: cleanupError });
            });
            const message = error instanceof Error ? error.message : String(error);
            return fail('WriteFailed', `Could not save the rendered image: ${message}`);
        }
    }
}

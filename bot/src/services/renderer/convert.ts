/**
 * Client-side format conversion for rendered images.
 *
 * The render service may answer with PNG whatever format was asked for, so the
 * caller's format is produced here. A GIF keeps the alpha channel as
 * transparency; a GIF converted to PNG keeps only its first frame.
 */

import sharp from 'sharp';
import { fail, succeed, type Outcome } from '../result.js';
import { detectImageFormat, type ImageFormat, type RenderedImage } from './protocol.js';
import { createLogger } from '../../lib/logging/logger.js';

const logger = createLogger('ImageConvert');

export type ConvertResult = Outcome<RenderedImage, 'ProtocolError'>;

export async function convertImage(image: RenderedImage, format: ImageFormat): Promise<ConvertResult> {
    if (image.format === format) {
        return succeed(image);
    }

    try {
        const pipeline = sharp(image.bytes, { failOn: 'none' });
        const bytes = format === 'gif'
            ? await pipeline.gif().toBuffer()
            : await pipeline.png().toBuffer();

        if (detectImageFormat(bytes) !== format) {
            return fail('ProtocolError', `Converted image is not a ${format}.`);
        }

        logger.debug('Converted render', { from: image.format, to: format, inputBytes: image.bytes, outputBytes: bytes });
        return succeed({ bytes, format });
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn('Image conversion failed', { from: image.format, to: format, error: message });
        return fail('ProtocolError', `Could not convert the ${image.format} reply to ${format}: ${message}`);
    }
}

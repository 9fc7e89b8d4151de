/**
 * Centralized mapping from pipeline failures to user-facing messages.
 */

import { RENDERER_UNAVAILABLE_REASONS, type Failure, type FailureReason } from '../../services/result.js';

export interface ErrorMessageOptions {
    /** The failure that occurred */
    failure: Failure;
    /** Base error message to display */
    baseMessage: string;
    /** Custom messages by failure reason */
    reasonHandlers?: Partial<Record<FailureReason, string>>;
}

/**
 * Formats a failure as a Discord message. Renderer outages always say so
 * plainly; there is no fallback image.
 */
export function formatFailureMessage(options: ErrorMessageOptions): string {
    const { failure, baseMessage, reasonHandlers = {} } = options;

    let errorMessage = `**${baseMessage}**\n\n`;

    const custom = reasonHandlers[failure.reason];
    if (custom) {
        return errorMessage + custom;
    }

    if (RENDERER_UNAVAILABLE_REASONS.has(failure.reason)) {
        errorMessage += 'The character renderer is unavailable right now.\n\n';
        errorMessage += 'Try again in a few minutes, or ask an admin to check that the render service is running.';
        return errorMessage;
    }

    switch (failure.reason) {
        case 'NotFound':
            errorMessage += `${failure.message}\n\n`;
            errorMessage += 'Check the spelling of the character name.';
            break;
        case 'NetworkError':
        case 'UpstreamError':
            errorMessage += 'The character page could not be loaded.\n\n';
            errorMessage += 'The game site may be down. Try again later.';
            break;
        case 'MalformedPage':
            errorMessage += 'The character page format was not recognized.\n\n';
            errorMessage += 'The game site may have changed. Please tell an admin.';
            break;
        case 'ProtocolError':
        case 'RenderFailed':
            errorMessage += `The renderer could not draw this character: ${failure.message}\n\n`;
            errorMessage += 'Try again or contact an admin if this keeps happening.';
            break;
        case 'WriteFailed':
            errorMessage += 'The image was rendered but could not be saved.\n\n';
            errorMessage += 'Please tell an admin.';
            break;
        case 'Cancelled':
            errorMessage += 'The request was cancelled.';
            break;
        default:
            errorMessage += `${failure.message}\n\n`;
            errorMessage += 'Try again or contact an admin if this keeps happening.';
    }

    return errorMessage;
}

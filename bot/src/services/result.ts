/**
 * Result values shared by the character page and renderer services.
 *
 * Every stage returns one of these instead of throwing, so the caller always
 * learns which stage failed and why.
 */

export type FailureReason =
    | 'NotFound'          // No such character upstream
    | 'NetworkError'      // Upstream unreachable or timed out
    | 'UpstreamError'     // Upstream answered with an unexpected status
    | 'MalformedPage'     // Page loaded but the FlashVars block is missing or unparsable
    | 'RendererOffline'   // Availability probe failed
    | 'ConnectionRefused' // Nothing listening on the render port
    | 'ConnectionReset'   // Render service dropped the connection mid-exchange
    | 'Timeout'           // Render service did not answer in time
    | 'ProtocolError'     // Render service reply is not what the protocol says
    | 'RenderFailed'      // Render service reported an error for this request
    | 'WriteFailed'       // Rendered image could not be written to disk
    | 'Cancelled';        // Caller aborted the operation

export interface Failure<R extends FailureReason = FailureReason> {
    ok: false;
    reason: R;
    message: string;
    /** HTTP status, when the failure came from an HTTP response */
    status?: number;
}

export interface Success<T> {
    ok: true;
    value: T;
}

export type Outcome<T, R extends FailureReason = FailureReason> = Success<T> | Failure<R>;

export function succeed<T>(value: T): Success<T> {
    return { ok: true, value };
}

export function fail<R extends FailureReason>(reason: R, message: string, status?: number): Failure<R> {
    return status === undefined ? { ok: false, reason, message } : { ok: false, reason, message, status };
}

/**
 * Reasons that mean the render service itself is unusable right now.
 */
export const RENDERER_UNAVAILABLE_REASONS: ReadonlySet<FailureReason> = new Set<FailureReason>([
    'RendererOffline',
    'ConnectionRefused',
    'ConnectionReset',
    'Timeout',
]);

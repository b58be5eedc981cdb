import { SiteflowError } from './SiteflowError';

export type NetworkFailureReason = 'timeout' | 'cancelled' | 'unreachable';

/**
 * Error thrown when a request never produced an HTTP response.
 */
export class NetworkError extends SiteflowError {
    public readonly kind = 'network' as const;

    public readonly method: string;

    public readonly path: string;

    public readonly reason: NetworkFailureReason;

    /**
     * Transport error code (e.g. 'ECONNREFUSED', 'ECONNABORTED'), when known.
     */
    public readonly code?: string;

    constructor(method: string, path: string, reason: NetworkFailureReason, cause: string, code?: string) {
        const message = `Siteflow request ${method} ${path} failed (${reason}): ${cause}`;
        const userMessage = reason === 'cancelled'
            ? 'The request was cancelled.'
            : reason === 'timeout'
                ? 'The Siteflow server did not respond in time.'
                : `Could not reach the Siteflow server: ${cause}`;

        super(message, userMessage);

        this.name = 'NetworkError';
        this.method = method;
        this.path = path;
        this.reason = reason;
        this.code = code;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, NetworkError);
        }
    }

    public override details(): Record<string, unknown> {
        return { reason: this.reason, code: this.code, request: `${this.method} ${this.path}` };
    }
}

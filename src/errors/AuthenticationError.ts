import { SiteflowError } from './SiteflowError';

/**
 * Error thrown when the credential exchange is rejected or cannot complete.
 *
 * The process stays usable: the next command triggers a fresh attempt.
 */
export class AuthenticationError extends SiteflowError {
    public readonly kind = 'auth' as const;

    /**
     * HTTP status of the authentication response, undefined when no response arrived.
     */
    public readonly status?: number;

    /**
     * Body of the authentication response, as received.
     */
    public readonly responseBody?: unknown;

    /**
     * @param cause - What went wrong
     * @param status - The HTTP status code, if a response was received
     * @param responseBody - The remote error body, if any
     */
    constructor(cause: string, status?: number, responseBody?: unknown) {
        const statusStr = status !== undefined ? ` (status ${status})` : '';
        const message = `Siteflow authentication failed${statusStr}: ${cause}`;
        const userMessage = `Authentication failed${statusStr}. Please check your credentials.`;

        super(message, userMessage);

        this.name = 'AuthenticationError';
        this.status = status;
        this.responseBody = responseBody;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, AuthenticationError);
        }
    }

    public override details(): Record<string, unknown> {
        return { status: this.status, details: this.responseBody };
    }
}

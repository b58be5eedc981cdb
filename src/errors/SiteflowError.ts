/**
 * Error discriminator values for the Siteflow client.
 *
 * - 'config': missing or malformed environment configuration (see ConfigurationError)
 * - 'validation': command argument failures (see ValidationError)
 * - 'auth': rejected credential exchange (see AuthenticationError)
 * - 'api': non-2xx response from a forwarded call (see ApiError)
 * - 'network': transport failures, timeouts and cancellation (see NetworkError)
 * - 'command': unknown command names (see UnsupportedCommandError)
 */
export type SiteflowErrorKind = 'config' | 'validation' | 'auth' | 'api' | 'network' | 'command';

/**
 * Base error class for all Siteflow client errors.
 *
 * Provides a discriminated union pattern for type-safe error handling.
 * The `kind` property enables TypeScript to narrow error types in catch blocks.
 */
export abstract class SiteflowError extends Error {
    /**
     * Error discriminator for type narrowing.
     */
    public abstract readonly kind: SiteflowErrorKind;

    /**
     * Message suitable for showing to the host. Never includes credentials.
     */
    public readonly userMessage: string;

    /**
     * @param message - Internal error message (may include technical details)
     * @param userMessage - Optional user-facing message (defaults to message)
     */
    constructor(message: string, userMessage?: string) {
        super(message);
        this.name = 'SiteflowError';
        this.userMessage = userMessage ?? message;

        // Maintains proper stack trace (V8-only)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, SiteflowError);
        }
    }

    /**
     * Structured fields specific to the error class, merged into the
     * payload reported back to the host.
     */
    public details(): Record<string, unknown> {
        return {};
    }
}

import { SiteflowError } from './SiteflowError';

/**
 * Error thrown when a forwarded call gets a non-2xx response.
 *
 * The remote body is kept verbatim; its semantics are not interpreted.
 */
export class ApiError extends SiteflowError {
    public readonly kind = 'api' as const;

    public readonly status: number;

    /**
     * The remote error body: parsed JSON when the body was JSON, raw text otherwise.
     */
    public readonly responseBody: unknown;

    public readonly method: string;

    /**
     * Request path relative to the server URL.
     */
    public readonly path: string;

    constructor(method: string, path: string, status: number, responseBody: unknown) {
        const message = `Siteflow API request ${method} ${path} failed with status ${status}`;
        super(message, `API error: ${status}`);

        this.name = 'ApiError';
        this.method = method;
        this.path = path;
        this.status = status;
        this.responseBody = responseBody;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, ApiError);
        }
    }

    public override details(): Record<string, unknown> {
        return {
            status: this.status,
            details: this.responseBody,
            request: `${this.method} ${this.path}`,
        };
    }
}

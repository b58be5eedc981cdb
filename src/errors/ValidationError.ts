import { SiteflowError } from './SiteflowError';

/**
 * Error thrown when a command argument fails validation.
 *
 * Provides structured information about which field failed validation
 * and the specific reason for the failure.
 */
export class ValidationError extends SiteflowError {
    public readonly kind = 'validation' as const;

    /**
     * The argument name that failed validation (e.g., 'flow_id', 'ordering_number').
     */
    public readonly field: string;

    /**
     * The invalid value that was provided (truncated). Empty when the argument was missing.
     */
    public readonly value: string;

    /**
     * The specific reason why validation failed.
     */
    public readonly reason: string;

    /**
     * @param field - The argument name that failed validation
     * @param value - The invalid value provided
     * @param reason - The specific validation failure reason
     */
    constructor(field: string, value: string, reason: string) {
        // Truncate value to keep large text payloads out of error messages
        const truncatedValue = value.length > 100 ? `${value.slice(0, 100)}...` : value;

        const message = `Validation failed for field "${field}": ${reason}`;
        const userMessage = truncatedValue
            ? `Invalid ${field}: "${truncatedValue}". ${reason}`
            : `Invalid ${field}: ${reason}`;

        super(message, userMessage);

        this.name = 'ValidationError';
        this.field = field;
        this.value = truncatedValue;
        this.reason = reason;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, ValidationError);
        }
    }

    /**
     * Shorthand for a required argument that was absent or empty.
     */
    static missing(field: string): ValidationError {
        return new ValidationError(field, '', 'This argument is required');
    }

    public override details(): Record<string, unknown> {
        return { field: this.field, reason: this.reason };
    }
}

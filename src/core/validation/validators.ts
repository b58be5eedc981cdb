/**
 * Core validator functions for the Siteflow client.
 *
 * All validators return ValidationResult objects for consistent error handling.
 * Reject invalid input rather than silently sanitizing it.
 */

import type { ValidationResult } from '../../utils';

/**
 * Maximum length for remote entity identifiers.
 */
const MAX_IDENTIFIER_LENGTH = 200;

/**
 * Validates a remote entity identifier (flow, phase, step or project ID).
 *
 * Identifiers are opaque, but they end up in URL paths, so control
 * characters and oversized values are rejected.
 *
 * @param value The identifier to validate
 * @param fieldName The argument name (for error messages)
 */
export function validateIdentifier(value: string, fieldName: string): ValidationResult {
    if (!value || value.trim().length === 0) {
        return { valid: false, error: `${fieldName} cannot be empty` };
    }

    // eslint-disable-next-line no-control-regex
    if (/[\x00-\x1F\x7F]/.test(value)) {
        return { valid: false, error: `${fieldName} contains invalid characters (control characters)` };
    }

    if (value.length > MAX_IDENTIFIER_LENGTH) {
        return {
            valid: false,
            error: `${fieldName} is too long (maximum ${MAX_IDENTIFIER_LENGTH} characters)`
        };
    }

    return { valid: true };
}

/**
 * Validates a configuration string value.
 *
 * Generic validator for configuration values that should be non-empty strings
 * without leading/trailing whitespace.
 *
 * @param value The value to validate
 * @param fieldName The name of the field (for error messages)
 * @returns ValidationResult indicating validity with optional error message
 */
export function validateConfigString(value: unknown, fieldName: string): ValidationResult {
    if (typeof value !== 'string') {
        return { valid: false, error: `${fieldName} must be a string` };
    }

    const trimmed = value.trim();

    if (trimmed.length === 0) {
        return { valid: false, error: `${fieldName} cannot be empty` };
    }

    // Check for whitespace padding (value changed after trim)
    if (trimmed !== value) {
        return { valid: false, error: `${fieldName} cannot have leading or trailing whitespace` };
    }

    return { valid: true };
}

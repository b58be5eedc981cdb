/**
 * Shared utilities for the Siteflow client.
 *
 * Pure functions with no dependency on a host surface, usable from both
 * the CLI and the MCP server.
 */

/**
 * Result of a validation check.
 */
export interface ValidationResult {
    valid: boolean;
    error?: string;
}

/**
 * Helper to get error message from unknown error type.
 *
 * @param err Unknown error value
 * @returns Error message string
 */
export function getErrorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Narrow an unknown value to a plain object record.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

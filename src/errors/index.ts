/**
 * Error types for the Siteflow client.
 *
 * Provides a unified error hierarchy with discriminated unions
 * for type-safe error handling throughout the codebase.
 */

export { SiteflowError, type SiteflowErrorKind } from './SiteflowError';
export { ConfigurationError } from './ConfigurationError';
export { ValidationError } from './ValidationError';
export { AuthenticationError } from './AuthenticationError';
export { ApiError } from './ApiError';
export { NetworkError, type NetworkFailureReason } from './NetworkError';
export { UnsupportedCommandError } from './UnsupportedCommandError';

/**
 * Core module barrel export.
 *
 * Re-exports the public API of the host-agnostic core, shared by the CLI
 * and the MCP server.
 */

// Configuration
export {
    loadConfig,
    loadEnvironment,
    DEFAULT_SERVER_URL,
    type SiteflowConfig,
    type SiteflowCredentials,
} from './config';

// Transport and session
export {
    SiteflowHttpClient,
    type HttpClientOptions,
    type HttpMethod,
    type SiteflowRequest,
    type SiteflowResponse,
} from './http/SiteflowHttpClient';
export {
    SessionManager,
    AUTHENTICATE_PATH,
    type AccessToken,
    type SessionManagerOptions,
} from './session/SessionManager';

// Services
export { SiteflowApi, API_PREFIX, type CallOptions } from './services/SiteflowApi';
export * from './services/payloads';

// Commands
export * from './commands';

// Output
export { formatCommandResult, extractIdentifier, extractItems } from './format/formatters';

// Validation
export * from './validation';

// Wiring
export { createSiteflowClient, type SiteflowClient, type SiteflowClientOptions } from './client';

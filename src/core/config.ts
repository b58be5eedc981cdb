/**
 * Siteflow client configuration.
 *
 * Read once at startup from the process environment (optionally seeded from
 * a .env file) into an immutable object that is passed to every component.
 */

import * as path from 'path';
import * as dotenv from 'dotenv';
import { ConfigurationError } from '../errors';
import { validateConfigString } from './validation';

export const DEFAULT_SERVER_URL = 'https://poc-ai.siteflow.co';

export interface SiteflowCredentials {
    readonly clientId: string;
    readonly clientSecret: string;
    readonly projectId: string;
    readonly familyId?: string;
}

export interface SiteflowConfig extends SiteflowCredentials {
    /** Base URL of the Siteflow server, without a trailing slash */
    readonly serverUrl: string;
    /** Per-request timeout in milliseconds */
    readonly timeoutMs: number;
    /** Extra attempts for idempotent reads after a transient failure */
    readonly maxRetries: number;
    /** Backoff before the first retry; doubles on each further attempt */
    readonly retryDelayMs: number;
    /** Token lifetime used when the authentication response does not state one */
    readonly tokenTtlSeconds: number;
    /** Tokens this close to expiry are refreshed before use */
    readonly tokenRefreshMarginSeconds: number;
    /** Trace requests to stderr */
    readonly debug: boolean;
}

const REQUIRED_VARIABLES = [
    'SITEFLOW_CLIENT_ID',
    'SITEFLOW_CLIENT_SECRET',
    'SITEFLOW_PROJECT_ID',
] as const;

const DEFAULTS = {
    timeoutMs: 30_000,
    maxRetries: 2,
    retryDelayMs: 250,
    tokenTtlSeconds: 3600,
    tokenRefreshMarginSeconds: 60,
};

/**
 * Load a .env file into process.env. Variables already present in the
 * environment are left untouched. A missing file is not an error.
 *
 * @returns The path that was tried
 */
export function loadEnvironment(envFile?: string): string {
    const envPath = envFile || process.env.SITEFLOW_ENV_FILE || path.join(process.cwd(), '.env');
    dotenv.config({ path: envPath });
    return envPath;
}

function readInteger(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const trimmed = raw.trim();
    if (!/^\d+$/.test(trimmed) || Number(trimmed) < min) {
        throw new ConfigurationError([name], `${name} must be an integer of at least ${min}, got "${raw}"`);
    }
    return Number(trimmed);
}

function readBoolean(env: NodeJS.ProcessEnv, name: string): boolean {
    const raw = env[name]?.trim().toLowerCase();
    return raw === 'true' || raw === '1' || raw === 'yes';
}

function readServerUrl(env: NodeJS.ProcessEnv): string {
    const raw = env.SITEFLOW_SERVER_URL?.trim() || DEFAULT_SERVER_URL;
    let url: URL;
    try {
        url = new URL(raw);
    } catch {
        throw new ConfigurationError(['SITEFLOW_SERVER_URL'], `SITEFLOW_SERVER_URL is not a valid URL: "${raw}"`);
    }
    if (url.protocol !== 'https:' && url.protocol !== 'http:') {
        throw new ConfigurationError(['SITEFLOW_SERVER_URL'], 'SITEFLOW_SERVER_URL must use http or https');
    }
    return raw.replace(/\/+$/, '');
}

/**
 * Build the configuration from environment variables.
 *
 * All missing required variables are reported together.
 *
 * @throws ConfigurationError if a required variable is missing or a value is malformed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SiteflowConfig {
    const missing = REQUIRED_VARIABLES.filter(name => !env[name] || env[name]?.trim() === '');
    if (missing.length > 0) {
        throw new ConfigurationError([...missing], `Missing required configuration: ${missing.join(', ')}`);
    }

    const values: Record<(typeof REQUIRED_VARIABLES)[number], string> = {
        SITEFLOW_CLIENT_ID: '',
        SITEFLOW_CLIENT_SECRET: '',
        SITEFLOW_PROJECT_ID: '',
    };
    for (const name of REQUIRED_VARIABLES) {
        const value = env[name] ?? '';
        const validation = validateConfigString(value, name);
        if (!validation.valid) {
            throw new ConfigurationError([name], validation.error ?? `${name} is invalid`);
        }
        values[name] = value;
    }

    const familyId = env.SITEFLOW_FAMILY_ID?.trim();
    const tokenTtlSeconds = readInteger(env, 'SITEFLOW_TOKEN_TTL_SECONDS', DEFAULTS.tokenTtlSeconds, 1);
    const tokenRefreshMarginSeconds = readInteger(
        env,
        'SITEFLOW_TOKEN_REFRESH_MARGIN_SECONDS',
        DEFAULTS.tokenRefreshMarginSeconds,
        0
    );
    if (tokenTtlSeconds <= tokenRefreshMarginSeconds) {
        throw new ConfigurationError(
            ['SITEFLOW_TOKEN_TTL_SECONDS', 'SITEFLOW_TOKEN_REFRESH_MARGIN_SECONDS'],
            `SITEFLOW_TOKEN_TTL_SECONDS (${tokenTtlSeconds}) must be greater than `
                + `SITEFLOW_TOKEN_REFRESH_MARGIN_SECONDS (${tokenRefreshMarginSeconds})`
        );
    }

    return Object.freeze({
        serverUrl: readServerUrl(env),
        clientId: values.SITEFLOW_CLIENT_ID,
        clientSecret: values.SITEFLOW_CLIENT_SECRET,
        projectId: values.SITEFLOW_PROJECT_ID,
        familyId: familyId ? familyId : undefined,
        timeoutMs: readInteger(env, 'SITEFLOW_TIMEOUT_MS', DEFAULTS.timeoutMs, 1),
        maxRetries: readInteger(env, 'SITEFLOW_MAX_RETRIES', DEFAULTS.maxRetries, 0),
        retryDelayMs: readInteger(env, 'SITEFLOW_RETRY_DELAY_MS', DEFAULTS.retryDelayMs, 0),
        tokenTtlSeconds,
        tokenRefreshMarginSeconds,
        debug: readBoolean(env, 'SITEFLOW_DEBUG'),
    });
}

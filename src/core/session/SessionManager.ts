/**
 * Owns the Siteflow bearer token for the lifetime of the process.
 *
 * At most one token is live at a time. Callers never read the token
 * directly; they ask for a valid one and the manager re-authenticates
 * when the cached token is missing or close to expiry.
 */

import { AuthenticationError, NetworkError } from '../../errors';
import { isRecord } from '../../utils';
import type { SiteflowConfig } from '../config';
import type { SiteflowHttpClient, SiteflowResponse } from '../http/SiteflowHttpClient';

export const AUTHENTICATE_PATH = '/ext/api/2.0/authenticate';

export interface AccessToken {
    readonly value: string;
    /** Epoch milliseconds */
    readonly expiresAt: number;
}

export type SessionManagerOptions = Pick<
    SiteflowConfig,
    'clientId' | 'clientSecret' | 'tokenTtlSeconds' | 'tokenRefreshMarginSeconds'
> & {
    /** Clock in epoch milliseconds; tests substitute a controllable one */
    now?: () => number;
};

/**
 * Read the token lifetime in seconds from an authentication response,
 * accepting either `expiresIn` or `expires_in`.
 */
function readExpiresIn(body: Record<string, unknown>): number | undefined {
    const value = body.expiresIn ?? body.expires_in;
    return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : undefined;
}

/**
 * A credential exchange in flight, shared by every caller that asked for
 * a token while it runs. It is aborted only once all of them have.
 */
interface PendingExchange {
    promise: Promise<AccessToken>;
    controller: AbortController;
    waiters: number;
}

function cancelledExchange(): NetworkError {
    return new NetworkError('POST', AUTHENTICATE_PATH, 'cancelled', 'request aborted', 'ERR_CANCELED');
}

export class SessionManager {
    private token: AccessToken | null = null;
    /** Epoch milliseconds after which the cached token is refreshed before use */
    private refreshAt = 0;
    private pending: PendingExchange | null = null;
    private readonly http: SiteflowHttpClient;
    private readonly options: SessionManagerOptions;
    private readonly now: () => number;

    constructor(http: SiteflowHttpClient, options: SessionManagerOptions) {
        this.http = http;
        this.options = options;
        this.now = options.now ?? Date.now;
    }

    /**
     * Exchange the configured credentials for a new bearer token.
     *
     * Concurrent calls share a single exchange. Aborting `signal` rejects
     * only this caller; the exchange itself is cancelled once every caller
     * waiting on it has aborted. The previous token is dropped before the
     * exchange starts, so a failed exchange leaves no token cached.
     *
     * @throws AuthenticationError if the exchange is rejected or cannot complete
     * @throws NetworkError with reason 'cancelled' when `signal` is aborted
     */
    authenticate(signal?: AbortSignal): Promise<AccessToken> {
        if (signal?.aborted) {
            return Promise.reject(cancelledExchange());
        }
        // An exchange whose callers all aborted is not joined
        if (!this.pending || this.pending.controller.signal.aborted) {
            this.pending = this.startExchange();
        }
        return this.join(this.pending, signal);
    }

    /**
     * Return a token that is valid for at least the refresh margin,
     * authenticating first when needed.
     */
    async ensureValidToken(signal?: AbortSignal): Promise<string> {
        if (this.token && this.now() < this.refreshAt) {
            return this.token.value;
        }
        const token = await this.authenticate(signal);
        return token.value;
    }

    /**
     * Drop the cached token, e.g. after the server rejected it.
     *
     * @param rejected - Only drop the cached token if it is still this one;
     *   a token obtained meanwhile by another caller is kept
     */
    invalidate(rejected?: string): void {
        if (rejected !== undefined && this.token?.value !== rejected) {
            return;
        }
        this.token = null;
    }

    /**
     * The cached token, or null when none is held or it has expired.
     */
    currentToken(): AccessToken | null {
        return this.token && this.now() < this.token.expiresAt ? this.token : null;
    }

    private startExchange(): PendingExchange {
        const controller = new AbortController();
        const exchange: PendingExchange = {
            promise: this.exchange(controller.signal).finally(() => {
                if (this.pending === exchange) {
                    this.pending = null;
                }
            }),
            controller,
            waiters: 0,
        };
        return exchange;
    }

    private join(exchange: PendingExchange, signal?: AbortSignal): Promise<AccessToken> {
        exchange.waiters++;
        if (!signal) {
            return exchange.promise;
        }

        return new Promise<AccessToken>((resolve, reject) => {
            const onAbort = () => {
                exchange.waiters--;
                if (exchange.waiters === 0) {
                    exchange.controller.abort();
                }
                reject(cancelledExchange());
            };
            signal.addEventListener('abort', onAbort, { once: true });
            exchange.promise.then(
                token => {
                    signal.removeEventListener('abort', onAbort);
                    resolve(token);
                },
                (error: unknown) => {
                    signal.removeEventListener('abort', onAbort);
                    reject(error);
                }
            );
        });
    }

    private async exchange(signal: AbortSignal): Promise<AccessToken> {
        this.token = null;

        let response: SiteflowResponse;
        try {
            response = await this.http.send({
                method: 'POST',
                path: AUTHENTICATE_PATH,
                body: {
                    clientId: this.options.clientId,
                    clientSecret: this.options.clientSecret,
                },
                signal,
            });
        } catch (error) {
            if (error instanceof NetworkError && error.reason !== 'cancelled') {
                throw new AuthenticationError(error.message);
            }
            throw error;
        }

        if (response.status < 200 || response.status >= 300) {
            throw new AuthenticationError('credentials were rejected', response.status, response.data);
        }

        const body = isRecord(response.data) ? response.data : {};
        const accessToken = body.accessToken;
        if (typeof accessToken !== 'string' || accessToken.length === 0) {
            throw new AuthenticationError('response did not include an access token', response.status, response.data);
        }

        const lifetimeMs = (readExpiresIn(body) ?? this.options.tokenTtlSeconds) * 1000;
        // A token shorter-lived than the margin is still used for half its lifetime
        const marginMs = Math.min(this.options.tokenRefreshMarginSeconds * 1000, lifetimeMs / 2);
        this.token = { value: accessToken, expiresAt: this.now() + lifetimeMs };
        this.refreshAt = this.token.expiresAt - marginMs;
        return this.token;
    }
}

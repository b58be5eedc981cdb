/**
 * HTTP transport for the Siteflow API.
 *
 * Wraps a single axios instance. Every response is resolved (no status-based
 * rejection) so callers decide what a status means; only transport failures
 * throw, as NetworkError.
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { setTimeout as delay } from 'timers/promises';
import { NetworkError } from '../../errors';
import type { SiteflowConfig } from '../config';

export type HttpMethod = 'GET' | 'POST' | 'PATCH';

export interface SiteflowRequest {
    method: HttpMethod;
    /** Path relative to the server URL, e.g. /ext/api/2.0/flows */
    path: string;
    params?: Record<string, string>;
    body?: unknown;
    /** Bearer token; omitted for the credential exchange */
    token?: string;
    signal?: AbortSignal;
}

export interface SiteflowResponse {
    status: number;
    /** Parsed JSON when the body was JSON, raw text otherwise */
    data: unknown;
}

export type HttpClientOptions = Pick<
    SiteflowConfig,
    'serverUrl' | 'timeoutMs' | 'maxRetries' | 'retryDelayMs' | 'debug'
> & {
    /** Replaces the network layer; tests plug an in-process server in here */
    adapter?: AxiosAdapter;
};

function isTransient(outcome: SiteflowResponse | NetworkError): boolean {
    if (outcome instanceof NetworkError) {
        return outcome.reason !== 'cancelled';
    }
    return outcome.status === 429 || outcome.status >= 500;
}

export class SiteflowHttpClient {
    private readonly http: AxiosInstance;
    private readonly options: HttpClientOptions;

    constructor(options: HttpClientOptions) {
        this.options = options;
        this.http = axios.create({
            baseURL: options.serverUrl,
            timeout: options.timeoutMs,
            headers: {
                accept: 'application/json',
                'Content-Type': 'application/json',
                'User-Agent': 'Mozilla/5.0',
                Origin: options.serverUrl,
                Referer: options.serverUrl,
            },
            validateStatus: () => true,
            ...(options.adapter ? { adapter: options.adapter } : {}),
        });
    }

    /**
     * Send a request. GET requests are retried with exponential backoff on
     * transport failures, 429 and 5xx, up to maxRetries extra attempts.
     * Other methods are sent exactly once.
     *
     * @throws NetworkError when no response could be obtained
     */
    async send(request: SiteflowRequest): Promise<SiteflowResponse> {
        const attempts = request.method === 'GET' ? this.options.maxRetries + 1 : 1;

        for (let attempt = 1; ; attempt++) {
            let outcome: SiteflowResponse | NetworkError;
            try {
                outcome = await this.sendOnce(request, attempt);
            } catch (error) {
                if (!(error instanceof NetworkError)) {
                    throw error;
                }
                outcome = error;
            }

            if (attempt >= attempts || !isTransient(outcome)) {
                if (outcome instanceof NetworkError) {
                    throw outcome;
                }
                return outcome;
            }

            const backoff = this.options.retryDelayMs * 2 ** (attempt - 1);
            this.trace(`${request.method} ${request.path} retrying in ${backoff}ms`);
            await this.wait(backoff, request);
        }
    }

    private async sendOnce(request: SiteflowRequest, attempt: number): Promise<SiteflowResponse> {
        const headers: Record<string, string> = {};
        if (request.token) {
            headers.Authorization = `Bearer ${request.token}`;
        }

        try {
            const response = await this.http.request<unknown>({
                method: request.method,
                url: request.path,
                params: request.params,
                data: request.body,
                headers,
                signal: request.signal,
            });
            this.trace(`${request.method} ${request.path} -> ${response.status} (attempt ${attempt})`);
            return { status: response.status, data: response.data };
        } catch (error) {
            throw this.toNetworkError(request, error);
        }
    }

    private toNetworkError(request: SiteflowRequest, error: unknown): unknown {
        if (axios.isCancel(error)) {
            return new NetworkError(request.method, request.path, 'cancelled', 'request aborted', 'ERR_CANCELED');
        }
        if (axios.isAxiosError(error)) {
            const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
            this.trace(`${request.method} ${request.path} failed: ${error.code ?? error.message}`);
            return new NetworkError(
                request.method,
                request.path,
                timedOut ? 'timeout' : 'unreachable',
                error.message,
                error.code
            );
        }
        return error;
    }

    private async wait(ms: number, request: SiteflowRequest): Promise<void> {
        try {
            await delay(ms, undefined, { signal: request.signal });
        } catch (error) {
            if (request.signal?.aborted) {
                throw new NetworkError(request.method, request.path, 'cancelled', 'request aborted', 'ERR_CANCELED');
            }
            throw error;
        }
    }

    private trace(message: string): void {
        if (this.options.debug) {
            console.error(`[siteflow] ${message}`);
        }
    }
}

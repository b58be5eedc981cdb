/**
 * Wires the Siteflow components together from a configuration.
 */

import type { AxiosAdapter } from 'axios';
import { CommandDispatcher } from './commands';
import type { SiteflowConfig } from './config';
import { SiteflowHttpClient } from './http/SiteflowHttpClient';
import { SiteflowApi } from './services/SiteflowApi';
import { SessionManager } from './session/SessionManager';

export interface SiteflowClient {
    config: SiteflowConfig;
    http: SiteflowHttpClient;
    session: SessionManager;
    api: SiteflowApi;
    dispatcher: CommandDispatcher;
}

export interface SiteflowClientOptions {
    /** Replaces the network layer of the HTTP client */
    adapter?: AxiosAdapter;
    /** Clock for token expiry, epoch milliseconds */
    now?: () => number;
}

export function createSiteflowClient(config: SiteflowConfig, options: SiteflowClientOptions = {}): SiteflowClient {
    const http = new SiteflowHttpClient({ ...config, adapter: options.adapter });
    const session = new SessionManager(http, { ...config, now: options.now });
    const api = new SiteflowApi(http, session);
    const dispatcher = new CommandDispatcher(api, session, config);
    return { config, http, session, api, dispatcher };
}

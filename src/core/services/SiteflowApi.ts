/**
 * Typed access to the Siteflow REST endpoints.
 *
 * Each method is exactly one remote call (plus, on a 401, one
 * re-authentication and one repeat). Successful bodies are returned as
 * received; anything outside 2xx becomes an ApiError.
 */

import { ApiError } from '../../errors';
import type { SiteflowHttpClient, SiteflowRequest } from '../http/SiteflowHttpClient';
import type { SessionManager } from '../session/SessionManager';
import {
    buildAddPhasePayload,
    buildAddStepPayload,
    buildCreateFlowPayload,
    type AddPhaseInput,
    type AddStepInput,
    type CreateFlowInput,
} from './payloads';

export const API_PREFIX = '/ext/api/2.0';

export interface CallOptions {
    signal?: AbortSignal;
}

type ApiRequest = Omit<SiteflowRequest, 'token' | 'signal'>;

function segment(id: string): string {
    return encodeURIComponent(id);
}

export class SiteflowApi {
    private readonly http: SiteflowHttpClient;
    private readonly session: SessionManager;

    constructor(http: SiteflowHttpClient, session: SessionManager) {
        this.http = http;
        this.session = session;
    }

    listFlows(projectId: string, options?: CallOptions): Promise<unknown> {
        return this.call({ method: 'GET', path: `${API_PREFIX}/flows`, params: { projectId } }, options);
    }

    listFlowPhases(flowId: string, options?: CallOptions): Promise<unknown> {
        return this.call({ method: 'GET', path: `${API_PREFIX}/flows/${segment(flowId)}/phases` }, options);
    }

    createFlow(input: CreateFlowInput, options?: CallOptions): Promise<unknown> {
        return this.call({
            method: 'POST',
            path: `${API_PREFIX}/flows/bulk-create`,
            body: buildCreateFlowPayload(input),
        }, options);
    }

    addPhaseToFlow(input: AddPhaseInput, options?: CallOptions): Promise<unknown> {
        return this.call({
            method: 'POST',
            path: `${API_PREFIX}/flows/${segment(input.flowId)}/add-phases`,
            body: buildAddPhasePayload(input),
        }, options);
    }

    addStepToPhase(input: AddStepInput, options?: CallOptions): Promise<unknown> {
        return this.call({
            method: 'POST',
            path: `${API_PREFIX}/phases/${segment(input.phaseId)}/add-steps`,
            body: buildAddStepPayload(input),
        }, options);
    }

    updateStepText(stepId: string, textContent: string, options?: CallOptions): Promise<unknown> {
        return this.call({
            method: 'PATCH',
            path: `${API_PREFIX}/steps/${segment(stepId)}/update-text-block`,
            body: { data: textContent },
        }, options);
    }

    private async call(request: ApiRequest, options: CallOptions = {}): Promise<unknown> {
        const { signal } = options;

        let token = await this.session.ensureValidToken(signal);
        let response = await this.http.send({ ...request, token, signal });

        // Token rejected before its expiry: authenticate again and repeat once
        if (response.status === 401) {
            this.session.invalidate(token);
            token = await this.session.ensureValidToken(signal);
            response = await this.http.send({ ...request, token, signal });
        }

        if (response.status < 200 || response.status >= 300) {
            throw new ApiError(request.method, request.path, response.status, response.data);
        }

        // 204 No Content
        if (response.data === undefined || response.data === '') {
            return {};
        }
        return response.data;
    }
}

/**
 * Maps each parsed command onto exactly one Siteflow operation.
 */

import type { SiteflowConfig } from '../config';
import type { SiteflowApi } from '../services/SiteflowApi';
import type { SessionManager } from '../session/SessionManager';
import { parseCommand, type RawArguments } from './parser';
import type { CommandResult, SiteflowCommand } from './types';

export interface DispatchOptions {
    /** Aborts the in-flight remote call */
    signal?: AbortSignal;
}

export interface AuthenticationSummary {
    authenticated: true;
    projectId: string;
    /** ISO timestamp */
    expiresAt: string;
}

export class CommandDispatcher {
    private readonly api: SiteflowApi;
    private readonly session: SessionManager;
    private readonly config: Pick<SiteflowConfig, 'projectId' | 'familyId'>;

    constructor(api: SiteflowApi, session: SessionManager, config: Pick<SiteflowConfig, 'projectId' | 'familyId'>) {
        this.api = api;
        this.session = session;
        this.config = config;
    }

    /**
     * Parse and dispatch in one step.
     */
    async execute(name: string, args: RawArguments = {}, options: DispatchOptions = {}): Promise<CommandResult> {
        return this.dispatch(parseCommand(name, args), options);
    }

    async dispatch(command: SiteflowCommand, options: DispatchOptions = {}): Promise<CommandResult> {
        const data = await this.forward(command, options.signal);
        return { command, data };
    }

    private async forward(command: SiteflowCommand, signal?: AbortSignal): Promise<unknown> {
        const options = { signal };

        switch (command.name) {
            case 'authenticate': {
                const token = await this.session.authenticate(signal);
                const summary: AuthenticationSummary = {
                    authenticated: true,
                    projectId: this.config.projectId,
                    expiresAt: new Date(token.expiresAt).toISOString(),
                };
                return summary;
            }
            case 'get_flows':
                return this.api.listFlows(this.config.projectId, options);
            case 'get_flow_phases':
                return this.api.listFlowPhases(command.flowId, options);
            case 'create_flow':
                return this.api.createFlow({
                    flowName: command.flowName,
                    projectId: command.projectId,
                    flowType: command.flowType,
                    description: command.description,
                    categoryId: command.categoryId,
                    familyId: command.familyId ?? this.config.familyId,
                    familyCustomCode: command.familyCustomCode,
                    reference: command.reference,
                }, options);
            case 'add_phase_to_flow':
                return this.api.addPhaseToFlow(command, options);
            case 'add_step_to_phase':
                return this.api.addStepToPhase(command, options);
            case 'update_step_text':
                return this.api.updateStepText(command.stepId, command.textContent, options);
            default: {
                const unreachable: never = command;
                throw new Error(`Unhandled command: ${JSON.stringify(unreachable)}`);
            }
        }
    }
}

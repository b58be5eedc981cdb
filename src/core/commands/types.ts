/**
 * Command types for the Siteflow dispatcher.
 *
 * One variant per command; the `name` field is the discriminator and
 * matches the command name the host sends.
 */

import type { FlowType, ThematicBlock } from '../validation';

export const COMMAND_NAMES = [
    'authenticate',
    'get_flows',
    'get_flow_phases',
    'create_flow',
    'add_phase_to_flow',
    'add_step_to_phase',
    'update_step_text',
] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

export interface AuthenticateCommand {
    name: 'authenticate';
}

export interface GetFlowsCommand {
    name: 'get_flows';
}

export interface GetFlowPhasesCommand {
    name: 'get_flow_phases';
    flowId: string;
}

export interface CreateFlowCommand {
    name: 'create_flow';
    flowName: string;
    projectId: string;
    flowType: FlowType;
    description?: string;
    categoryId?: string;
    /** Falls back to the configured family ID when absent */
    familyId?: string;
    familyCustomCode?: string;
    reference?: string;
}

export interface AddPhaseToFlowCommand {
    name: 'add_phase_to_flow';
    flowId: string;
    phaseName: string;
    phaseDescription?: string;
    orderingNumber?: number;
    autoAdvance: boolean;
    canBeSkipped: boolean;
}

export interface AddStepToPhaseCommand {
    name: 'add_step_to_phase';
    phaseId: string;
    stepName: string;
    stepDescription?: string;
    orderingNumber?: number;
    enabledThematicBlocks: ThematicBlock[];
}

export interface UpdateStepTextCommand {
    name: 'update_step_text';
    stepId: string;
    textContent: string;
}

export type SiteflowCommand =
    | AuthenticateCommand
    | GetFlowsCommand
    | GetFlowPhasesCommand
    | CreateFlowCommand
    | AddPhaseToFlowCommand
    | AddStepToPhaseCommand
    | UpdateStepTextCommand;

export interface CommandResult<C extends SiteflowCommand = SiteflowCommand> {
    /** The parsed command that produced this result */
    command: C;
    /** Remote response body as received */
    data: unknown;
}

export function isCommandName(name: string): name is CommandName {
    return (COMMAND_NAMES as readonly string[]).includes(name);
}

/**
 * Catalog of supported commands and their arguments.
 *
 * Drives required-argument checks in the parser, the MCP tool schemas
 * and the CLI help text.
 */

import { FLOW_TYPES, THEMATIC_BLOCKS } from '../validation';
import { COMMAND_NAMES, type CommandName } from './types';

export type ArgumentType = 'string' | 'integer' | 'boolean' | 'list';

export interface CommandArgument {
    name: string;
    type: ArgumentType;
    required: boolean;
    description: string;
    /** Accepted values for enumerations and list entries */
    allowed?: readonly string[];
}

export interface CommandDefinition<N extends CommandName = CommandName> {
    name: N;
    description: string;
    arguments: readonly CommandArgument[];
}

const DEFINITIONS: { [N in CommandName]: CommandDefinition<N> } = {
    authenticate: {
        name: 'authenticate',
        description: 'Authenticate with the Siteflow API.',
        arguments: [],
    },
    get_flows: {
        name: 'get_flows',
        description: 'Get all available flows for the configured project.',
        arguments: [],
    },
    get_flow_phases: {
        name: 'get_flow_phases',
        description: 'Get phases for a specific flow.',
        arguments: [
            { name: 'flow_id', type: 'string', required: true, description: 'ID of the flow to get phases for' },
        ],
    },
    create_flow: {
        name: 'create_flow',
        description: 'Create a new flow.',
        arguments: [
            { name: 'flow_name', type: 'string', required: true, description: 'Name of the flow' },
            { name: 'project_id', type: 'string', required: true, description: 'ID of the project to create the flow in' },
            {
                name: 'flow_type',
                type: 'string',
                required: false,
                description: 'Type of flow. Defaults to GENERIC',
                allowed: FLOW_TYPES,
            },
            { name: 'description', type: 'string', required: false, description: 'Description of the flow' },
            { name: 'category_id', type: 'string', required: false, description: 'Category identifier' },
            {
                name: 'family_id',
                type: 'string',
                required: false,
                description: 'Family identifier. Defaults to SITEFLOW_FAMILY_ID',
            },
            { name: 'family_custom_code', type: 'string', required: false, description: 'Family custom code' },
            { name: 'reference', type: 'string', required: false, description: 'Reference' },
        ],
    },
    add_phase_to_flow: {
        name: 'add_phase_to_flow',
        description: 'Add a new phase to a flow.',
        arguments: [
            { name: 'flow_id', type: 'string', required: true, description: 'ID of the flow to add the phase to' },
            { name: 'phase_name', type: 'string', required: true, description: 'Name of the new phase' },
            { name: 'phase_description', type: 'string', required: false, description: 'Description of the phase' },
            {
                name: 'ordering_number',
                type: 'integer',
                required: false,
                description: 'Position of the phase in the flow',
            },
            {
                name: 'auto_advance',
                type: 'boolean',
                required: false,
                description: 'Whether the phase automatically advances to the next phase. Defaults to false',
            },
            {
                name: 'can_be_skipped',
                type: 'boolean',
                required: false,
                description: 'Whether the phase can be skipped. Defaults to false',
            },
        ],
    },
    add_step_to_phase: {
        name: 'add_step_to_phase',
        description: 'Add a new step to a phase.',
        arguments: [
            { name: 'phase_id', type: 'string', required: true, description: 'ID of the phase to add the step to' },
            { name: 'step_name', type: 'string', required: true, description: 'Name of the new step' },
            { name: 'step_description', type: 'string', required: false, description: 'Description of the step' },
            {
                name: 'ordering_number',
                type: 'integer',
                required: false,
                description: 'Position of the step in the phase',
            },
            {
                name: 'enabled_thematic_blocks',
                type: 'list',
                required: false,
                description: 'Comma-separated thematic blocks to enable, e.g. "INSTRUCTION,CHECKLIST". Defaults to INSTRUCTION',
                allowed: THEMATIC_BLOCKS,
            },
        ],
    },
    update_step_text: {
        name: 'update_step_text',
        description: 'Update the text block of a step.',
        arguments: [
            { name: 'step_id', type: 'string', required: true, description: 'ID of the step to update' },
            {
                name: 'text_content',
                type: 'string',
                required: true,
                description: 'New text content for the step. May include HTML formatting',
            },
        ],
    },
};

export function getCommandDefinition<N extends CommandName>(name: N): CommandDefinition<N> {
    return DEFINITIONS[name];
}

/**
 * All command definitions, in COMMAND_NAMES order.
 */
export function listCommandDefinitions(): CommandDefinition[] {
    return COMMAND_NAMES.map(name => DEFINITIONS[name]);
}

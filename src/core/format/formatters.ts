/**
 * Human-readable summaries of command results, printed by the CLI when
 * --json is not given.
 *
 * The remote bodies are untyped, so every field is read defensively and
 * missing values fall back to placeholders.
 */

import { isRecord } from '../../utils';
import type {
    AddPhaseToFlowCommand,
    AddStepToPhaseCommand,
    CommandResult,
    CreateFlowCommand,
    GetFlowPhasesCommand,
} from '../commands';

/**
 * Listing endpoints wrap their items in `data`; accept a bare array too.
 */
export function extractItems(body: unknown): Record<string, unknown>[] {
    const items = isRecord(body) ? body.data : body;
    return Array.isArray(items) ? items.filter(isRecord) : [];
}

/**
 * Find the identifier of a created entity in a creation response: the
 * body itself, the first element of an array body, or the first element
 * of its `data` array.
 */
export function extractIdentifier(body: unknown): string {
    const candidate = Array.isArray(body) ? body[0] : body;
    if (isRecord(candidate)) {
        const identifier = candidate.identifier;
        if (typeof identifier === 'string' || typeof identifier === 'number') {
            return String(identifier);
        }
        if (Array.isArray(candidate.data)) {
            return extractIdentifier(candidate.data);
        }
    }
    return 'Unknown';
}

function text(value: unknown, fallback: string): string {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return String(value);
    }
    return fallback;
}

function formatFlows(body: unknown, projectId: string): string {
    const flows = extractItems(body);
    if (flows.length === 0) {
        return `No flows found for project ID: ${projectId}`;
    }

    const lines = [`=== Available Flows for Project ${projectId} ===`];
    flows.forEach((flow, index) => {
        const name = text(flow.name, 'Unnamed Flow');
        const id = text(flow.identifier, 'Unknown');
        const type = text(flow.type, 'Unknown Type');
        lines.push(`${index + 1}. ${name} (ID: ${id}, Type: ${type})`);
    });
    return lines.join('\n');
}

function formatPhase(phase: Record<string, unknown>, position: number): string[] {
    const lines = [
        '',
        `${position}. ${text(phase.name, 'Unnamed Phase')} ` +
            `(ID: ${text(phase.identifier, 'Unknown')}, Order: ${text(phase.orderingNumber, 'Unknown')})`,
    ];

    const management = phase.managementProperties;
    if (isRecord(management)) {
        lines.push(`   Enabled: ${management.isEnabled === true}`);
        lines.push(`   Auto-advance: ${management.autoAdvance === true}`);
        lines.push(`   Can be skipped: ${management.canBeSkipped === true}`);
    }

    const properties = phase.properties;
    if (isRecord(properties)) {
        lines.push('', '   Properties:');
        for (const [key, value] of Object.entries(properties)) {
            lines.push(`     - ${key}: ${text(value, JSON.stringify(value))}`);
        }
    }

    const actions = Array.isArray(phase.actions) ? phase.actions.filter(isRecord) : [];
    if (actions.length > 0) {
        lines.push('', '   Available Actions:');
        for (const action of actions) {
            lines.push(`     - ${text(action.name, 'Unnamed Action')} (ID: ${text(action.identifier, 'Unknown')})`);
        }
    }

    const transitions = Array.isArray(phase.transitions) ? phase.transitions.filter(isRecord) : [];
    if (transitions.length > 0) {
        lines.push('', '   Transitions:');
        for (const transition of transitions) {
            lines.push(
                `     - To: ${text(transition.targetPhase, 'Unknown')}, ` +
                    `Condition: ${text(transition.condition, 'No condition')}`
            );
        }
    }

    return lines;
}

function formatPhases(command: GetFlowPhasesCommand, body: unknown, projectId: string): string {
    const phases = extractItems(body);
    if (phases.length === 0) {
        return `No phases found for flow ID: ${command.flowId} in project: ${projectId}`;
    }

    const lines = [`=== Flow Phases for Flow ${command.flowId} in Project ${projectId} ===`];
    phases.forEach((phase, index) => lines.push(...formatPhase(phase, index + 1)));
    return lines.join('\n');
}

function formatCreatedFlow(command: CreateFlowCommand, body: unknown): string {
    return [
        `Successfully created flow '${command.flowName}'.`,
        `Flow ID: ${extractIdentifier(body)}`,
        `Flow Type: ${command.flowType}`,
        `Project ID: ${command.projectId}`,
    ].join('\n');
}

function formatAddedPhase(command: AddPhaseToFlowCommand, body: unknown): string {
    return [
        `Successfully added phase '${command.phaseName}' to flow ${command.flowId}.`,
        `Phase ID: ${extractIdentifier(body)}`,
        `Auto-advance: ${command.autoAdvance}`,
        `Can be skipped: ${command.canBeSkipped}`,
    ].join('\n');
}

function formatAddedStep(command: AddStepToPhaseCommand, body: unknown): string {
    return [
        `Successfully added step '${command.stepName}' to phase ${command.phaseId}.`,
        `Step ID: ${extractIdentifier(body)}`,
        `Enabled thematic blocks: ${command.enabledThematicBlocks.join(', ')}`,
    ].join('\n');
}

/**
 * Render a command result for a terminal.
 *
 * @param projectId - The configured project, named in listing headers
 */
export function formatCommandResult(result: CommandResult, projectId: string): string {
    const { command, data } = result;
    switch (command.name) {
        case 'authenticate':
            return `Authentication successful! Working with project ID: ${projectId}`;
        case 'get_flows':
            return formatFlows(data, projectId);
        case 'get_flow_phases':
            return formatPhases(command, data, projectId);
        case 'create_flow':
            return formatCreatedFlow(command, data);
        case 'add_phase_to_flow':
            return formatAddedPhase(command, data);
        case 'add_step_to_phase':
            return formatAddedStep(command, data);
        case 'update_step_text':
            return `Successfully updated text for step ${command.stepId}.`;
    }
}

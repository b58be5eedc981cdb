/**
 * Turns a command name and raw arguments into a typed SiteflowCommand.
 *
 * Raw arguments come either from MCP tool calls (JSON values) or from
 * `key=value` tokens on the command line (strings), so every reader
 * accepts both forms. All checks happen here, before any network call.
 */

import { UnsupportedCommandError, ValidationError } from '../../errors';
import {
    FLOW_TYPES,
    isFlowType,
    isThematicBlock,
    validateIdentifier,
    validateThematicBlocks,
    type FlowType,
    type ThematicBlock,
} from '../validation';
import { getCommandDefinition } from './catalog';
import { COMMAND_NAMES, isCommandName, type SiteflowCommand } from './types';

export type RawArguments = Readonly<Record<string, unknown>>;

function isAbsent(value: unknown): boolean {
    return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

function describeValue(value: unknown): string {
    if (typeof value === 'string') {
        return value;
    }
    return JSON.stringify(value) ?? String(value);
}

/**
 * Typed accessors over raw arguments. Each throws ValidationError naming
 * the argument when the value has the wrong shape.
 */
class ArgumentReader {
    private readonly args: RawArguments;

    constructor(args: RawArguments) {
        this.args = args;
    }

    optionalString(name: string): string | undefined {
        const value = this.args[name];
        if (isAbsent(value)) {
            return undefined;
        }
        if (typeof value === 'string') {
            return value;
        }
        if (typeof value === 'number' && Number.isFinite(value)) {
            return String(value);
        }
        throw new ValidationError(name, describeValue(value), 'Must be a string');
    }

    string(name: string): string {
        const value = this.optionalString(name);
        if (value === undefined) {
            throw ValidationError.missing(name);
        }
        return value;
    }

    identifier(name: string): string {
        const value = this.string(name).trim();
        const validation = validateIdentifier(value, name);
        if (!validation.valid) {
            throw new ValidationError(name, value, validation.error ?? 'Invalid identifier');
        }
        return value;
    }

    integer(name: string): number | undefined {
        const value = this.args[name];
        if (isAbsent(value)) {
            return undefined;
        }
        let parsed: number | undefined;
        if (typeof value === 'number' && Number.isInteger(value)) {
            parsed = value;
        } else if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
            parsed = Number(value.trim());
        }
        if (parsed === undefined) {
            throw new ValidationError(name, describeValue(value), 'Must be an integer');
        }
        if (!Number.isSafeInteger(parsed)) {
            throw new ValidationError(
                name,
                describeValue(value),
                `Must be between ${Number.MIN_SAFE_INTEGER} and ${Number.MAX_SAFE_INTEGER}`
            );
        }
        return parsed;
    }

    boolean(name: string, fallback: boolean): boolean {
        const value = this.args[name];
        if (isAbsent(value)) {
            return fallback;
        }
        if (typeof value === 'boolean') {
            return value;
        }
        if (typeof value === 'string') {
            const normalized = value.trim().toLowerCase();
            if (normalized === 'true') {
                return true;
            }
            if (normalized === 'false') {
                return false;
            }
        }
        throw new ValidationError(name, describeValue(value), 'Must be true or false');
    }

    flowType(name: string, fallback: FlowType): FlowType {
        const value = this.optionalString(name);
        if (value === undefined) {
            return fallback;
        }
        const normalized = value.trim().toUpperCase();
        if (!isFlowType(normalized)) {
            throw new ValidationError(name, value, `Must be one of ${FLOW_TYPES.join(', ')}`);
        }
        return normalized;
    }

    thematicBlocks(name: string, fallback: ThematicBlock[]): ThematicBlock[] {
        const value = this.args[name];
        if (isAbsent(value)) {
            return fallback;
        }

        let entries: string[];
        if (typeof value === 'string') {
            entries = value.split(',');
        } else if (Array.isArray(value) && value.every((entry): entry is string => typeof entry === 'string')) {
            entries = value;
        } else {
            throw new ValidationError(name, describeValue(value), 'Must be a comma-separated string or a list of strings');
        }

        const blocks = entries.map(entry => entry.trim().toUpperCase()).filter(entry => entry.length > 0);
        const validation = validateThematicBlocks(blocks);
        if (!validation.valid) {
            throw new ValidationError(name, describeValue(value), validation.error ?? 'Invalid thematic blocks');
        }
        return blocks.filter(isThematicBlock);
    }
}

/**
 * Parse a command invocation.
 *
 * Required arguments are checked in catalog order so the first missing one
 * is reported; unknown argument names are rejected after that.
 *
 * @throws UnsupportedCommandError for an unknown command name
 * @throws ValidationError for a missing, unknown or malformed argument
 */
export function parseCommand(name: string, args: RawArguments = {}): SiteflowCommand {
    if (!isCommandName(name)) {
        throw new UnsupportedCommandError(name, COMMAND_NAMES);
    }

    const definition = getCommandDefinition(name);
    for (const argument of definition.arguments) {
        if (argument.required && isAbsent(args[argument.name])) {
            throw ValidationError.missing(argument.name);
        }
    }

    const accepted = definition.arguments.map(argument => argument.name);
    for (const key of Object.keys(args)) {
        if (!accepted.includes(key)) {
            const hint = accepted.length > 0 ? `Accepted arguments: ${accepted.join(', ')}` : 'It takes no arguments';
            throw new ValidationError(key, describeValue(args[key]), `Unknown argument for ${name}. ${hint}`);
        }
    }

    const read = new ArgumentReader(args);

    switch (name) {
        case 'authenticate':
            return { name };
        case 'get_flows':
            return { name };
        case 'get_flow_phases':
            return { name, flowId: read.identifier('flow_id') };
        case 'create_flow':
            return {
                name,
                flowName: read.string('flow_name'),
                projectId: read.identifier('project_id'),
                flowType: read.flowType('flow_type', 'GENERIC'),
                description: read.optionalString('description'),
                categoryId: read.optionalString('category_id'),
                familyId: read.optionalString('family_id'),
                familyCustomCode: read.optionalString('family_custom_code'),
                reference: read.optionalString('reference'),
            };
        case 'add_phase_to_flow':
            return {
                name,
                flowId: read.identifier('flow_id'),
                phaseName: read.string('phase_name'),
                phaseDescription: read.optionalString('phase_description'),
                orderingNumber: read.integer('ordering_number'),
                autoAdvance: read.boolean('auto_advance', false),
                canBeSkipped: read.boolean('can_be_skipped', false),
            };
        case 'add_step_to_phase':
            return {
                name,
                phaseId: read.identifier('phase_id'),
                stepName: read.string('step_name'),
                stepDescription: read.optionalString('step_description'),
                orderingNumber: read.integer('ordering_number'),
                enabledThematicBlocks: read.thematicBlocks('enabled_thematic_blocks', ['INSTRUCTION']),
            };
        case 'update_step_text':
            return {
                name,
                stepId: read.identifier('step_id'),
                textContent: read.string('text_content'),
            };
    }
}

/**
 * Split `key=value` tokens into an argument record.
 *
 * Each token splits at its first '='; the value may itself contain '='.
 *
 * @throws ValidationError for a token without '=', an empty key, or a repeated key
 */
export function parseKeyValueArgs(tokens: readonly string[]): Record<string, string> {
    const args: Record<string, string> = {};
    for (const token of tokens) {
        const separator = token.indexOf('=');
        if (separator === -1) {
            throw new ValidationError(token, token, 'Expected an argument of the form key=value');
        }
        const key = token.slice(0, separator).trim();
        if (key.length === 0) {
            throw new ValidationError('argument', token, 'Argument name cannot be empty');
        }
        if (Object.prototype.hasOwnProperty.call(args, key)) {
            throw new ValidationError(key, token, 'Argument given more than once');
        }
        args[key] = token.slice(separator + 1);
    }
    return args;
}

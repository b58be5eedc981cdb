/**
 * CLI utility functions shared across commands.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Command } from 'commander';
import {
    createSiteflowClient,
    formatCommandResult,
    getCommandDefinition,
    loadConfig,
    loadEnvironment,
    parseCommand,
    parseKeyValueArgs,
    type CommandName,
    type SiteflowClient,
} from '../core';
import { SiteflowError } from '../errors';
import { getErrorMessage, isRecord } from '../utils';

export type RunOptions = {
    json?: boolean;
    envFile?: string;
};

/**
 * Initialize the CLI environment: .env file, configuration, client.
 * Fails before any command is parsed or dispatched when the configuration is invalid.
 */
export function initCli(envFile?: string): SiteflowClient {
    loadEnvironment(envFile);
    return createSiteflowClient(loadConfig());
}

/**
 * Execute one command against a client and render its output.
 */
export async function executeCliCommand(
    client: SiteflowClient,
    name: CommandName,
    tokens: readonly string[],
    json = false
): Promise<string> {
    const command = parseCommand(name, parseKeyValueArgs(tokens));
    const result = await client.dispatcher.dispatch(command);
    return json
        ? JSON.stringify(result.data, null, 2)
        : formatCommandResult(result, client.config.projectId);
}

/**
 * Register a catalog command as a subcommand taking key=value arguments.
 */
export function registerSiteflowCommand(program: Command, name: CommandName): void {
    const definition = getCommandDefinition(name);
    const argumentHelp = definition.arguments.length === 0
        ? '\nThis command takes no arguments.'
        : [
            '',
            'Arguments (key=value):',
            ...definition.arguments.map(argument => {
                const required = argument.required ? ' (required)' : '';
                const allowed = argument.allowed ? ` [${argument.allowed.join(', ')}]` : '';
                return `  ${argument.name}${required}: ${argument.description}${allowed}`;
            }),
        ].join('\n');

    program
        .command(name)
        .description(definition.description)
        .argument('[arguments...]', 'command arguments as key=value')
        .option('--json', 'Output the raw API response as JSON')
        .addHelpText('after', argumentHelp)
        .action(async (tokens: string[], options: RunOptions, command: Command) => {
            try {
                const { envFile } = command.optsWithGlobals<RunOptions>();
                const client = initCli(envFile);
                console.log(await executeCliCommand(client, name, tokens, options.json));
            } catch (err) {
                exitWithError(err instanceof SiteflowError ? err.userMessage : getErrorMessage(err));
            }
        });
}

/**
 * Version from the package manifest, two levels above both src/cli and dist/cli.
 */
export function getPackageVersion(): string {
    try {
        const manifest: unknown = JSON.parse(
            fs.readFileSync(path.resolve(__dirname, '..', '..', 'package.json'), 'utf-8')
        );
        if (isRecord(manifest) && typeof manifest.version === 'string') {
            return manifest.version;
        }
    } catch (err) {
        console.error(`Could not read package version: ${getErrorMessage(err)}`);
    }
    return '0.0.0';
}

/**
 * Print an error message and exit with code 1.
 */
export function exitWithError(message: string): never {
    console.error(`Error: ${message}`);
    process.exit(1);
}

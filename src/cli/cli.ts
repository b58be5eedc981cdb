#!/usr/bin/env node
/**
 * Siteflow CLI: run one Siteflow command per invocation.
 *
 * Example: siteflow get_flow_phases flow_id=F-123
 */

import { Command } from 'commander';
import { registerAuthCommand } from './commands/auth';
import { registerFlowCommands } from './commands/flows';
import { registerPhaseCommands } from './commands/phases';
import { registerStepCommands } from './commands/steps';
import { getPackageVersion } from './utils';

const program = new Command();

program
    .name('siteflow')
    .description('Manage Siteflow flows, phases and steps')
    .version(getPackageVersion())
    .option('--env-file <path>', 'Load configuration from this .env file');

// Register all commands
registerAuthCommand(program);
registerFlowCommands(program);
registerPhaseCommands(program);
registerStepCommands(program);

program.parseAsync().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
});

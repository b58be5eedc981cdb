/**
 * `siteflow add_step_to_phase phase_id=... step_name=...`,
 * `siteflow update_step_text step_id=... text_content=...`
 */

import { Command } from 'commander';
import { registerSiteflowCommand } from '../utils';

export function registerStepCommands(program: Command): void {
    registerSiteflowCommand(program, 'add_step_to_phase');
    registerSiteflowCommand(program, 'update_step_text');
}

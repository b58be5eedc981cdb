/**
 * `siteflow add_phase_to_flow flow_id=... phase_name=...`
 */

import { Command } from 'commander';
import { registerSiteflowCommand } from '../utils';

export function registerPhaseCommands(program: Command): void {
    registerSiteflowCommand(program, 'add_phase_to_flow');
}

/**
 * `siteflow get_flows`, `siteflow get_flow_phases flow_id=...`,
 * `siteflow create_flow flow_name=... project_id=...`
 */

import { Command } from 'commander';
import { registerSiteflowCommand } from '../utils';

export function registerFlowCommands(program: Command): void {
    registerSiteflowCommand(program, 'get_flows');
    registerSiteflowCommand(program, 'get_flow_phases');
    registerSiteflowCommand(program, 'create_flow');
}

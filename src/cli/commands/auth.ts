/**
 * `siteflow authenticate`: exchange the configured credentials for a token.
 */

import { Command } from 'commander';
import { registerSiteflowCommand } from '../utils';

export function registerAuthCommand(program: Command): void {
    registerSiteflowCommand(program, 'authenticate');
}

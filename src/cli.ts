#!/usr/bin/env node
/**
 * QBO Connect CLI
 * qbc: QuickBooks Online credential lifecycle from the terminal
 */

import { Command } from 'commander';
import { loadDotenv } from './utils/config.js';
import { VERSION } from './version.js';
import { createConfigCommand } from './commands/config.js';
import { createAuthCommand } from './commands/auth.js';
import { createConnectCommand } from './commands/connect.js';
import { createTunnelCommand } from './commands/tunnel.js';

loadDotenv();

const program = new Command();

program
    .name('qbc')
    .description('QBO Connect: OAuth2 credentials for QuickBooks Online')
    .version(VERSION);

program.addCommand(createConfigCommand());
program.addCommand(createAuthCommand());
program.addCommand(createConnectCommand());
program.addCommand(createTunnelCommand());

await program.parseAsync();

#!/usr/bin/env node

import { Command } from 'commander';
import { createRequire } from 'module';
import { startCommand } from './commands/start.js';
import { stopCommand } from './commands/stop.js';
import { envCommand } from './commands/env.js';
import { statusCommand } from './commands/status.js';
import { configCommand } from './commands/config.js';
import type { GlobalOptions } from './commands/context.js';

const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');

const program = new Command();

program
    .name('ssh-agent-manager')
    .description('Start, find, reuse and stop ssh-agent processes, one per identity')
    .version(pkg.version)
    .option('--key-dir <path>', 'Directory holding private keys (default: ~/.ssh)')
    .option('--tmp-dir <path>', 'Directory holding managed agent directories (default: system temp)');

function globalOptions(): GlobalOptions {
    return program.opts<GlobalOptions>();
}

// Shell-evaluated commands: eval "$(ssh-agent-manager <command>)"
program
    .command('start')
    .description('Start an agent holding an identity, or reuse the one that already does')
    .argument('[identity]', 'Key file name in the key directory')
    .option('-l, --lifetime <seconds>', 'Lifetime of a newly started agent')
    .action((identity: string | undefined, options: { lifetime?: string }) =>
        startCommand(identity, options, globalOptions())
    );

program
    .command('stop')
    .description('Stop an agent (the only one, or the one selected)')
    .option('-s, --specifier <specifier>', 'Select the agent by specifier')
    .option('-i, --identity <identity>', 'Select the agent holding this identity')
    .option('-a, --all', 'Stop every managed agent')
    .action((options: { specifier?: string; identity?: string; all?: boolean }) =>
        stopCommand(options, globalOptions())
    );

program
    .command('env')
    .description('Print the variables pointing the shell at an agent')
    .option('-s, --specifier <specifier>', 'Select the agent by specifier')
    .option('-i, --identity <identity>', 'Select the agent holding this identity')
    .action((options: { specifier?: string; identity?: string }) =>
        envCommand(options, globalOptions())
    );

// Inspection
program
    .command('status')
    .alias('ls')
    .description('List managed agents and the agent this shell points at')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => statusCommand(options, globalOptions()));

program
    .command('config')
    .description('Show the effective configuration and its sources')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => configCommand(options, globalOptions()));

await program.parseAsync();

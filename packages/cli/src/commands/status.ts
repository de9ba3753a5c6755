import chalk from 'chalk';
import { discover } from '@ssh-agent-manager/core';
import { openContext, type GlobalOptions } from './context.js';
import { formatRecordRow, recordToJson } from '../format.js';
import { fail, printRecordWarnings } from '../output.js';

interface StatusOptions {
    json?: boolean;
}

/**
 * List every agent in the registry
 */
export async function statusCommand(options: StatusOptions, global: GlobalOptions): Promise<void> {
    try {
        const context = await openContext(global);
        const records = [...(await discover(context)).values()];
        const now = context.now();

        if (options.json) {
            console.log(JSON.stringify(records.map(recordToJson), null, 2));
            return;
        }

        printRecordWarnings(records);

        if (records.length === 0) {
            console.error(chalk.dim('No agents found.'));
            console.error();
            console.error('Start one with:');
            console.error(chalk.cyan('  eval "$(ssh-agent-manager start [identity])"'));
            return;
        }

        console.error(chalk.dim('─'.repeat(80)));
        console.error(
            ' ',
            chalk.dim('Specifier'.padEnd(12)),
            chalk.dim('State'.padEnd(9)),
            chalk.dim('Pid'.padStart(7)),
            chalk.dim('Uptime'.padStart(8)),
            chalk.dim('Expires'.padEnd(14)),
            chalk.dim('Identities')
        );
        console.error(chalk.dim('─'.repeat(80)));
        for (const record of records) {
            console.error(formatRecordRow(record, now));
        }
        console.error(chalk.dim('─'.repeat(80)));
        console.error(chalk.dim(`${records.length} agent(s), * = exported to this shell`));
    } catch (error) {
        fail(error);
    }
}

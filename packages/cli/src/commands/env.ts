import chalk from 'chalk';
import { discover, selectAgent } from '@ssh-agent-manager/core';
import { openContext, type GlobalOptions } from './context.js';
import { selectorFromOptions, type SelectorOptions } from './select.js';
import { exportLines } from '../shell-utils.js';
import { fail, printRecordWarnings, warn } from '../output.js';

/**
 * Print the lines that point the calling shell at the selected agent
 */
export async function envCommand(options: SelectorOptions, global: GlobalOptions): Promise<void> {
    const selector = selectorFromOptions(options);

    try {
        const context = await openContext(global);
        const record = selectAgent(await discover(context), selector);
        printRecordWarnings([record]);

        if (!record.isValid) {
            warn(`Agent ${record.specifier} is not usable (exited, expired or missing its socket)`);
        }
        console.error(chalk.dim('Using agent'), chalk.bold(record.specifier));

        for (const line of exportLines(record)) {
            console.log(line);
        }
    } catch (error) {
        fail(error);
    }
}

import chalk from 'chalk';
import { IdentityAddError, start, type AgentRecord } from '@ssh-agent-manager/core';
import { openContext, type GlobalOptions } from './context.js';
import { exportLines } from '../shell-utils.js';
import { fail, printRecordWarnings, warn } from '../output.js';
import { validatePositiveNumber } from '../validation.js';

interface StartOptions {
    lifetime?: string;
}

/**
 * The agent a failed start still left running, if any. The shell is pointed
 * at it so the identity can be added by hand.
 */
export function runningAfterFailure(error: unknown): AgentRecord | null {
    return error instanceof IdentityAddError ? error.record : null;
}

/**
 * Start (or reuse) an agent holding the given identity and print the lines
 * that point the calling shell at it
 */
export async function startCommand(
    identity: string | undefined,
    options: StartOptions,
    global: GlobalOptions
): Promise<void> {
    const lifetimeSeconds = validatePositiveNumber(options.lifetime, '--lifetime');

    try {
        const context = await openContext(global, lifetimeSeconds === undefined ? {} : { lifetimeSeconds });
        const result = await start(context, identity);
        printRecordWarnings([result.record]);

        if (result.status === 'existing') {
            console.error(chalk.dim('Reusing agent'), chalk.bold(result.record.specifier), chalk.dim(`(pid ${result.record.processId})`));
        } else {
            console.error(chalk.green('✓'), 'Started agent', chalk.bold(result.record.specifier), chalk.dim(`(pid ${result.record.processId})`));
        }

        for (const line of exportLines(result.record)) {
            console.log(line);
        }
    } catch (error) {
        const running = runningAfterFailure(error);
        if (running) {
            for (const line of exportLines(running)) {
                console.log(line);
            }
            warn(`Agent ${running.specifier} is running without the requested identity; add it with ssh-add`);
        }
        fail(error);
    }
}

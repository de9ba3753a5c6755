import chalk from 'chalk';
import {
    discover,
    selectAgent,
    stop,
    type AgentContext,
    type AgentRecord,
    type AgentRegistry,
    type AgentSelector,
} from '@ssh-agent-manager/core';
import { openContext, type GlobalOptions } from './context.js';
import { selectorFromOptions, type SelectorOptions } from './select.js';
import { unsetLines } from '../shell-utils.js';
import { fail } from '../output.js';
import { validateMutualExclusion } from '../validation.js';

interface StopOptions extends SelectorOptions {
    all?: boolean;
}

/**
 * Records a stop request applies to. --all takes every managed record and
 * leaves a foreign agent alone.
 *
 * @throws {AgentNotFoundError} If the selector matches nothing
 */
export function stopTargets(registry: AgentRegistry, selector: AgentSelector, all: boolean): AgentRecord[] {
    if (all) {
        return [...registry.values()].filter(r => r.kind === 'managed');
    }
    return [selectAgent(registry, selector)];
}

/**
 * Whether the calling shell pointed at any of the given records
 */
export function includesExported(records: AgentRecord[]): boolean {
    return records.some(r => r.isExported.pid || r.isExported.socket);
}

async function stopRecord(context: AgentContext, record: AgentRecord): Promise<void> {
    await stop(context, record);
    console.error(chalk.green('✓'), 'Stopped agent', chalk.bold(record.specifier), chalk.dim(`(pid ${record.processId || '-'})`));
}

/**
 * Stop the selected agent, or every managed agent with --all.
 * Prints unset lines when the calling shell pointed at a stopped agent.
 */
export async function stopCommand(options: StopOptions, global: GlobalOptions): Promise<void> {
    validateMutualExclusion(
        ['--all', '--specifier', '--identity'],
        [options.all, options.specifier, options.identity]
    );
    const selector = selectorFromOptions(options);

    try {
        const context = await openContext(global);
        const registry = await discover(context);

        const targets = stopTargets(registry, selector, options.all === true);

        if (targets.length === 0) {
            console.error(chalk.dim('No managed agents to stop.'));
            return;
        }

        for (const record of targets) {
            await stopRecord(context, record);
        }

        if (includesExported(targets)) {
            for (const line of unsetLines()) {
                console.log(line);
            }
        }
    } catch (error) {
        fail(error);
    }
}

/**
 * Shared stderr reporting for commands. Stdout is reserved for lines the
 * calling shell evaluates and for --json output.
 */

import chalk from 'chalk';
import { AgentManagerError, type AgentRecord } from '@ssh-agent-manager/core';

export function warn(message: string): void {
    console.error(chalk.yellow('Warning:'), message);
}

export function printRecordWarnings(records: Iterable<AgentRecord>): void {
    for (const record of records) {
        for (const warning of record.warnings) {
            warn(warning);
        }
    }
}

/**
 * Report an error that ends the command and exit with status 1
 */
export function fail(error: unknown): never {
    if (error instanceof AgentManagerError) {
        console.error(chalk.red('Error:'), error.message);
        if (error.detail.trim()) {
            console.error(chalk.dim(error.detail.trim()));
        }
    } else {
        console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
    }
    process.exit(1);
}

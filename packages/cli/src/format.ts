/**
 * Rendering of registry records for the status command.
 */

import chalk from 'chalk';
import type { AgentRecord } from '@ssh-agent-manager/core';

/**
 * Human-readable length of a time span, two units at most
 */
export function formatDuration(diffMs: number): string {
    const seconds = Math.floor(Math.max(diffMs, 0) / 1000);
    const minutes = Math.floor(seconds / 60);
    const hours = Math.floor(minutes / 60);
    const days = Math.floor(hours / 24);

    if (days > 0) {
        return `${days}d ${hours % 24}h`;
    }
    if (hours > 0) {
        return `${hours}h ${minutes % 60}m`;
    }
    if (minutes > 0) {
        return `${minutes}m ${seconds % 60}s`;
    }
    return `${seconds}s`;
}

export function describeExpiry(record: AgentRecord, nowMs: number): string {
    if (record.kind === 'foreign') {
        return 'unknown';
    }
    if (record.expiresAt === null) {
        return 'no expiration';
    }
    const remaining = record.expiresAt.getTime() - nowMs;
    return remaining > 0 ? `in ${formatDuration(remaining)}` : 'expired';
}

export function describeUptime(record: AgentRecord, nowMs: number): string {
    return record.processStartedAt ? formatDuration(nowMs - record.processStartedAt.getTime()) : '-';
}

export function describeIdentities(record: AgentRecord): string {
    return record.identities.length > 0 ? record.identities.join(', ') : '(none)';
}

function isExported(record: AgentRecord): boolean {
    return record.isExported.pid || record.isExported.socket;
}

/**
 * One status table row
 */
export function formatRecordRow(record: AgentRecord, nowMs: number): string {
    const state = record.isValid ? chalk.green('● valid  ') : chalk.gray('○ invalid');
    return [
        isExported(record) ? chalk.cyan('*') : ' ',
        chalk.bold(record.specifier.padEnd(12)),
        state,
        (record.processId || '-').padStart(7),
        chalk.dim(describeUptime(record, nowMs).padStart(8)),
        describeExpiry(record, nowMs).padEnd(14),
        describeIdentities(record),
    ].join('  ');
}

export interface RecordJson {
    specifier: string;
    kind: AgentRecord['kind'];
    processId: string;
    socketPath: string;
    isValid: boolean;
    isExported: boolean;
    identities: string[];
    expiresAt: string | null;
    processStartedAt: string | null;
    socketModifiedAt: string | null;
    warnings: string[];
}

export function recordToJson(record: AgentRecord): RecordJson {
    return {
        specifier: record.specifier,
        kind: record.kind,
        processId: record.processId,
        socketPath: record.socketPath,
        isValid: record.isValid,
        isExported: isExported(record),
        identities: [...record.identities],
        expiresAt: record.expiresAt?.toISOString() ?? null,
        processStartedAt: record.processStartedAt?.toISOString() ?? null,
        socketModifiedAt: record.socketModifiedAt?.toISOString() ?? null,
        warnings: [...record.warnings],
    };
}

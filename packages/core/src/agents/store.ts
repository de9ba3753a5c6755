/**
 * Managed agent store: the ssh-agent-<specifier> directories under the temp root.
 *
 * Layout of one directory:
 *
 *   agent.pid          owner rw, text process id
 *   agent.sock         created by the spawned agent
 *   agent.expiration   owner rw, text float epoch seconds
 */

import { join } from 'path';
import { ConfigurationError } from './errors.js';
import { matchIdentities } from './identity.js';
import {
    isManagedRecordValid,
    isPidValid,
    isSocketValid,
    processStartTime,
    socketModifiedTime,
} from './liveness.js';
import { isManagedDirectoryName, parseSpecifier } from './specifier.js';
import type { AgentContext, ManagedAgentRecord } from './types.js';

export const PID_FILE = 'agent.pid';
export const SOCKET_FILE = 'agent.sock';
export const EXPIRATION_FILE = 'agent.expiration';

/** Mode of created agent directories */
export const DIRECTORY_MODE = 0o700;
/** Mode of the pid and expiration files */
export const STATE_FILE_MODE = 0o600;

/**
 * Expiration marker contents to a Date; anything unparsable is null
 */
export function parseExpiration(content: string | null): Date | null {
    if (content === null) {
        return null;
    }
    const seconds = parseFloat(content.trim());
    return Number.isFinite(seconds) && seconds > 0 ? new Date(Math.round(seconds * 1000)) : null;
}

export function formatExpiration(epochMs: number): string {
    return (epochMs / 1000).toFixed(3);
}

/**
 * Load one managed directory into a record.
 *
 * Returns null when the directory held no recoverable state and was reaped:
 * pid invalid, no socket path recorded and socket invalid. A directory with
 * any of those positive is kept, even when the agent is not valid.
 */
export async function loadManagedAgent(
    context: AgentContext,
    name: string
): Promise<ManagedAgentRecord | null> {
    const { host, uid, env } = context;
    const directory = join(context.tmpDir, name);

    const pidContent = await host.readFile(join(directory, PID_FILE));
    const processId = pidContent?.trim() ?? '';

    const socketCandidate = join(directory, SOCKET_FILE);
    const socketPath = (await host.lstat(socketCandidate)) !== null ? socketCandidate : '';

    const expiresAt = parseExpiration(await host.readFile(join(directory, EXPIRATION_FILE)));

    const pidValid = isPidValid(host, processId);
    const socketValid = await isSocketValid(host, socketPath, uid);
    const warnings: string[] = [];

    if (!pidValid && socketPath === '' && !socketValid) {
        try {
            await host.rm(directory);
            return null;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            warnings.push(`Could not remove stale directory ${directory}: ${message}`);
        }
    }

    const isValid = isManagedRecordValid(pidValid, socketValid, expiresAt, context.now());

    let identities: string[] = [];
    if (isValid) {
        const match = await matchIdentities(host, context.tools, { processId, socketPath }, context.keyDir);
        identities = match.identities;
        warnings.push(...match.warnings);
    }

    return {
        kind: 'managed',
        specifier: parseSpecifier(name),
        directory,
        processId,
        socketPath,
        isManaged: { pid: pidContent !== null, socket: socketPath !== '' },
        isExported: {
            pid: processId !== '' && env.SSH_AGENT_PID === processId,
            socket: socketPath !== '' && env.SSH_AUTH_SOCK === socketPath,
        },
        expiresAt,
        isValid,
        identities,
        processStartedAt: pidValid ? await processStartTime(host, processId) : null,
        socketModifiedAt: socketValid ? await socketModifiedTime(host, socketPath) : null,
        warnings,
    };
}

/**
 * Scan the temp root for managed directories owned by the invoking user.
 * Entries not matching the naming pattern, non-directories and directories
 * owned by anyone else are skipped.
 */
export async function scanManagedAgents(context: AgentContext): Promise<ManagedAgentRecord[]> {
    const { host } = context;

    let entries: string[];
    try {
        entries = await host.readdir(context.tmpDir);
    } catch {
        throw new ConfigurationError('Temp directory', context.tmpDir);
    }

    const records: ManagedAgentRecord[] = [];
    for (const name of entries.filter(isManagedDirectoryName).sort()) {
        const stat = await host.lstat(join(context.tmpDir, name));
        if (stat?.kind !== 'directory' || stat.uid !== context.uid) {
            continue;
        }

        const record = await loadManagedAgent(context, name);
        if (record) {
            records.push(record);
        }
    }

    return records;
}

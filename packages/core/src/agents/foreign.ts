/**
 * Foreign agents: the ones the environment points at but this tool never started.
 */

import { matchIdentities } from './identity.js';
import {
    isForeignRecordValid,
    isPidValid,
    isSocketValid,
    processStartTime,
    socketModifiedTime,
} from './liveness.js';
import { foreignSpecifier } from './specifier.js';
import type { AgentContext, AgentRecord, ForeignAgentRecord } from './types.js';

/**
 * Whether one known record is exactly what the environment names: both
 * variables set and both recorded by that same managed agent.
 */
function matchesEnvironment(record: AgentRecord, pid: string, socket: string): boolean {
    if (!pid || !socket) {
        return false;
    }
    return record.isManaged.pid && record.processId === pid
        && record.isManaged.socket && record.socketPath === socket;
}

/**
 * Synthesize a record for the agent named by SSH_AGENT_PID / SSH_AUTH_SOCK.
 *
 * Returns null when neither variable is set, or when a single managed record
 * already accounts for both. Anything less, such as only the socket of a
 * managed agent or a pid and socket from two different managed agents,
 * still yields a foreign record.
 */
export async function resolveForeignAgent(
    context: AgentContext,
    known: Iterable<AgentRecord>
): Promise<ForeignAgentRecord | null> {
    const { host, env } = context;
    const processId = env.SSH_AGENT_PID ?? '';
    const socketPath = env.SSH_AUTH_SOCK ?? '';

    if (!processId && !socketPath) {
        return null;
    }

    for (const record of known) {
        if (record.kind === 'managed' && matchesEnvironment(record, processId, socketPath)) {
            return null;
        }
    }

    const pidValid = isPidValid(host, processId);
    const socketValid = await isSocketValid(host, socketPath, context.uid);
    const isValid = isForeignRecordValid(pidValid, socketValid);

    const processStartedAt = pidValid ? await processStartTime(host, processId) : null;
    const socketModifiedAt = socketValid ? await socketModifiedTime(host, socketPath) : null;

    const match = isValid
        ? await matchIdentities(host, context.tools, { processId, socketPath }, context.keyDir)
        : { identities: [], warnings: [] };

    return {
        kind: 'foreign',
        specifier: foreignSpecifier([processStartedAt, socketModifiedAt]),
        processId,
        socketPath,
        isManaged: { pid: false, socket: false },
        isExported: { pid: true, socket: true },
        expiresAt: null,
        isValid,
        identities: match.identities,
        processStartedAt,
        socketModifiedAt,
        warnings: match.warnings,
    };
}

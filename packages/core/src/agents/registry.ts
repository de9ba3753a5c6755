/**
 * Agent Registry
 *
 * Composes managed-directory discovery and environment reconciliation into
 * one snapshot keyed by specifier, and coordinates start/stop against it.
 * A snapshot is built per invocation and never cached.
 */

import { join } from 'path';
import {
    AgentNotFoundError,
    AgentStartError,
    AgentStopError,
    ConfigurationError,
    IdentityAddError,
} from './errors.js';
import { resolveForeignAgent } from './foreign.js';
import { parsePid } from './liveness.js';
import { allocateSpecifier, managedDirectoryName } from './specifier.js';
import {
    DIRECTORY_MODE,
    EXPIRATION_FILE,
    PID_FILE,
    SOCKET_FILE,
    STATE_FILE_MODE,
    formatExpiration,
    loadManagedAgent,
    scanManagedAgents,
} from './store.js';
import type {
    AgentContext,
    AgentRecord,
    AgentRegistry,
    AgentSelector,
    ManagedAgentRecord,
    StartResult,
} from './types.js';

/** Directory creation attempts before giving up on a colliding specifier */
export const MAX_ALLOCATION_ATTEMPTS = 10;

function errorCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Fail with ConfigurationError unless both configured directories are usable
 */
export async function validateContext(context: AgentContext): Promise<void> {
    if (!(await context.host.isAccessible(context.tmpDir))) {
        throw new ConfigurationError('Temp directory', context.tmpDir);
    }
    if (!(await context.host.isAccessible(context.keyDir))) {
        throw new ConfigurationError('Key directory', context.keyDir);
    }
}

/**
 * Build one registry snapshot: managed directories first, then the agent
 * the environment points at if no managed record accounts for it.
 */
export async function discover(context: AgentContext): Promise<AgentRegistry> {
    const registry: AgentRegistry = new Map();

    for (const record of await scanManagedAgents(context)) {
        registry.set(record.specifier, record);
    }

    const foreign = await resolveForeignAgent(context, registry.values());
    if (foreign && !registry.has(foreign.specifier)) {
        registry.set(foreign.specifier, foreign);
    }

    return registry;
}

/**
 * Whether a record's identities satisfy a start request: no identity requested
 * and none held, or exactly the requested one held.
 */
export function holdsExactly(record: AgentRecord, identity: string | undefined): boolean {
    if (identity === undefined) {
        return record.identities.length === 0;
    }
    return record.identities.length === 1 && record.identities[0] === identity;
}

/**
 * The valid managed agent a start request would reuse, if any
 */
export function findReusableAgent(
    registry: AgentRegistry,
    identity: string | undefined
): ManagedAgentRecord | null {
    for (const record of registry.values()) {
        if (record.kind === 'managed' && record.isValid && holdsExactly(record, identity)) {
            return record;
        }
    }
    return null;
}

/**
 * Create a fresh owner-only directory, retrying with a later clock reading
 * when another invocation already took the specifier.
 */
async function createAgentDirectory(context: AgentContext, startedAt: number): Promise<string> {
    for (let attempt = 0; attempt < MAX_ALLOCATION_ATTEMPTS; attempt++) {
        const name = managedDirectoryName(allocateSpecifier(startedAt + attempt));
        try {
            await context.host.mkdir(join(context.tmpDir, name), DIRECTORY_MODE);
            return name;
        } catch (error) {
            if (errorCode(error) !== 'EEXIST') {
                throw new AgentStartError(`Could not create agent directory in ${context.tmpDir}`, errorMessage(error));
            }
        }
    }
    throw new AgentStartError(`Could not allocate a free specifier after ${MAX_ALLOCATION_ATTEMPTS} attempts`);
}

/**
 * Start an agent, optionally holding one identity from the key directory.
 *
 * Reuses a valid managed agent whose identities already match the request
 * instead of starting a duplicate.
 *
 * @throws {AgentStartError} If the agent could not be spawned
 * @throws {IdentityAddError} If the agent started but the identity was not added
 */
export async function start(context: AgentContext, identity?: string): Promise<StartResult> {
    const registry = await discover(context);
    const existing = findReusableAgent(registry, identity);
    if (existing) {
        return { status: 'existing', record: existing };
    }

    const { host, tools } = context;
    let keyPath: string | undefined;
    if (identity !== undefined) {
        keyPath = join(context.keyDir, identity);
        const content = identity.includes('/') ? null : await host.readFile(keyPath);
        if (content === null) {
            throw new AgentStartError(`Identity ${identity} is not a file in ${context.keyDir}`);
        }
    }

    const startedAt = context.now();
    const name = await createAgentDirectory(context, startedAt);
    const directory = join(context.tmpDir, name);
    const socketPath = join(directory, SOCKET_FILE);

    const spawned = await tools.spawnAgent(socketPath, context.lifetimeSeconds);
    const pid = spawned.success ? parsePid(spawned.value) : null;
    if (!spawned.success || pid === null) {
        await host.rm(directory);
        throw new AgentStartError(
            'Could not start ssh-agent',
            spawned.success ? `Unusable process id: ${spawned.value}` : spawned.error
        );
    }

    try {
        await host.writeFile(join(directory, PID_FILE), `${pid}\n`, STATE_FILE_MODE);
        await host.writeFile(
            join(directory, EXPIRATION_FILE),
            `${formatExpiration(startedAt + context.lifetimeSeconds * 1000)}\n`,
            STATE_FILE_MODE
        );
    } catch (error) {
        // Without a pidfile nothing could find this agent again
        const detail = [`ssh-agent pid ${pid}: ${errorMessage(error)}`];
        try {
            host.signal(pid, 'SIGHUP');
        } catch (signalError) {
            detail.push(`Could not stop ssh-agent ${pid}: ${errorMessage(signalError)}`);
        }
        await host.rm(directory);
        throw new AgentStartError(`Could not record state of ssh-agent ${pid} in ${directory}`, detail.join('\n'));
    }

    const record = await loadManagedAgent(context, name);
    if (!record) {
        throw new AgentStartError(`ssh-agent ${pid} exited before its socket appeared`);
    }

    if (identity === undefined || keyPath === undefined) {
        return { status: 'started', record };
    }

    const added = await tools.addIdentity({ processId: record.processId, socketPath: record.socketPath }, keyPath);
    if (!added.success) {
        throw new IdentityAddError(identity, record, added.error);
    }

    return { status: 'started', record: (await loadManagedAgent(context, name)) ?? record };
}

/**
 * Stop an agent: hang up its process, drop the pidfile, and remove the
 * directory if that left it empty. The socket is left to the exiting agent;
 * a leftover one is reaped by a later discovery once the pid is gone.
 *
 * @throws {AgentStopError} If the process exists but cannot be signalled
 */
export async function stop(context: AgentContext, record: AgentRecord): Promise<void> {
    const { host } = context;
    const pid = parsePid(record.processId);

    if (pid !== null) {
        try {
            host.signal(pid, 'SIGHUP');
        } catch (error) {
            // Already gone is fine
            if (errorCode(error) !== 'ESRCH') {
                throw new AgentStopError(`Could not signal agent ${record.specifier} (pid ${pid})`, errorMessage(error));
            }
        }
    }

    if (record.kind !== 'managed') {
        return;
    }

    if (record.isManaged.pid) {
        await host.rm(join(record.directory, PID_FILE));
    }

    if ((await host.lstat(record.directory)) !== null) {
        const remaining = await host.readdir(record.directory);
        if (remaining.length === 0) {
            await host.rmdir(record.directory);
        }
    }
}

/**
 * Pick one record out of a snapshot.
 *
 * Identity selection only considers valid agents and fails when more than
 * one holds the identity. Default selection needs exactly one record.
 *
 * @throws {AgentNotFoundError}
 */
export function selectAgent(registry: AgentRegistry, selector: AgentSelector): AgentRecord {
    switch (selector.kind) {
        case 'specifier': {
            const record = registry.get(selector.specifier);
            if (!record) {
                throw new AgentNotFoundError(selector);
            }
            return record;
        }
        case 'identity': {
            const matches = [...registry.values()].filter(
                r => r.isValid && r.identities.includes(selector.identity)
            );
            if (matches.length === 0) {
                throw new AgentNotFoundError(selector);
            }
            if (matches.length > 1) {
                throw new AgentNotFoundError(selector, true);
            }
            return matches[0];
        }
        case 'default': {
            const records = [...registry.values()];
            if (records.length === 0) {
                throw new AgentNotFoundError(selector);
            }
            if (records.length > 1) {
                throw new AgentNotFoundError(selector, true);
            }
            return records[0];
        }
    }
}

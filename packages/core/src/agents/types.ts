/**
 * Agent Registry Types
 *
 * Data structures for tracking ssh-agent processes, both the ones this tool
 * started (managed) and the ones it only learned about from the environment
 * (foreign).
 */

import type { AgentHost } from './host.js';
import type { AgentTools } from './tools.js';

/**
 * Which pieces of an agent this tool created, or which pieces the current
 * environment points at.
 */
export interface PidSocketFlags {
    pid: boolean;
    socket: boolean;
}

/**
 * Fields shared by managed and foreign records
 */
interface AgentRecordBase {
    /** Display identifier, unique within one registry snapshot */
    specifier: string;

    /** Textual process id, empty if unknown */
    processId: string;

    /** Path of the agent's listening socket, empty if unknown */
    socketPath: string;

    /** Whether this tool created the pidfile / socket */
    isManaged: PidSocketFlags;

    /** Whether SSH_AGENT_PID / SSH_AUTH_SOCK currently point at this pid / socket */
    isExported: PidSocketFlags;

    /** Composite validity verdict at discovery time */
    isValid: boolean;

    /** Resolved identity names, or raw fingerprints when none resolved */
    identities: string[];

    /** Start time of the process, for display */
    processStartedAt: Date | null;

    /** Last modification of the socket, for display */
    socketModifiedAt: Date | null;

    /** Non-fatal diagnostics gathered while resolving this record */
    warnings: string[];
}

/**
 * An agent whose directory under the temp root was created by this tool
 */
export interface ManagedAgentRecord extends AgentRecordBase {
    kind: 'managed';

    /** Absolute path of the backing ssh-agent-<specifier> directory */
    directory: string;

    /** Expiration from the marker file; null when unreadable (never valid) */
    expiresAt: Date | null;
}

/**
 * An agent known only through inherited environment variables
 */
export interface ForeignAgentRecord extends AgentRecordBase {
    kind: 'foreign';

    /** Foreign agents carry no tracked expiration */
    expiresAt: null;
}

export type AgentRecord = ManagedAgentRecord | ForeignAgentRecord;

/**
 * One discovery snapshot, keyed by specifier
 */
export type AgentRegistry = Map<string, AgentRecord>;

/**
 * The agent variables of a process environment
 */
export interface AgentEnvironment {
    SSH_AGENT_PID?: string;
    SSH_AUTH_SOCK?: string;
}

/**
 * Everything discovery and start/stop need, passed explicitly so that the
 * engine never reads process globals itself.
 */
export interface AgentContext {
    /** Effective user id that must own sockets and managed directories */
    uid: number;

    /** Root directory holding ssh-agent-<specifier> directories */
    tmpDir: string;

    /** Directory holding private key files */
    keyDir: string;

    /** Lifetime given to newly started agents, in seconds */
    lifetimeSeconds: number;

    /** Snapshot of the agent variables of the invoking environment */
    env: AgentEnvironment;

    /** Wall clock in epoch milliseconds */
    now: () => number;

    host: AgentHost;
    tools: AgentTools;
}

/**
 * How a command picks one record out of the registry
 */
export type AgentSelector =
    | { kind: 'specifier'; specifier: string }
    | { kind: 'identity'; identity: string }
    | { kind: 'default' };

/**
 * Outcome of a start request
 */
export interface StartResult {
    /** 'existing' when an agent with the requested identity was already running */
    status: 'started' | 'existing';
    record: AgentRecord;
}
